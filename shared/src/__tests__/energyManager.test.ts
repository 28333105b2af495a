import { describe, expect, it } from "vitest";
import {
  addGrog,
  bankEnergy,
  convertUnspentEnergy,
  createEnergyPool,
  drainEnergy,
  drainGrog,
  refillEnergy,
  refundEnergy,
  spendEnergy,
  spendGrog,
} from "@shared/combat/engine/energy-manager";
import type { EnergyPool } from "@shared/combat/engine/energy-manager";
import { createCombatConfig } from "@shared/combat/types/config";

const config = createCombatConfig();
const pool = (current: number, grog = 0, max = 3): EnergyPool => ({ current, max, grog, banked: 0 });

describe("energy", () => {
  it("starts empty and refills to the turn income", () => {
    const empty = createEnergyPool(config);
    expect(empty).toEqual({ current: 0, max: 3, grog: 0, banked: 0 });

    const refilled = refillEnergy(empty, config, 0);
    expect(refilled.updatedPool).toEqual({ current: 3, max: 3, grog: 0, banked: 0 });
    expect(refilled.audit).toBe("Energy refilled to 3");
  });

  it("adds income modifiers but never refills below zero", () => {
    expect(refillEnergy(pool(0), config, 1).updatedPool.current).toBe(4);
    expect(refillEnergy(pool(0), config, -5).updatedPool.current).toBe(0);
  });

  it("spends all or nothing", () => {
    const short = spendEnergy(pool(3), 4, "Broadside");
    expect(short.success).toBe(false);
    expect(short.updatedPool).toEqual(pool(3));
    expect(short.failureReason).toBe("Insufficient energy: 3/4");

    const paid = spendEnergy(pool(3), 2, "Broadside");
    expect(paid.success).toBe(true);
    expect(paid.updatedPool.current).toBe(1);
  });

  it("refunds up to the pool maximum", () => {
    const result = refundEnergy(pool(1), 5, "Bounty");
    expect(result.updatedPool.current).toBe(3);
    expect(result.amount).toBe(2);
  });

  it("never lowers a pool that already sits above its maximum", () => {
    const result = refundEnergy(pool(5), 1, "Bounty");
    expect(result.updatedPool.current).toBe(5);
    expect(result.success).toBe(false);
  });

  it("holds banked energy until the next refill pays it out", () => {
    const banked = bankEnergy(pool(0), 2, "enemy refund");
    expect(banked.updatedPool).toEqual({ current: 0, max: 3, grog: 0, banked: 2 });
    expect(banked.audit).toBe("enemy refund: +2 energy banked (2 for next turn)");

    const refilled = refillEnergy(banked.updatedPool, config, 0);
    expect(refilled.updatedPool).toEqual({ current: 5, max: 3, grog: 0, banked: 0 });
    expect(refilled.amount).toBe(5);
    expect(refilled.audit).toBe("Energy refilled to 5 (+2 banked)");
  });

  it("drains what is there and stops at zero", () => {
    const result = drainEnergy(pool(2), 5, "Energy Drain");
    expect(result.success).toBe(true);
    expect(result.amount).toBe(2);
    expect(result.updatedPool.current).toBe(0);
  });
});

describe("grog", () => {
  it("converts unspent energy into grog at turn end", () => {
    const result = convertUnspentEnergy(pool(2, 1), config);
    expect(result.updatedPool).toEqual({ current: 0, max: 3, grog: 3, banked: 0 });
    expect(result.amount).toBe(2);
  });

  it("refuses to spend grog the side does not have", () => {
    expect(spendGrog(pool(0, 0), 1, "rum").failureReason).toBe("Insufficient grog: 0/1");
    expect(spendGrog(pool(0, 2), 1, "rum").updatedPool.grog).toBe(1);
  });

  it("drains grog down to zero at most", () => {
    const stocked = addGrog(pool(0), 2, "plunder").updatedPool;
    expect(drainGrog(stocked, 5, "Leaking Casks").updatedPool.grog).toBe(0);
  });
});
