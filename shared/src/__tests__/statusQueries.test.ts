import { beforeEach, describe, expect, it } from "vitest";
import { applyStatusEffect } from "@shared/combat/engine/status-ledger";
import {
  countBuffs,
  countDebuffs,
  getEffectsSummary,
  getMovementRangeModifier,
} from "@shared/combat/engine/status-queries";
import { createCurse, createExposed, createFire, createStatusEffect } from "@shared/combat/engine/status-registry";
import { createCombatConfig } from "@shared/combat/types/config";
import { createTestUnit, resetUnitCounter } from "../test-utils/factories/unitFactory";

const config = createCombatConfig();

beforeEach(() => {
  resetUnitCounter();
});

describe("polarity counts", () => {
  it("counts buffs and debuffs separately", () => {
    const ledger = [
      createFire(2, 3),
      createExposed(1),
      createStatusEffect({ kind: "DamageBoost", duration: 2, magnitude: 0.2 }),
    ];
    expect(countDebuffs(ledger)).toBe(2);
    expect(countBuffs(ledger)).toBe(1);
  });

  it("counts nothing on an empty ledger", () => {
    expect(countDebuffs([])).toBe(0);
    expect(countBuffs([])).toBe(0);
  });
});

describe("getMovementRangeModifier", () => {
  it("nets haste against slow and ignores blocking effects", () => {
    const ledger = [
      createStatusEffect({ kind: "Hastened", duration: 2, magnitude: 2 }),
      createStatusEffect({ kind: "Slowed", duration: 2, magnitude: 1 }),
      createStatusEffect({ kind: "Rooted", duration: 1 }),
    ];
    expect(getMovementRangeModifier(ledger)).toBe(1);
  });

  it("is zero without movement effects", () => {
    expect(getMovementRangeModifier([createFire(2, 3)])).toBe(0);
  });
});

describe("getEffectsSummary", () => {
  it("says none for an empty ledger", () => {
    expect(getEffectsSummary([])).toBe("none");
  });

  it("lists stacks, turns left and charges", () => {
    const once = applyStatusEffect(createTestUnit(), createFire(2, 3)).updatedUnit;
    const burning = applyStatusEffect(once, createFire(2, 3)).updatedUnit;

    expect(getEffectsSummary([...burning.statusEffects, createCurse(config)])).toBe(
      "Burning x2 (3t), Cursed [2 charges]"
    );
  });
});
