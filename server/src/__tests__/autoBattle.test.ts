import { beforeEach, describe, expect, it } from "vitest";
import type { AbilityDefinition } from "@shared/combat/engine";
import { BattleSession } from "@shared/combat/engine";
import { createCombatConfig } from "@shared/combat/types";
import type { Unit } from "@shared/combat/types";
import {
  createEnemyUnit,
  createTestUnit,
  resetUnitCounter,
  withHP,
} from "@shared/test-utils/factories/unitFactory";
import { pickWeakest, runAutoBattle } from "../simulation/auto-battle";

const config = createCombatConfig();

const firebomb: AbilityDefinition = {
  id: "firebomb",
  name: "Firebomb",
  energyCost: 2,
  targeting: "enemy",
  effects: [{ type: "damage", baseDamage: 6, style: "ranged" }],
};

let gunner: Unit;
let brute: Unit;

beforeEach(() => {
  resetUnitCounter();
  gunner = createTestUnit({ id: "p1", name: "Gunner", stats: { power: 30 } });
  brute = createEnemyUnit({ id: "e1", name: "Brute" });
});

const sessionOf = (units: Unit[]): BattleSession => new BattleSession({ config, units, random: () => 0.99 });

describe("pickWeakest", () => {
  it("picks the lowest HP and keeps roster order on ties", () => {
    const a = withHP(createEnemyUnit({ id: "a" }), 40);
    const b = withHP(createEnemyUnit({ id: "b" }), 30);
    const c = withHP(createEnemyUnit({ id: "c" }), 30);
    expect(pickWeakest([a, b, c])?.id).toBe("b");
    expect(pickWeakest([])).toBeNull();
  });
});

describe("runAutoBattle", () => {
  it("fights until one side is left", () => {
    const session = sessionOf([gunner, withHP(brute, 20)]);
    const result = runAutoBattle(session, { config });

    expect(result).toEqual({ winner: "player", rounds: 2, stalemate: false, survivors: ["player"] });
    expect(session.getUnit("e1")?.alive).toBe(false);
  });

  it("calls a stalemate after the round limit", () => {
    const session = sessionOf([createTestUnit({ id: "p1" }), brute]);
    const result = runAutoBattle(session, { config, maxRounds: 1 });

    expect(result).toEqual({ winner: null, rounds: 1, stalemate: true, survivors: ["player", "enemy"] });
    expect(session.getUnit("e1")?.resources.hp.current).toBe(90);
  });

  it("prefers an affordable ability over a plain attack", () => {
    const session = sessionOf([gunner, brute]);
    const audits: (readonly string[])[] = [];
    runAutoBattle(session, {
      config,
      maxRounds: 1,
      abilitiesFor: (unitId) => (unitId === "p1" ? [firebomb] : []),
      onAudit: (lines) => audits.push(lines),
    });

    expect(audits[0]?.[0]).toBe("Gunner uses Firebomb on Brute");
  });
});
