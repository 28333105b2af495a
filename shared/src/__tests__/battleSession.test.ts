import { beforeEach, describe, expect, it } from "vitest";
import type { AbilityDefinition } from "@shared/combat/engine/ability-executor";
import type { BattleSessionOptions } from "@shared/combat/engine/battle-session";
import { BattleSession, getTeamsInPlay } from "@shared/combat/engine/battle-session";
import { getStatusEffect, hasStatusEffect } from "@shared/combat/engine/status-queries";
import {
  createBleed,
  createEnergyDrain,
  createFire,
  createReflect,
  createStatusEffect,
} from "@shared/combat/engine/status-registry";
import { createCombatConfig } from "@shared/combat/types/config";
import type { CombatEvent } from "@shared/combat/types/events";
import type { Unit } from "@shared/combat/types/unit";
import {
  createEnemyUnit,
  createTestUnit,
  resetUnitCounter,
  withEffects,
  withHP,
} from "../test-utils/factories/unitFactory";

const config = createCombatConfig();

const firebomb: AbilityDefinition = {
  id: "firebomb",
  name: "Firebomb",
  energyCost: 2,
  targeting: "enemy",
  effects: [
    { type: "damage", baseDamage: 6, style: "ranged" },
    { type: "applyStatus", recipient: "target", effect: { kind: "Fire", duration: 2, magnitude: 3 } },
  ],
};

let gunner: Unit;
let brute: Unit;

function createSession(units: Unit[], options: Partial<BattleSessionOptions> = {}): BattleSession {
  return new BattleSession({ config, units, random: () => 0.99, ...options });
}

function recordEvents(session: BattleSession): CombatEvent[] {
  const events: CombatEvent[] = [];
  session.events.subscribe((event) => events.push(event));
  return events;
}

function unitOf(session: BattleSession, id: string): Unit {
  const unit = session.getUnit(id);
  if (!unit) throw new Error(`missing unit ${id}`);
  return unit;
}

beforeEach(() => {
  resetUnitCounter();
  gunner = createTestUnit({ id: "p1", name: "Gunner", stats: { power: 30 } });
  brute = createEnemyUnit({ id: "e1", name: "Brute" });
});

describe("BattleSession lifecycle", () => {
  it("opens round one with the tie-break side acting and a full energy pool", () => {
    const session = createSession([gunner, brute]);
    const events = recordEvents(session);
    session.start();

    expect(session.turnState).toMatchObject({ round: 1, phase: "sideActing", actingSide: "player" });
    expect(session.getEnergyPool("player").current).toBe(3);
    expect(events.map((event) => event.type)).toEqual([
      "battleStarted",
      "roundStarted",
      "energyChanged",
      "sideTurnStarted",
    ]);
  });

  it("refuses duplicate ids and a second start", () => {
    expect(() => createSession([gunner, { ...brute, id: "p1" }])).toThrow("Duplicate unit id in roster: p1");

    const session = createSession([gunner, brute]);
    session.start();
    expect(() => session.start()).toThrow("Battle already started");
  });

  it("turns unspent energy into grog and hands the turn over", () => {
    const session = createSession([gunner, brute]);
    session.start();
    session.attack("p1", "e1");

    expect(session.endSideTurn().success).toBe(true);
    expect(session.getEnergyPool("player")).toEqual({ current: 0, max: 3, grog: 2, banked: 0 });
    expect(session.turnState.actingSide).toBe("enemy");
    expect(session.getEnergyPool("enemy").current).toBe(3);

    session.endSideTurn();
    expect(session.turnState).toMatchObject({ round: 2, actingSide: "player" });
    expect(session.getEnergyPool("enemy").grog).toBe(3);
  });

  it("keeps energy a defender earns on the attacker's turn for its own turn", () => {
    const charged = withEffects(brute, createStatusEffect({ kind: "EnergyOnHit", duration: 3, magnitude: 2 }));
    const session = createSession([gunner, charged]);
    session.start();

    expect(session.attack("p1", "e1").success).toBe(true);
    expect(session.getEnergyPool("enemy")).toMatchObject({ current: 0, banked: 2 });

    session.endSideTurn();
    expect(session.turnState.actingSide).toBe("enemy");
    expect(session.getEnergyPool("enemy")).toMatchObject({ current: 5, banked: 0 });
  });

  it("ends the battle when the last enemy falls", () => {
    const session = createSession([gunner, withHP(brute, 10)]);
    const events = recordEvents(session);
    session.start();
    session.attack("p1", "e1");

    expect(session.isOver).toBe(true);
    expect(session.turnState.winner).toBe("player");
    expect(events.at(-1)).toEqual({ type: "battleEnded", round: 1, winner: "player" });
    expect(getTeamsInPlay(session)).toEqual(["player"]);
    expect(session.attack("p1", "e1").failureReason).toBe("No side is acting (phase: battleEnded)");
  });
});

describe("BattleSession attacks", () => {
  it("spends energy and applies the hit", () => {
    const session = createSession([gunner, brute]);
    session.start();
    const events = recordEvents(session);

    const result = session.attack("p1", "e1");
    expect(result.success).toBe(true);
    expect(unitOf(session, "e1").resources.hp.current).toBe(87);
    expect(unitOf(session, "e1").resources.morale.current).toBe(86);
    expect(session.getEnergyPool("player").current).toBe(2);
    expect(events.map((event) => event.type)).toEqual([
      "energyChanged",
      "attackResolved",
      "unitDamaged",
      "moraleChanged",
    ]);
  });

  it("previews without spending or changing anything", () => {
    const session = createSession([gunner, brute]);
    session.start();
    expect(session.previewAttack("p1", "e1")?.finalHP).toBe(13);
    expect(session.getEnergyPool("player").current).toBe(3);
    expect(unitOf(session, "e1").resources.hp.current).toBe(100);
  });

  it("rejects attacks out of turn", () => {
    const session = createSession([gunner, brute]);
    session.start();
    expect(session.attack("e1", "p1").failureReason).toBe("It is not enemy's turn");
  });

  it("rejects attacks the side cannot pay for", () => {
    const session = createSession([gunner, brute]);
    session.start();
    for (let i = 0; i < 3; i++) expect(session.attack("p1", "e1").success).toBe(true);

    const broke = session.attack("p1", "e1");
    expect(broke.success).toBe(false);
    expect(broke.failureReason).toBe("Insufficient energy: 0/1");
  });

  it("still charges energy for a miss", () => {
    const blinded = withEffects(gunner, createStatusEffect({ kind: "Blinded", duration: 2, magnitude: 1 }));
    const session = createSession([blinded, brute], { random: () => 0 });
    session.start();
    const events = recordEvents(session);

    expect(session.attack("p1", "e1").success).toBe(true);
    expect(unitOf(session, "e1").resources.hp.current).toBe(100);
    expect(session.getEnergyPool("player").current).toBe(2);
    expect(events.at(-1)).toEqual({ type: "attackMissed", attackerId: "p1", targetId: "e1" });
    expect(unitOf(session, "p1").comboCount).toBe(0);
  });

  it("dispatches reflected damage back to the attacker", () => {
    const session = createSession([gunner, withEffects(brute, createReflect(2, config))]);
    session.start();
    session.attack("p1", "e1");
    expect(unitOf(session, "p1").resources.hp.current).toBe(93);
  });
});

describe("BattleSession side start", () => {
  it("spreads ally auras when the owner's side starts", () => {
    const captain = withEffects(
      createTestUnit({ id: "p2" }),
      createStatusEffect({ kind: "RallyAura", duration: 3, magnitude: 4 })
    );
    const session = createSession([captain, gunner, brute]);
    session.start();

    expect(hasStatusEffect(unitOf(session, "p1").statusEffects, "Rallying")).toBe(true);
    expect(hasStatusEffect(unitOf(session, "p2").statusEffects, "Rallying")).toBe(false);
  });

  it("drains side energy after the refill", () => {
    const session = createSession([withEffects(gunner, createEnergyDrain(2, 2)), brute]);
    session.start();
    expect(session.getEnergyPool("player").current).toBe(1);
  });
});

describe("BattleSession other actions", () => {
  it("resolves an ability's strike and status in order", () => {
    const session = createSession([gunner, brute]);
    session.start();

    const result = session.useAbility("p1", "e1", firebomb);
    expect(result.success).toBe(true);

    const target = unitOf(session, "e1");
    expect(target.resources.hp.current).toBe(93);
    expect(target.resources.morale.current).toBe(94);
    expect(getStatusEffect(target.statusEffects, "Fire")).toMatchObject({ damagePerTick: 3, sourceId: "p1" });
    expect(session.getEnergyPool("player").current).toBe(1);
  });

  it("bleeds a unit that moves and refuses to move a trapped one", () => {
    const session = createSession([withEffects(gunner, createBleed(4, 3)), brute]);
    session.start();
    expect(session.moveUnit("p1").success).toBe(true);
    expect(unitOf(session, "p1").resources.hp.current).toBe(96);

    session.applyStatusEffect("p1", createStatusEffect({ kind: "Snared", duration: 2 }));
    expect(session.moveUnit("p1").failureReason).toBe("Gunner is trapped");
  });

  it("pays for rum with grog", () => {
    const session = createSession([withHP(gunner, 50), brute]);
    session.start();
    expect(session.drinkRum("p1", "hp").failureReason).toBe("Insufficient grog: 0/1");

    session.endSideTurn();
    session.endSideTurn();
    expect(session.drinkRum("p1", "hp").success).toBe(true);
    expect(unitOf(session, "p1").resources.hp.current).toBe(70);
    expect(session.getEnergyPool("player").grog).toBe(2);
  });

  it("reports the outcome of outside status applications", () => {
    const session = createSession([gunner, brute]);
    session.start();
    expect(session.applyStatusEffect("e1", createFire(2, 2))).toBe("applied");
    expect(session.applyStatusEffect("nobody", createFire(2, 2))).toBeNull();
  });
});
