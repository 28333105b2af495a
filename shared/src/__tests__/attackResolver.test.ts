import { beforeEach, describe, expect, it } from "vitest";
import type { AttackContext } from "@shared/combat/engine/attack-resolver";
import { previewAttack, resolveAttack } from "@shared/combat/engine/attack-resolver";
import { applyStatusEffect } from "@shared/combat/engine/status-ledger";
import { getCurseCharges, getStatusEffect, hasStatusEffect } from "@shared/combat/engine/status-queries";
import { createMarked, createReflect } from "@shared/combat/engine/status-registry";
import type { TerrainProvider } from "@shared/combat/types/collaborators";
import { NO_STANDING_BONUS, OPEN_GROUND } from "@shared/combat/types/collaborators";
import { createCombatConfig } from "@shared/combat/types/config";
import type { Unit } from "@shared/combat/types/unit";
import {
  createEnemyUnit,
  createTestUnit,
  resetUnitCounter,
  withEffects,
  withHP,
} from "../test-utils/factories/unitFactory";

const config = createCombatConfig();
const context: AttackContext = { config, terrain: OPEN_GROUND, attackerHasInitiative: false };

let gunner: Unit;
let target: Unit;

beforeEach(() => {
  resetUnitCounter();
  gunner = createTestUnit({ id: "gunner", stats: { power: 30 } });
  target = createEnemyUnit({ id: "target" });
});

describe("resolveAttack", () => {
  it("resolves a plain melee hit end to end", () => {
    const result = resolveAttack(gunner, target, {}, context);

    expect(result.success).toBe(true);
    expect(result.updatedTarget.resources.hp.current).toBe(87);
    expect(result.updatedTarget.resources.morale.current).toBe(86);
    expect(result.events[0]).toEqual({
      type: "attackResolved",
      attackerId: "gunner",
      targetId: "target",
      style: "melee",
      hpDamage: 13,
      moraleDamage: 14,
      breakdown: "HP: 13 Base = 13 | Morale: 13 Base +10%(Melee) = 14",
    });
    expect(result.updatedAttacker.attacksThisTurn).toBe(1);
    expect(result.updatedTarget.focusFire).toEqual({ attackerId: "gunner", stacks: 1 });
  });

  it("chains a combo on the attacker's second hit", () => {
    const first = resolveAttack(gunner, target, {}, context);
    const second = resolveAttack(first.updatedAttacker, first.updatedTarget, {}, context);

    expect(second.calculation?.hpBreakdown).toBe("13 Base x1.05(Combo)");
    expect(second.calculation?.finalHP).toBe(14);
    expect(second.calculation?.finalMorale).toBe(17);
    expect(second.updatedTarget.focusFire.stacks).toBe(2);
  });

  it("adds the first action bonus only for the side holding initiative", () => {
    const quick = { ...gunner, stats: { ...gunner.stats, speed: 50 } };
    const result = resolveAttack(quick, target, {}, { ...context, attackerHasInitiative: true });

    expect(result.calculation?.hpBreakdown).toBe("13 Base +10%(FirstAction)");
    expect(result.calculation?.finalHP).toBe(14);
    expect(result.calculation?.finalMorale).toBe(16);

    const again = resolveAttack(result.updatedAttacker, result.updatedTarget, {}, { ...context, attackerHasInitiative: true });
    expect(again.calculation?.hpBreakdown).not.toContain("FirstAction");
  });

  it("takes grit and hull off the HP damage", () => {
    const tough = {
      ...target,
      stats: { ...target.stats, grit: 20 },
      resources: { ...target.resources, hull: { current: 20, max: 20 } },
    };
    const result = resolveAttack(gunner, tough, {}, context);

    expect(result.applied).toEqual({
      calculatedHP: 13,
      gritReduced: 1,
      hullAbsorbed: 6,
      hpLost: 6,
      moraleLost: 14,
    });
    expect(result.updatedTarget.resources.hull.current).toBe(14);
    expect(result.updatedTarget.resources.hp.current).toBe(94);
  });

  it("consumes a double Marked stack on a killing blow", () => {
    const once = applyStatusEffect(withHP(target, 10), createMarked(0.3, 2)).updatedUnit;
    const marked = applyStatusEffect(once, createMarked(0.3, 2)).updatedUnit;
    expect(getStatusEffect(marked.statusEffects, "Marked")?.stacks).toBe(2);

    const result = resolveAttack(gunner, marked, {}, context);

    expect(result.calculation?.finalHP).toBe(21);
    expect(result.updatedTarget.alive).toBe(false);
    expect(result.applied?.hpLost).toBe(10);
    expect(hasStatusEffect(result.updatedTarget.statusEffects, "Marked")).toBe(false);
    expect(result.events.map((event) => event.type)).toEqual([
      "attackResolved",
      "unitDamaged",
      "unitDied",
      "statusRemoved",
    ]);
  });

  it("spends an arrow on ranged attacks and refuses with an empty quiver", () => {
    const archer = createTestUnit({ id: "archer", name: "Archer", attackStyle: "ranged" });
    const shot = resolveAttack(archer, target, {}, context);
    expect(shot.updatedAttacker.resources.arrows.current).toBe(9);
    expect(shot.calculation?.finalHP).toBe(9);
    expect(shot.calculation?.finalMorale).toBe(8);

    const empty = { ...archer, resources: { ...archer.resources, arrows: { current: 0, max: 10 } } };
    const refused = resolveAttack(empty, target, {}, context);
    expect(refused.success).toBe(false);
    expect(refused.failureReason).toBe("Archer has no arrows");
    expect(refused.updatedTarget).toBe(target);
  });

  it("curses the target from cursed ground before the damage lands", () => {
    const cursedGround: TerrainProvider = {
      hasCover: () => false,
      getStandingBonus: () => ({ ...NO_STANDING_BONUS, appliesCurse: true }),
    };
    const result = resolveAttack(gunner, target, {}, { ...context, terrain: cursedGround });

    expect(result.calculation?.finalHP).toBe(20);
    expect(getCurseCharges(result.updatedTarget.statusEffects)).toBe(1);
  });

  it("returns reflected damage as a follow-up on the raw base damage", () => {
    const mirrored = withEffects(target, createReflect(1, config));
    const result = resolveAttack(gunner, mirrored, {}, context);

    expect(result.followUps).toEqual([
      { type: "rawDamage", targetId: "gunner", amount: 7, sourceId: "target", cause: "Reflecting" },
    ]);
    expect(hasStatusEffect(result.updatedTarget.statusEffects, "Reflecting")).toBe(false);
  });

  it("sobers the attacker a little with every swing", () => {
    const buzzed = { ...gunner, resources: { ...gunner.resources, buzz: { current: 50, max: 100 } } };
    expect(resolveAttack(buzzed, target, {}, context).updatedAttacker.resources.buzz.current).toBe(25);
  });
});

describe("previewAttack", () => {
  it("matches the resolved numbers without touching either unit", () => {
    const preview = previewAttack(gunner, target, {}, context);
    expect(preview.finalHP).toBe(13);
    expect(preview.finalMorale).toBe(14);
    expect(target.resources.hp.current).toBe(100);
  });
});
