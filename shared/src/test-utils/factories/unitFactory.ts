/**
 * Unit Factory for Combat Testing
 *
 * Creates plain Unit objects with sensible defaults: 100 HP, 100 Morale,
 * no stats, no hull, a full quiver.
 */

import type { StatusEffectInstance, Unit, UnitStats } from "@shared/combat/types";

let unitCounter = 0;

/**
 * Reset the unit counter (call in beforeEach)
 */
export function resetUnitCounter(): void {
  unitCounter = 0;
}

export interface TestUnitOverrides extends Partial<Omit<Unit, "stats">> {
  stats?: Partial<UnitStats>;
}

/**
 * Create a unit. Override any field via the overrides parameter;
 * `stats` merges onto all-zero stats.
 */
export function createTestUnit(overrides: TestUnitOverrides = {}): Unit {
  const n = ++unitCounter;
  const { stats, ...rest } = overrides;

  return {
    id: `unit-${n}`,
    name: `Unit ${n}`,
    role: null,
    team: "player",
    attackStyle: "melee",
    resources: {
      hp: { current: 100, max: 100 },
      morale: { current: 100, max: 100 },
      buzz: { current: 0, max: 100 },
      arrows: { current: 10, max: 10 },
      hull: { current: 0, max: 0 },
    },
    flags: { stunned: false, trapped: false, surrendered: false },
    alive: true,
    stunTurnsRemaining: 0,
    statusEffects: [],
    focusFire: { attackerId: null, stacks: 0 },
    attacksThisTurn: 0,
    comboCount: 0,
    ...rest,
    stats: {
      power: 0,
      aim: 0,
      tactics: 0,
      speed: 0,
      grit: 0,
      hull: 0,
      proficiency: 0,
      skill: 0,
      ...stats,
    },
  };
}

export function createEnemyUnit(overrides: TestUnitOverrides = {}): Unit {
  return createTestUnit({ team: "enemy", ...overrides });
}

/** Shortcut for a unit already carrying some effects. */
export function withEffects(unit: Unit, ...effects: StatusEffectInstance[]): Unit {
  return { ...unit, statusEffects: [...unit.statusEffects, ...effects] };
}

export function withHP(unit: Unit, current: number, max = unit.resources.hp.max): Unit {
  return { ...unit, resources: { ...unit.resources, hp: { current, max } } };
}

export function withMorale(unit: Unit, current: number, max = unit.resources.morale.max): Unit {
  return { ...unit, resources: { ...unit.resources, morale: { current, max } } };
}
