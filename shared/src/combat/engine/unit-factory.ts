/**
 * Combat - Unit Factory
 *
 * Builds battle-ready units from roster templates.
 */

import { randomUUID } from "crypto";
import type { CombatConfig } from "../types/config";
import type { StatusEffectSpec } from "../types/status-effects";
import type { AttackStyle, Team, Unit, UnitStats } from "../types/unit";
import { applyStatusEffect } from "./status-ledger";
import { createStatusEffect } from "./status-registry";

// ═══════════════════════════════════════════════════════════════════════════
// INPUT TYPES (from roster content)
// ═══════════════════════════════════════════════════════════════════════════

export interface UnitTemplate {
  id?: string;
  name: string;
  role?: string;
  team: Team;
  attackStyle?: AttackStyle;
  stats?: Partial<UnitStats>;
  maxHP: number;
  maxMorale: number;
  maxArrows?: number;
  /** Relic and passive effects the unit starts the battle with */
  startingEffects?: StatusEffectSpec[];
}

export const EMPTY_STATS: UnitStats = {
  power: 0,
  aim: 0,
  tactics: 0,
  speed: 0,
  grit: 0,
  hull: 0,
  proficiency: 0,
  skill: 0,
};

export function generateUnitId(): string {
  return randomUUID();
}

/**
 * Create a unit at full HP, Morale, Hull and Arrows.
 * Hull points come from the Hull stat (hullPerPoint each).
 */
export function createUnit(template: UnitTemplate, config: CombatConfig): Unit {
  const stats: UnitStats = { ...EMPTY_STATS, ...template.stats };
  const maxHull = stats.hull * config.hullPerPoint;
  const maxArrows = template.maxArrows ?? config.defaultMaxArrows;

  let unit: Unit = {
    id: template.id ?? generateUnitId(),
    name: template.name,
    role: template.role ?? null,
    team: template.team,
    attackStyle: template.attackStyle ?? "melee",
    stats,
    resources: {
      hp: { current: template.maxHP, max: template.maxHP },
      morale: { current: template.maxMorale, max: template.maxMorale },
      buzz: { current: 0, max: config.maxBuzz },
      arrows: { current: maxArrows, max: maxArrows },
      hull: { current: maxHull, max: maxHull },
    },
    flags: { stunned: false, trapped: false, surrendered: false },
    alive: true,
    stunTurnsRemaining: 0,
    statusEffects: [],
    focusFire: { attackerId: null, stacks: 0 },
    attacksThisTurn: 0,
    comboCount: 0,
  };

  for (const spec of template.startingEffects ?? []) {
    unit = applyStatusEffect(unit, createStatusEffect(spec, unit.id)).updatedUnit;
  }

  return unit;
}
