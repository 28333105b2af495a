/**
 * Combat - Unit Types
 *
 * One combatant on the field: stats, resource pools, flags and the
 * status ledger it owns.
 */

import type { StatusLedger } from "./status-effects";

// ═══════════════════════════════════════════════════════════════════════════
// CLASSIFICATION
// ═══════════════════════════════════════════════════════════════════════════

export type Team = "player" | "enemy";

export type AttackStyle = "melee" | "ranged";

export const TEAMS: readonly Team[] = ["player", "enemy"];

export function getOpposingTeam(team: Team): Team {
  return team === "player" ? "enemy" : "player";
}

// ═══════════════════════════════════════════════════════════════════════════
// STATS & RESOURCES
// ═══════════════════════════════════════════════════════════════════════════

export type StatKey =
  | "power"
  | "aim"
  | "tactics"
  | "speed"
  | "grit"
  | "hull"
  | "proficiency"
  | "skill";

export const STAT_KEYS: readonly StatKey[] = [
  "power",
  "aim",
  "tactics",
  "speed",
  "grit",
  "hull",
  "proficiency",
  "skill",
];

export type UnitStats = Record<StatKey, number>;

export interface ResourcePool {
  current: number;
  max: number;
}

export interface UnitResources {
  hp: ResourcePool;
  morale: ResourcePool;
  /** Drunkenness; at max the unit fights with a damage penalty */
  buzz: ResourcePool;
  arrows: ResourcePool;
  /** Armour points derived from the Hull stat */
  hull: ResourcePool;
}

export interface UnitFlags {
  stunned: boolean;
  trapped: boolean;
  /** Terminal. Never cleared once set. */
  surrendered: boolean;
}

export interface FocusFireState {
  attackerId: string | null;
  stacks: number;
}

// ═══════════════════════════════════════════════════════════════════════════
// UNIT
// ═══════════════════════════════════════════════════════════════════════════

export interface Unit {
  id: string;
  name: string;
  role: string | null;
  team: Team;
  attackStyle: AttackStyle;
  stats: UnitStats;
  resources: UnitResources;
  flags: UnitFlags;
  alive: boolean;
  stunTurnsRemaining: number;
  statusEffects: StatusLedger;
  /** Consecutive hits taken from the same attacker */
  focusFire: FocusFireState;
  attacksThisTurn: number;
  comboCount: number;
}

/** Alive and still fighting. Surrendered units are out of play. */
export function isActive(unit: Unit): boolean {
  return unit.alive && !unit.flags.surrendered;
}

export function canAct(unit: Unit): boolean {
  return isActive(unit) && !unit.flags.stunned;
}

export function getPoolPercent(pool: ResourcePool): number {
  return pool.max > 0 ? pool.current / pool.max : 0;
}

export function clampPool(pool: ResourcePool, value: number): ResourcePool {
  return { ...pool, current: Math.max(0, Math.min(pool.max, value)) };
}
