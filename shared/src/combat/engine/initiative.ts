/**
 * Combat - Initiative
 *
 * Each round, the side with the larger total Speed acts first.
 * Ties go to the configured side, never to a coin flip.
 */

import type { CombatConfig } from "../types/config";
import type { InitiativeResult } from "../types/turn";
import type { Team, Unit } from "../types/unit";
import { isActive } from "../types/unit";
import { getEffectiveStat } from "./status-queries";

/** Total effective Speed of a side's units still in play. */
export function getTeamSpeed(units: readonly Unit[], team: Team): number {
  return units
    .filter((unit) => unit.team === team && isActive(unit))
    .reduce((total, unit) => total + getEffectiveStat(unit, "speed"), 0);
}

export function resolveInitiative(units: readonly Unit[], config: CombatConfig): InitiativeResult {
  const playerTotal = getTeamSpeed(units, "player");
  const enemyTotal = getTeamSpeed(units, "enemy");
  const isTie = playerTotal === enemyTotal;

  let firstSide: Team;
  if (isTie) {
    firstSide = config.initiativeTieBreak;
  } else {
    firstSide = playerTotal > enemyTotal ? "player" : "enemy";
  }

  return { playerTotal, enemyTotal, firstSide, isTie };
}

/**
 * Damage bonus on the opening attack of a unit whose side won initiative.
 * min(cap, Speed × rate)
 */
export function getFirstActionBonus(unit: Unit, config: CombatConfig): number {
  return Math.min(config.firstActionBonusCap, getEffectiveStat(unit, "speed") * config.firstActionBonusPerSpeed);
}
