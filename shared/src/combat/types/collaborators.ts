/**
 * Combat - Collaborator Interfaces
 *
 * Boundaries to the systems around the combat core. The core calls these
 * synchronously and never reaches for a unit, a pool or a tile any other way.
 */

import type { Team, Unit } from "./unit";

/** Enumerates the units still in play. */
export interface UnitProvider {
  getActiveUnits(team: Team): readonly Unit[];
}

/**
 * A side's energy pool as seen by the core. `trySpend` either deducts the
 * full amount and returns true, or changes nothing and returns false.
 */
export interface EnergyCollaborator {
  readonly current: number;
  trySpend(amount: number): boolean;
  refund(amount: number): void;
}

export interface StandingBonus {
  flatBonusHP: number;
  flatBonusMorale: number;
  /** Attacker stands on a cursed tile: its target gets Cursed before the hit */
  appliesCurse: boolean;
}

export const NO_STANDING_BONUS: StandingBonus = {
  flatBonusHP: 0,
  flatBonusMorale: 0,
  appliesCurse: false,
};

/** Position/terrain layer. */
export interface TerrainProvider {
  hasCover(unit: Unit): boolean;
  getStandingBonus(unit: Unit): StandingBonus;
}

export const OPEN_GROUND: TerrainProvider = {
  hasCover: () => false,
  getStandingBonus: () => NO_STANDING_BONUS,
};
