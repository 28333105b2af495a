/**
 * Combat - Turn & Round Types
 */

import type { Team } from "./unit";

export interface InitiativeResult {
  playerTotal: number;
  enemyTotal: number;
  firstSide: Team;
  isTie: boolean;
}

export type TurnPhase = "roundStart" | "sideActing" | "battleEnded";

export interface TurnState {
  /** 0 before the first round begins */
  round: number;
  phase: TurnPhase;
  actingSide: Team | null;
  /** Both sides, initiative winner first */
  sideOrder: readonly Team[];
  /** Sides that have finished their turn this round */
  sidesCompleted: readonly Team[];
  initiative: InitiativeResult | null;
  /** Unit ids that have attacked or used an ability this side-turn */
  actedUnitIds: readonly string[];
  winner: Team | null;
}
