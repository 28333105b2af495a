/**
 * Combat - Turn Manager
 *
 * Round and side-turn state machine:
 *
 *   roundStart -> sideActing(first) -> sideActing(second) -> roundStart (+1)
 *
 * Any state moves to battleEnded once a side has nobody left standing.
 * The machine decides who acts, never what they do.
 */

import type { CombatConfig } from "../types/config";
import type { InitiativeResult, TurnState } from "../types/turn";
import type { Team, Unit } from "../types/unit";
import { getOpposingTeam, isActive } from "../types/unit";
import { resolveInitiative } from "./initiative";
import { hasStatusEffect } from "./status-queries";
import type { LedgerResult } from "./status-ledger";
import { processTurnEnd, processTurnStart } from "./status-ledger";
import { reduceBuzz } from "./unit-vitals";

// ═══════════════════════════════════════════════════════════════════════════
// STATE
// ═══════════════════════════════════════════════════════════════════════════

export function createTurnState(): TurnState {
  return {
    round: 0,
    phase: "roundStart",
    actingSide: null,
    sideOrder: [],
    sidesCompleted: [],
    initiative: null,
    actedUnitIds: [],
    winner: null,
  };
}

export interface BattleEndCheck {
  ended: boolean;
  /** null on a mutual wipe */
  winner: Team | null;
}

export function checkBattleEnd(units: readonly Unit[]): BattleEndCheck {
  const playerStanding = units.some((unit) => unit.team === "player" && isActive(unit));
  const enemyStanding = units.some((unit) => unit.team === "enemy" && isActive(unit));

  if (playerStanding && enemyStanding) return { ended: false, winner: null };
  if (playerStanding) return { ended: true, winner: "player" };
  if (enemyStanding) return { ended: true, winner: "enemy" };
  return { ended: true, winner: null };
}

export function endBattle(state: TurnState, winner: Team | null): TurnState {
  return { ...state, phase: "battleEnded", actingSide: null, winner };
}

// ═══════════════════════════════════════════════════════════════════════════
// ROUND FLOW
// ═══════════════════════════════════════════════════════════════════════════

export interface BeginRoundResult {
  newState: TurnState;
  initiative: InitiativeResult;
}

/**
 * Open the next round: bump the counter, order the sides by initiative
 * and hand the turn to the winner.
 */
export function beginRound(state: TurnState, units: readonly Unit[], config: CombatConfig): BeginRoundResult {
  const initiative = resolveInitiative(units, config);
  const sideOrder = [initiative.firstSide, getOpposingTeam(initiative.firstSide)];

  return {
    initiative,
    newState: {
      ...state,
      round: state.round + 1,
      phase: "sideActing",
      actingSide: initiative.firstSide,
      sideOrder,
      sidesCompleted: [],
      initiative,
      actedUnitIds: [],
    },
  };
}

export interface EndSideTurnResult {
  newState: TurnState;
  /** Side acting next this round, or null when the round is over */
  nextSide: Team | null;
  roundComplete: boolean;
}

/** Close the acting side's turn and pass to the other side, or finish the round. */
export function endSideTurn(state: TurnState): EndSideTurnResult {
  if (state.phase !== "sideActing" || state.actingSide === null) {
    return { newState: state, nextSide: null, roundComplete: false };
  }

  const sidesCompleted = [...state.sidesCompleted, state.actingSide];
  const nextSide = state.sideOrder.find((side) => !sidesCompleted.includes(side)) ?? null;

  if (nextSide === null) {
    return {
      newState: { ...state, phase: "roundStart", actingSide: null, sidesCompleted, actedUnitIds: [] },
      nextSide: null,
      roundComplete: true,
    };
  }

  return {
    newState: { ...state, actingSide: nextSide, sidesCompleted, actedUnitIds: [] },
    nextSide,
    roundComplete: false,
  };
}

export function markUnitActed(state: TurnState, unitId: string): TurnState {
  if (state.actedUnitIds.includes(unitId)) return state;
  return { ...state, actedUnitIds: [...state.actedUnitIds, unitId] };
}

export function hasUnitActed(state: TurnState, unitId: string): boolean {
  return state.actedUnitIds.includes(unitId);
}

/** Whether this side won initiative for the current round. */
export function hasInitiative(state: TurnState, team: Team): boolean {
  return state.initiative?.firstSide === team;
}

// ═══════════════════════════════════════════════════════════════════════════
// PER-UNIT TURN HOOKS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * A unit's side begins its turn. Counters and focus fire reset, buzz
 * wears off a little, then the ledger runs its turn-start pass. Trapped
 * holds only while a Snare is still on the unit afterwards.
 */
export function startUnitTurn(unit: Unit, config: CombatConfig): LedgerResult {
  if (!isActive(unit)) {
    return { updatedUnit: unit, events: [], followUps: [], audit: [] };
  }

  const reset: Unit = {
    ...reduceBuzz(unit, config.buzzDecayPerTurn),
    attacksThisTurn: 0,
    comboCount: 0,
    focusFire: { attackerId: null, stacks: 0 },
  };

  const result = processTurnStart(reset, config);
  const trapped = hasStatusEffect(result.updatedUnit.statusEffects, "Snared");
  return {
    ...result,
    updatedUnit: { ...result.updatedUnit, flags: { ...result.updatedUnit.flags, trapped } },
  };
}

export function endUnitTurn(unit: Unit): LedgerResult {
  return processTurnEnd(unit);
}
