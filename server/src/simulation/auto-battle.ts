// Runs a battle to completion with a simple greedy policy for both sides:
// drink rum when badly hurt, use the first affordable ability, otherwise
// attack the weakest enemy.

import type { ActionResult, AbilityDefinition, BattleSession } from "@shared/combat/engine";
import { getAbilityEnergyCost, getTeamsInPlay } from "@shared/combat/engine";
import type { CombatConfig, Team, Unit } from "@shared/combat/types";
import { getOpposingTeam, isActive } from "@shared/combat/types";

export interface AutoBattleOptions {
  config: CombatConfig;
  /** Abilities a unit may use, in order of preference */
  abilitiesFor?: (unitId: string) => readonly AbilityDefinition[];
  maxRounds?: number;
  /** Units below this HP fraction drink rum when the side has grog */
  rumThreshold?: number;
  onAudit?: (lines: readonly string[]) => void;
  onFailure?: (reason: string) => void;
}

export interface AutoBattleResult {
  winner: Team | null;
  rounds: number;
  stalemate: boolean;
  survivors: Team[];
}

const DEFAULT_MAX_ROUNDS = 50;
const DEFAULT_RUM_THRESHOLD = 0.4;

const hpFraction = (unit: Unit): number =>
  unit.resources.hp.max > 0 ? unit.resources.hp.current / unit.resources.hp.max : 0;

/** Lowest current HP wins; roster order breaks ties. */
export function pickWeakest(units: readonly Unit[]): Unit | null {
  let weakest: Unit | null = null;
  for (const unit of units) {
    if (!weakest || unit.resources.hp.current < weakest.resources.hp.current) {
      weakest = unit;
    }
  }
  return weakest;
}

function pickMostWounded(units: readonly Unit[]): Unit | null {
  let wounded: Unit | null = null;
  for (const unit of units) {
    if (!wounded || hpFraction(unit) < hpFraction(wounded)) {
      wounded = unit;
    }
  }
  return wounded;
}

function abilityTarget(session: BattleSession, actor: Unit, ability: AbilityDefinition): Unit | null {
  switch (ability.targeting) {
    case "enemy":
      return pickWeakest(session.getActiveUnits(getOpposingTeam(actor.team)));
    case "ally": {
      const wounded = pickMostWounded(session.getActiveUnits(actor.team));
      return wounded && hpFraction(wounded) < 1 ? wounded : null;
    }
    case "self":
      return actor;
  }
}

function report(result: ActionResult, options: AutoBattleOptions): boolean {
  if (result.success) {
    options.onAudit?.(result.audit);
  } else {
    options.onFailure?.(result.failureReason ?? "action failed");
  }
  return result.success;
}

function takeUnitTurn(session: BattleSession, unitId: string, options: AutoBattleOptions): void {
  const actor = session.getUnit(unitId);
  if (!actor || !isActive(actor) || actor.flags.stunned) return;

  const pool = session.getEnergyPool(actor.team);
  const threshold = options.rumThreshold ?? DEFAULT_RUM_THRESHOLD;
  if (hpFraction(actor) < threshold && pool.grog >= options.config.rumGrogCost) {
    report(session.drinkRum(actor.id, "hp"), options);
  }

  for (const ability of options.abilitiesFor?.(actor.id) ?? []) {
    if (getAbilityEnergyCost(actor, ability) > session.getEnergyPool(actor.team).current) continue;
    const target = abilityTarget(session, actor, ability);
    if (!target) continue;
    if (report(session.useAbility(actor.id, target.id, ability), options)) return;
  }

  if (session.getEnergyPool(actor.team).current < options.config.attackEnergyCost) return;
  if (actor.attackStyle === "ranged" && actor.resources.arrows.current <= 0) return;

  const target = pickWeakest(session.getActiveUnits(getOpposingTeam(actor.team)));
  if (target) {
    report(session.attack(actor.id, target.id), options);
  }
}

export function runAutoBattle(session: BattleSession, options: AutoBattleOptions): AutoBattleResult {
  const maxRounds = options.maxRounds ?? DEFAULT_MAX_ROUNDS;
  session.start();

  while (!session.isOver) {
    const { round, actingSide } = session.turnState;
    if (round > maxRounds || actingSide === null) {
      return { winner: null, rounds: maxRounds, stalemate: true, survivors: getTeamsInPlay(session) };
    }

    for (const unit of session.getActiveUnits(actingSide)) {
      if (session.isOver) break;
      takeUnitTurn(session, unit.id, options);
    }

    if (!session.isOver) {
      report(session.endSideTurn(), options);
    }
  }

  return {
    winner: session.turnState.winner,
    rounds: session.turnState.round,
    stalemate: false,
    survivors: getTeamsInPlay(session),
  };
}
