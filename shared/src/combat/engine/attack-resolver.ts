/**
 * Combat - Attack Resolver
 *
 * One attack from start to finish:
 * ammo -> counters -> focus fire -> terrain curse -> base damage
 * -> calculator -> grit -> hull -> HP & Morale -> on-hit effects -> buzz.
 *
 * Energy, turn order and legality are the caller's business.
 */

import type { TerrainProvider } from "../types/collaborators";
import type { CombatConfig } from "../types/config";
import type { AppliedDamage, DamageCalculation } from "../types/damage";
import type { CombatEvent } from "../types/events";
import type { FollowUpEffect } from "../types/follow-ups";
import type { AttackStyle, Unit } from "../types/unit";
import {
  calculateDamage,
  getAttackerModifiers,
  getBaseDamage,
  getGritDamageReduction,
  nextFocusFireState,
  roundHalfAwayFromZero,
} from "./damage-calculator";
import { getFirstActionBonus } from "./initiative";
import { applyStatusEffect, processHit } from "./status-ledger";
import { createCurse } from "./status-registry";
import { absorbWithHull, applyMoraleDamage, dealRawDamage, reduceBuzz, removeArrows } from "./unit-vitals";

export interface AttackContext {
  config: CombatConfig;
  terrain: TerrainProvider;
  /** The attacker's side won initiative this round */
  attackerHasInitiative: boolean;
}

export interface AttackOptions {
  /** Defaults to the attacker's own style */
  style?: AttackStyle;
  /** Ability strikes bring their own base damage */
  baseDamage?: number;
  /** Ability strikes do not use arrows */
  consumesAmmo?: boolean;
}

export interface AttackResolution {
  success: boolean;
  failureReason?: string;
  updatedAttacker: Unit;
  updatedTarget: Unit;
  calculation: DamageCalculation | null;
  applied: AppliedDamage | null;
  events: CombatEvent[];
  followUps: FollowUpEffect[];
  audit: string[];
}

// ═══════════════════════════════════════════════════════════════════════════
// PREPARATION (shared with previews)
// ═══════════════════════════════════════════════════════════════════════════

interface PreparedStrike {
  style: AttackStyle;
  attacker: Unit;
  target: Unit;
  baseDamage: number;
  calculation: DamageCalculation;
  events: CombatEvent[];
  audit: string[];
}

function prepareStrike(
  attacker: Unit,
  target: Unit,
  options: AttackOptions,
  context: AttackContext
): PreparedStrike {
  const { config, terrain } = context;
  const style = options.style ?? attacker.attackStyle;
  const events: CombatEvent[] = [];
  const audit: string[] = [];

  const isFirstAction = context.attackerHasInitiative && attacker.attacksThisTurn === 0;
  const firstActionBonus = isFirstAction ? getFirstActionBonus(attacker, config) : 0;

  const counted: Unit = {
    ...attacker,
    attacksThisTurn: attacker.attacksThisTurn + 1,
    comboCount: attacker.comboCount + 1,
  };

  let preparedTarget: Unit = {
    ...target,
    focusFire: nextFocusFireState(target.focusFire, attacker.id, config),
  };

  const standing = terrain.getStandingBonus(attacker);
  if (standing.appliesCurse) {
    const cursed = applyStatusEffect(preparedTarget, createCurse(config, attacker.id));
    preparedTarget = cursed.updatedUnit;
    events.push(...cursed.events);
    audit.push(...cursed.audit);
  }

  const baseDamage = options.baseDamage ?? getBaseDamage(counted, style, config);
  const calculation = calculateDamage(
    {
      baseDamage,
      isMelee: style === "melee",
      attacker: getAttackerModifiers(counted, firstActionBonus, config),
      targetLedger: preparedTarget.statusEffects,
      focusFireStacks: preparedTarget.focusFire.stacks,
      hasCover: terrain.hasCover(target),
      flatBonusHP: standing.flatBonusHP,
      flatBonusMorale: standing.flatBonusMorale,
    },
    config
  );

  return { style, attacker: counted, target: preparedTarget, baseDamage, calculation, events, audit };
}

/** What the attack would do right now, without changing anyone. */
export function previewAttack(
  attacker: Unit,
  target: Unit,
  options: AttackOptions,
  context: AttackContext
): DamageCalculation {
  return prepareStrike(attacker, target, options, context).calculation;
}

// ═══════════════════════════════════════════════════════════════════════════
// RESOLUTION
// ═══════════════════════════════════════════════════════════════════════════

export function resolveAttack(
  attacker: Unit,
  target: Unit,
  options: AttackOptions,
  context: AttackContext
): AttackResolution {
  const { config } = context;
  const style = options.style ?? attacker.attackStyle;
  const consumesAmmo = options.consumesAmmo ?? true;

  if (style === "ranged" && consumesAmmo && attacker.resources.arrows.current <= 0) {
    return {
      success: false,
      failureReason: `${attacker.name} has no arrows`,
      updatedAttacker: attacker,
      updatedTarget: target,
      calculation: null,
      applied: null,
      events: [],
      followUps: [],
      audit: [`${attacker.name}: FAILED - no arrows`],
    };
  }

  const armed = style === "ranged" && consumesAmmo ? removeArrows(attacker, 1) : attacker;
  const strike = prepareStrike(armed, target, options, context);
  const events: CombatEvent[] = [...strike.events];
  const audit: string[] = [...strike.audit, strike.calculation.breakdownText];
  let defender = strike.target;

  // Grit, then hull, on the HP side only
  let hpDamage = strike.calculation.finalHP;
  let gritReduced = 0;
  let hullAbsorbed = 0;
  if (hpDamage > 0) {
    gritReduced = roundHalfAwayFromZero(hpDamage * getGritDamageReduction(defender, config));
    hpDamage -= gritReduced;

    const hull = absorbWithHull(defender, hpDamage, config);
    defender = hull.updatedUnit;
    hullAbsorbed = hull.absorbed;
    hpDamage -= hullAbsorbed;

    if (gritReduced > 0) audit.push(`Grit: -${gritReduced}`);
    if (hullAbsorbed > 0) audit.push(`Hull absorbs ${hullAbsorbed}`);
  }

  const hpBefore = defender.resources.hp.current;
  const hpResult = dealRawDamage(defender, hpDamage, attacker.id, `${strike.style} attack`);
  defender = hpResult.updatedUnit;
  events.push(...hpResult.events);
  audit.push(hpResult.audit);

  const moraleResult = applyMoraleDamage(defender, strike.calculation.finalMorale, config, attacker.id);
  defender = moraleResult.updatedUnit;
  events.push(...moraleResult.events);
  audit.push(moraleResult.audit);

  const hit = processHit(
    defender,
    { attackerId: attacker.id, attackerTeam: attacker.team, rawDamage: strike.baseDamage, isMelee: strike.style === "melee" },
    config
  );
  defender = hit.updatedUnit;
  events.push(...hit.events);
  audit.push(...hit.audit);

  const updatedAttacker = reduceBuzz(strike.attacker, config.buzzDecayOnAttack);

  events.unshift({
    type: "attackResolved",
    attackerId: attacker.id,
    targetId: target.id,
    style: strike.style,
    hpDamage: strike.calculation.finalHP,
    moraleDamage: strike.calculation.finalMorale,
    breakdown: strike.calculation.breakdownText,
  });

  return {
    success: true,
    updatedAttacker,
    updatedTarget: defender,
    calculation: strike.calculation,
    applied: {
      calculatedHP: strike.calculation.finalHP,
      gritReduced,
      hullAbsorbed,
      hpLost: hpBefore - defender.resources.hp.current,
      moraleLost: -moraleResult.amount,
    },
    events,
    followUps: hit.followUps,
    audit,
  };
}
