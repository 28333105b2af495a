/**
 * Combat - Damage Calculator
 *
 * Pure damage pipeline. Every attack resolves into HP damage and Morale
 * damage computed from the same base value; nothing here touches a unit,
 * so UI previews can call it freely.
 *
 * HP:     1.0 (+first action, ×combo) -cover ±modifiers +marked
 *         × type (ranged) × curse × exposed -> round -> +flat bonus
 * Morale: 1.0 (+first action, ×combo) -cover ±morale modifiers
 *         × type (melee) × focus fire × exposed -> round -> +flat bonus
 */

import type { CombatConfig } from "../types/config";
import type { AttackerModifiers, DamageCalculation, DamageInput } from "../types/damage";
import type { AttackStyle, FocusFireState, Unit } from "../types/unit";
import { getPoolPercent } from "../types/unit";
import {
  getCurseMultiplier,
  getDamageModifier,
  getEffectiveStat,
  getMarkedBonus,
  hasStatusEffect,
  isExposed,
} from "./status-queries";
import { isTooDrunk } from "./unit-vitals";

// ═══════════════════════════════════════════════════════════════════════════
// ROUNDING & FORMATTING
// ═══════════════════════════════════════════════════════════════════════════

/** 2.5 -> 3, -2.5 -> -3 */
export function roundHalfAwayFromZero(value: number): number {
  return Math.sign(value) * Math.round(Math.abs(value));
}

function formatPercent(fraction: number): string {
  const percent = roundHalfAwayFromZero(fraction * 100);
  return `${percent >= 0 ? "+" : ""}${percent}%`;
}

function formatMultiplier(multiplier: number): string {
  return `x${multiplier.toFixed(2).replace(/0$/, "")}`;
}

// ═══════════════════════════════════════════════════════════════════════════
// MAIN PIPELINE
// ═══════════════════════════════════════════════════════════════════════════

export function calculateDamage(input: DamageInput, config: CombatConfig): DamageCalculation {
  const { baseDamage, isMelee, attacker, targetLedger } = input;

  // ─── HP ───
  const hpParts: string[] = [`${baseDamage} Base`];
  let hpMod = 1;

  if (attacker.firstActionBonus > 0) {
    hpMod += attacker.firstActionBonus;
    hpParts.push(`${formatPercent(attacker.firstActionBonus)}(FirstAction)`);
  }
  if (attacker.comboMultiplier !== 1) {
    hpMod *= attacker.comboMultiplier;
    hpParts.push(`${formatMultiplier(attacker.comboMultiplier)}(Combo)`);
  }
  if (input.hasCover) {
    hpMod -= config.coverReduction;
    hpParts.push(`${formatPercent(-config.coverReduction)}(Cover)`);
  }
  if (attacker.outgoingHPPercent !== 0) {
    hpMod += attacker.outgoingHPPercent;
    hpParts.push(`${formatPercent(attacker.outgoingHPPercent)}(Outgoing)`);
  }

  const incoming = getDamageModifier(targetLedger, "incomingHP");
  if (incoming !== 0) {
    hpMod += incoming;
    hpParts.push(`${formatPercent(incoming)}(Incoming)`);
  }

  const marked = getMarkedBonus(targetLedger);
  if (marked !== 0) {
    hpMod += marked;
    hpParts.push(`${formatPercent(marked)}(Marked)`);
  }

  if (!isMelee) {
    const rangedShield = getDamageModifier(targetLedger, "incomingRanged");
    if (rangedShield !== 0) {
      hpMod += rangedShield;
      hpParts.push(`${formatPercent(rangedShield)}(RangedShield)`);
    }
  }

  const hpTypeMultiplier = isMelee ? 1 : config.rangedHPMultiplier;
  if (hpTypeMultiplier !== 1) {
    hpParts.push(`${formatPercent(hpTypeMultiplier - 1)}(Ranged)`);
  }

  const curseMultiplier = getCurseMultiplier(targetLedger);
  if (curseMultiplier !== 1) {
    hpParts.push(`${formatMultiplier(curseMultiplier)}(Curse)`);
  }

  const exposedMultiplier = isExposed(targetLedger) ? config.exposedDamageMultiplier : 1;
  if (exposedMultiplier !== 1) {
    hpParts.push(`${formatPercent(exposedMultiplier - 1)}(Exposed)`);
  }

  const hpMultiplier = hpMod * hpTypeMultiplier * curseMultiplier * exposedMultiplier;
  const finalHP = roundHalfAwayFromZero(baseDamage * hpMultiplier) + input.flatBonusHP;
  if (input.flatBonusHP !== 0) {
    hpParts.push(`${input.flatBonusHP >= 0 ? "+" : ""}${input.flatBonusHP}(Terrain)`);
  }

  // ─── Morale ───
  const moraleParts: string[] = [`${baseDamage} Base`];
  let moraleMod = 1;

  if (attacker.firstActionBonus > 0) {
    moraleMod += attacker.firstActionBonus;
    moraleParts.push(`${formatPercent(attacker.firstActionBonus)}(FirstAction)`);
  }
  if (attacker.comboMultiplier !== 1) {
    moraleMod *= attacker.comboMultiplier;
    moraleParts.push(`${formatMultiplier(attacker.comboMultiplier)}(Combo)`);
  }
  if (input.hasCover) {
    moraleMod -= config.coverReduction;
    moraleParts.push(`${formatPercent(-config.coverReduction)}(Cover)`);
  }
  if (attacker.outgoingMoralePercent !== 0) {
    moraleMod += attacker.outgoingMoralePercent;
    moraleParts.push(`${formatPercent(attacker.outgoingMoralePercent)}(Outgoing)`);
  }

  const incomingMorale = getDamageModifier(targetLedger, "incomingMorale");
  if (incomingMorale !== 0) {
    moraleMod += incomingMorale;
    moraleParts.push(`${formatPercent(incomingMorale)}(Incoming)`);
  }

  const moraleTypeMultiplier = isMelee ? config.meleeMoraleMultiplier : 1;
  if (moraleTypeMultiplier !== 1) {
    moraleParts.push(`${formatPercent(moraleTypeMultiplier - 1)}(Melee)`);
  }

  const focusFireBonus = hasStatusEffect(targetLedger, "Unflinching")
    ? 0
    : getFocusFireBonus(input.focusFireStacks, config);
  if (focusFireBonus !== 0) {
    moraleParts.push(`${formatPercent(focusFireBonus)}(FocusFire x${input.focusFireStacks})`);
  }

  if (exposedMultiplier !== 1) {
    moraleParts.push(`${formatPercent(exposedMultiplier - 1)}(Exposed)`);
  }

  const moraleMultiplier = moraleMod * moraleTypeMultiplier * (1 + focusFireBonus) * exposedMultiplier;
  const finalMorale = roundHalfAwayFromZero(baseDamage * moraleMultiplier) + input.flatBonusMorale;
  if (input.flatBonusMorale !== 0) {
    moraleParts.push(`${input.flatBonusMorale >= 0 ? "+" : ""}${input.flatBonusMorale}(Terrain)`);
  }

  const hpBreakdown = hpParts.join(" ");
  const moraleBreakdown = moraleParts.join(" ");

  return {
    finalHP,
    finalMorale,
    hpMultiplier,
    moraleMultiplier,
    hpBreakdown,
    moraleBreakdown,
    breakdownText: `HP: ${hpBreakdown} = ${finalHP} | Morale: ${moraleBreakdown} = ${finalMorale}`,
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// BASE DAMAGE
// ═══════════════════════════════════════════════════════════════════════════

function applyDrunkPenalty(attacker: Unit, damage: number, config: CombatConfig): number {
  if (!isTooDrunk(attacker) || hasStatusEffect(attacker.statusEffects, "SteadyHands")) {
    return damage;
  }
  return roundHalfAwayFromZero(damage * config.drunkDamageMultiplier);
}

/** floor × (1 + Power × scaling), then the drunk penalty. */
export function getMeleeBaseDamage(attacker: Unit, config: CombatConfig): number {
  const power = getEffectiveStat(attacker, "power");
  const scaled = roundHalfAwayFromZero(config.meleeBaseDamage * (1 + power * config.powerScalingPercent));
  return applyDrunkPenalty(attacker, scaled, config);
}

/** floor × (1 + Aim × scaling), then the drunk penalty. */
export function getRangedBaseDamage(attacker: Unit, config: CombatConfig): number {
  const aim = getEffectiveStat(attacker, "aim");
  const scaled = roundHalfAwayFromZero(config.rangedBaseDamage * (1 + aim * config.aimScalingPercent));
  return applyDrunkPenalty(attacker, scaled, config);
}

export function getBaseDamage(attacker: Unit, style: AttackStyle, config: CombatConfig): number {
  return style === "melee" ? getMeleeBaseDamage(attacker, config) : getRangedBaseDamage(attacker, config);
}

// ═══════════════════════════════════════════════════════════════════════════
// ATTACKER MODIFIERS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Chained attacks in one turn hit harder. Each link past the first adds a
 * Skill-scaled step, clamped to [comboStepMin, comboStepMax].
 */
export function getComboMultiplier(skill: number, comboCount: number, config: CombatConfig): number {
  const links = Math.min(comboCount, config.maxComboChain);
  if (links <= 1) return 1;
  const step = Math.min(config.comboStepMax, Math.max(config.comboStepMin, skill * config.comboSkillMultiplier));
  return 1 + (links - 1) * step;
}

export function getAttackerModifiers(
  attacker: Unit,
  firstActionBonus: number,
  config: CombatConfig
): AttackerModifiers {
  return {
    firstActionBonus,
    comboMultiplier: getComboMultiplier(getEffectiveStat(attacker, "skill"), attacker.comboCount, config),
    outgoingHPPercent: getDamageModifier(attacker.statusEffects, "outgoingHP"),
    outgoingMoralePercent: getDamageModifier(attacker.statusEffects, "outgoingMorale"),
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// DEFENDER MODIFIERS
// ═══════════════════════════════════════════════════════════════════════════

/** Bonus for the stack count, clamped to the last entry of the table. */
export function getFocusFireBonus(stacks: number, config: CombatConfig): number {
  const table = config.focusFireBonuses;
  const index = Math.max(0, Math.min(table.length - 1, stacks));
  return table[index] ?? 0;
}

/**
 * Focus fire after one more hit from `attackerId`: the same attacker adds a
 * stack (capped at the table's last index), a new attacker starts over at 1.
 */
export function nextFocusFireState(
  current: FocusFireState,
  attackerId: string,
  config: CombatConfig
): FocusFireState {
  if (current.attackerId !== attackerId) {
    return { attackerId, stacks: 1 };
  }
  const maxStacks = Math.max(1, config.focusFireBonuses.length - 1);
  return { attackerId, stacks: Math.min(maxStacks, current.stacks + 1) };
}

/**
 * Fraction of incoming HP damage shrugged off through Grit. Grows as the
 * unit gets hurt and while its morale holds; capped by gritReductionCap.
 */
export function getGritDamageReduction(unit: Unit, config: CombatConfig): number {
  const grit = getEffectiveStat(unit, "grit");
  if (grit <= 0) return 0;

  const missingHP = 1 - getPoolPercent(unit.resources.hp);
  const moraleHeld = getPoolPercent(unit.resources.morale);
  const factor = missingHP * config.gritLowHPWeight + moraleHeld * config.gritMoraleWeight;
  return Math.min(config.gritReductionCap, Math.max(0, factor * grit * config.gritPerPointPercent));
}

/** Ability potency scaling from Tactics. */
export function getTacticsPotencyMultiplier(tactics: number, config: CombatConfig): number {
  return 1 + tactics * config.tacticsScalingPercent;
}
