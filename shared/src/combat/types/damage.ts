/**
 * Combat - Damage Types
 *
 * Inputs and outputs of the damage pipeline. Every attack deals damage to
 * two pools at once: HP and Morale.
 */

import type { StatusLedger } from "./status-effects";

// ═══════════════════════════════════════════════════════════════════════════
// INPUT
// ═══════════════════════════════════════════════════════════════════════════

/** Attacker-side multipliers, already resolved from its ledger and turn state. */
export interface AttackerModifiers {
  /** Initiative first-action bonus as a fraction (0.1 = +10%) */
  firstActionBonus: number;
  /** 1 = no combo */
  comboMultiplier: number;
  /** Signed sum of the attacker's outgoing HP damage modifiers */
  outgoingHPPercent: number;
  /** Signed sum of the attacker's outgoing Morale damage modifiers */
  outgoingMoralePercent: number;
}

export const NO_ATTACKER_MODIFIERS: AttackerModifiers = {
  firstActionBonus: 0,
  comboMultiplier: 1,
  outgoingHPPercent: 0,
  outgoingMoralePercent: 0,
};

export interface DamageInput {
  baseDamage: number;
  isMelee: boolean;
  attacker: AttackerModifiers;
  /** The target's ledger; read only */
  targetLedger: StatusLedger;
  /** Focus-fire stacks the target will have once this hit lands */
  focusFireStacks: number;
  hasCover: boolean;
  /** Added after rounding, never multiplied */
  flatBonusHP: number;
  flatBonusMorale: number;
}

// ═══════════════════════════════════════════════════════════════════════════
// OUTPUT
// ═══════════════════════════════════════════════════════════════════════════

export interface DamageCalculation {
  finalHP: number;
  finalMorale: number;
  /** Combined HP multiplier before rounding */
  hpMultiplier: number;
  /** Combined Morale multiplier before rounding */
  moraleMultiplier: number;
  hpBreakdown: string;
  moraleBreakdown: string;
  /** Both breakdowns on one line, for tooltips and logs */
  breakdownText: string;
}

/** What actually left the target's pools once reductions were applied. */
export interface AppliedDamage {
  calculatedHP: number;
  gritReduced: number;
  hullAbsorbed: number;
  hpLost: number;
  moraleLost: number;
}
