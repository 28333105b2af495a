/**
 * Combat - Status Queries
 *
 * Read-only views over a status ledger: lookups and the aggregate
 * modifiers the damage pipeline, validators and turn flow consume.
 * Nothing here changes a ledger.
 */

import type { StatKey, Unit } from "../types/unit";
import type {
  EffectOfFamily,
  StatusEffectFamily,
  StatusEffectInstance,
  StatusEffectKind,
  StatusLedger,
} from "../types/status-effects";
import {
  DAMAGE_MODIFIER_RULES,
  ECONOMY_RULES,
  MOVEMENT_RULES,
  STAT_MODIFIER_PAIRS,
  STATUS_KIND_RULES,
  TARGETING_RULES,
} from "./status-registry";
import type { DamageModifierAxis, EconomyAxis } from "./status-registry";

// ═══════════════════════════════════════════════════════════════════════════
// LOOKUP
// ═══════════════════════════════════════════════════════════════════════════

export function hasStatusEffect(ledger: StatusLedger, kind: StatusEffectKind): boolean {
  return ledger.some((effect) => effect.kind === kind);
}

export function getStatusEffect(ledger: StatusLedger, kind: StatusEffectKind): StatusEffectInstance | null {
  return ledger.find((effect) => effect.kind === kind) ?? null;
}

/** Lookup narrowed to the family's instance shape. */
export function getEffectInFamily<F extends StatusEffectFamily>(
  ledger: StatusLedger,
  kind: StatusEffectKind,
  family: F
): EffectOfFamily<F> | null {
  const isInFamily = (effect: StatusEffectInstance): effect is EffectOfFamily<F> =>
    effect.family === family && effect.kind === kind;
  return ledger.find(isInFamily) ?? null;
}

export function countDebuffs(ledger: StatusLedger): number {
  return ledger.filter((effect) => STATUS_KIND_RULES[effect.kind].polarity === "debuff").length;
}

export function countBuffs(ledger: StatusLedger): number {
  return ledger.filter((effect) => STATUS_KIND_RULES[effect.kind].polarity === "buff").length;
}

// ═══════════════════════════════════════════════════════════════════════════
// STATS
// ═══════════════════════════════════════════════════════════════════════════

/** Boost amount minus reduction amount for one stat. */
export function getStatModifier(ledger: StatusLedger, stat: StatKey): number {
  const pair = STAT_MODIFIER_PAIRS[stat];
  const boost = getEffectInFamily(ledger, pair.boost, "statModifier");
  const reduction = getEffectInFamily(ledger, pair.reduction, "statModifier");
  return (boost?.amount ?? 0) - (reduction?.amount ?? 0);
}

export function getEffectiveStat(unit: Unit, stat: StatKey): number {
  return Math.max(0, unit.stats[stat] + getStatModifier(unit.statusEffects, stat));
}

// ═══════════════════════════════════════════════════════════════════════════
// DAMAGE
// ═══════════════════════════════════════════════════════════════════════════

/** Signed sum of every damage modifier on one axis. */
export function getDamageModifier(ledger: StatusLedger, axis: DamageModifierAxis): number {
  let total = 0;
  for (const effect of ledger) {
    if (effect.family !== "damageModifier") continue;
    const rule = DAMAGE_MODIFIER_RULES[effect.kind];
    if (rule.axis === axis) {
      total += rule.sign * effect.percent;
    }
  }
  return total;
}

/** Extra HP damage taken from marks; consumed by the hit it empowers. */
export function getMarkedBonus(ledger: StatusLedger): number {
  let total = 0;
  for (const effect of ledger) {
    if (effect.family === "marker") {
      total += effect.bonusPercent;
    }
  }
  return total;
}

/** 1 when not cursed. */
export function getCurseMultiplier(ledger: StatusLedger): number {
  const curse = getEffectInFamily(ledger, "Cursed", "charged");
  return curse && curse.charges > 0 ? curse.magnitude : 1;
}

export function getCurseCharges(ledger: StatusLedger): number {
  return getEffectInFamily(ledger, "Cursed", "charged")?.charges ?? 0;
}

export function isExposed(ledger: StatusLedger): boolean {
  return hasStatusEffect(ledger, "Exposed");
}

// ═══════════════════════════════════════════════════════════════════════════
// TARGETING & MOVEMENT
// ═══════════════════════════════════════════════════════════════════════════

/** Chance in [0, 1] that this unit's attacks miss. */
export function getMissChance(ledger: StatusLedger): number {
  let chance = 0;
  for (const effect of ledger) {
    if (effect.family === "targeting" && TARGETING_RULES[effect.kind] === "missChance") {
      chance += effect.magnitude;
    }
  }
  return Math.min(1, Math.max(0, chance));
}

/** Unit that this one is forced to attack, if taunted. */
export function getTauntSourceId(ledger: StatusLedger): string | null {
  return getEffectInFamily(ledger, "Taunted", "targeting")?.sourceId ?? null;
}

export function isUntargetable(ledger: StatusLedger, isRanged: boolean): boolean {
  return ledger.some((effect) => {
    if (effect.kind === "Stasis") return true;
    if (effect.family !== "targeting") return false;
    const rule = TARGETING_RULES[effect.kind];
    return rule === "untargetable" || (isRanged && rule === "hiddenFromRanged");
  });
}

export function mustTargetClosest(ledger: StatusLedger): boolean {
  return hasStatusEffect(ledger, "ForceTargetClosest");
}

export function isMovementBlocked(ledger: StatusLedger): boolean {
  return ledger.some(
    (effect) =>
      effect.kind === "Stasis" ||
      (effect.family === "movement" && MOVEMENT_RULES[effect.kind].axis === "blocked")
  );
}

/** Signed change to movement range in tiles. */
export function getMovementRangeModifier(ledger: StatusLedger): number {
  let total = 0;
  for (const effect of ledger) {
    if (effect.family !== "movement") continue;
    const rule = MOVEMENT_RULES[effect.kind];
    if (rule.axis === "range") {
      total += rule.sign * effect.magnitude;
    }
  }
  return total;
}

export function getMoveCostModifier(ledger: StatusLedger): number {
  let total = 0;
  for (const effect of ledger) {
    if (effect.family === "movement" && MOVEMENT_RULES[effect.kind].axis === "cost") {
      total += effect.magnitude;
    }
  }
  return total;
}

export function isKnockbackImmune(ledger: StatusLedger): boolean {
  return hasStatusEffect(ledger, "Anchored") || hasStatusEffect(ledger, "Stasis");
}

// ═══════════════════════════════════════════════════════════════════════════
// MORALE & ECONOMY
// ═══════════════════════════════════════════════════════════════════════════

/** Signed morale points added to the surrender threshold. */
export function getSurrenderThresholdModifier(ledger: StatusLedger): number {
  let total = 0;
  for (const effect of ledger) {
    if (effect.family !== "surrenderModifier") continue;
    const sign = STATUS_KIND_RULES[effect.kind].polarity === "buff" ? -1 : 1;
    total += sign * effect.thresholdDelta;
  }
  return total;
}

export function getEconomyModifier(ledger: StatusLedger, axis: EconomyAxis): number {
  let total = 0;
  for (const effect of ledger) {
    if (effect.family !== "economy") continue;
    const rule = ECONOMY_RULES[effect.kind];
    if (rule.axis === axis) {
      total += rule.sign * effect.amount;
    }
  }
  return total;
}

// ═══════════════════════════════════════════════════════════════════════════
// DEBUG
// ═══════════════════════════════════════════════════════════════════════════

export function getEffectsSummary(ledger: StatusLedger): string {
  if (ledger.length === 0) return "none";
  return ledger
    .map((effect) => {
      const stacks = effect.stacks > 1 ? ` x${effect.stacks}` : "";
      const duration = effect.remainingDuration === null ? "" : ` (${effect.remainingDuration}t)`;
      const charges = effect.family === "charged" ? ` [${effect.charges} charges]` : "";
      return `${effect.name}${stacks}${duration}${charges}`;
    })
    .join(", ");
}
