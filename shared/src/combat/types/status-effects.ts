/**
 * Combat - Status Effect Types
 *
 * Closed catalog of status effect kinds, grouped into families.
 * Every family has its own instance shape, so a Fire instance carries
 * damage-per-tick and a Cursed instance carries charges, and nothing else.
 *
 * Per-kind rules (polarity, stackability, display names, family-specific
 * behaviour) live in the status registry.
 */

// ═══════════════════════════════════════════════════════════════════════════
// KIND CATALOG (by family)
// ═══════════════════════════════════════════════════════════════════════════

export const DAMAGE_OVER_TIME_KINDS = [
  "Fire",
  "Poison",
  "Bleed",
  "Scalded",
  "Frostbite",
  "Venom",
  "Scurvy",
  "Gangrene",
] as const;

export const HEAL_OVER_TIME_KINDS = [
  "Regeneration",
  "Rallying",
  "HullRepair",
  "SecondWind",
  "Inspired",
] as const;

export const STAT_MODIFIER_KINDS = [
  "PowerBoost",
  "PowerReduction",
  "AimBoost",
  "AimReduction",
  "TacticsBoost",
  "TacticsReduction",
  "SpeedBoost",
  "SpeedReduction",
  "GritBoost",
  "GritReduction",
  "HullBoost",
  "HullReduction",
  "ProficiencyBoost",
  "ProficiencyReduction",
  "SkillBoost",
  "SkillReduction",
] as const;

export const DAMAGE_MODIFIER_KINDS = [
  "DamageBoost",
  "Enraged",
  "Weakened",
  "Dazed",
  "Vulnerable",
  "Cracked",
  "Protected",
  "Shielded",
  "RangedShield",
  "Deflecting",
  "MoraleShield",
  "Rattled",
  "Intimidating",
  "Fearful",
] as const;

export const MARKER_KINDS = ["Marked", "BountyMark"] as const;

export const CHARGED_KINDS = ["Cursed", "Reflecting", "Thorns"] as const;

export const REACTIVE_KINDS = [
  "CounterAttack",
  "Riposte",
  "KnockbackOnHit",
  "DrawCardOnHit",
  "EnergyOnHit",
  "Vengeance",
] as const;

export const CONTROL_KINDS = ["Stunned", "Stasis", "Snared"] as const;

export const CONDITION_KINDS = [
  "Exposed",
  "HealBlock",
  "Silenced",
  "Disarmed",
  "SteadyHands",
  "Unflinching",
] as const;

export const MOVEMENT_KINDS = [
  "Slowed",
  "Rooted",
  "MovementTrap",
  "Hobbled",
  "Hastened",
  "Anchored",
] as const;

export const TARGETING_KINDS = [
  "Taunted",
  "ForceTargetClosest",
  "IgnoredByEnemies",
  "Disoriented",
  "Camouflaged",
  "Blinded",
] as const;

export const RESOURCE_DRAIN_KINDS = [
  "EnergyDrain",
  "MoraleDrain",
  "Intoxicated",
  "Corroded",
  "Pilfered",
  "GrogDrain",
] as const;

export const SURRENDER_MODIFIER_KINDS = [
  "Steadfast",
  "Resolute",
  "Demoralized",
  "Terrified",
] as const;

export const AURA_KINDS = [
  "RallyAura",
  "CommandAura",
  "FearAura",
  "BulwarkAura",
  "MenacingAura",
  "HealingAura",
] as const;

export const ECONOMY_KINDS = [
  "ExtraCardDraw",
  "Fumbling",
  "CardCostReduction",
  "CardCostIncrease",
  "EnergySurge",
  "EnergyStarved",
  "QuickReload",
] as const;

export type DamageOverTimeKind = (typeof DAMAGE_OVER_TIME_KINDS)[number];
export type HealOverTimeKind = (typeof HEAL_OVER_TIME_KINDS)[number];
export type StatModifierKind = (typeof STAT_MODIFIER_KINDS)[number];
export type DamageModifierKind = (typeof DAMAGE_MODIFIER_KINDS)[number];
export type MarkerKind = (typeof MARKER_KINDS)[number];
export type ChargedKind = (typeof CHARGED_KINDS)[number];
export type ReactiveKind = (typeof REACTIVE_KINDS)[number];
export type ControlKind = (typeof CONTROL_KINDS)[number];
export type ConditionKind = (typeof CONDITION_KINDS)[number];
export type MovementKind = (typeof MOVEMENT_KINDS)[number];
export type TargetingKind = (typeof TARGETING_KINDS)[number];
export type ResourceDrainKind = (typeof RESOURCE_DRAIN_KINDS)[number];
export type SurrenderModifierKind = (typeof SURRENDER_MODIFIER_KINDS)[number];
export type AuraKind = (typeof AURA_KINDS)[number];
export type EconomyKind = (typeof ECONOMY_KINDS)[number];

export type StatusEffectKind =
  | DamageOverTimeKind
  | HealOverTimeKind
  | StatModifierKind
  | DamageModifierKind
  | MarkerKind
  | ChargedKind
  | ReactiveKind
  | ControlKind
  | ConditionKind
  | MovementKind
  | TargetingKind
  | ResourceDrainKind
  | SurrenderModifierKind
  | AuraKind
  | EconomyKind;

export type StatusEffectFamily =
  | "damageOverTime"
  | "healOverTime"
  | "statModifier"
  | "damageModifier"
  | "marker"
  | "charged"
  | "reactive"
  | "control"
  | "condition"
  | "movement"
  | "targeting"
  | "resourceDrain"
  | "surrenderModifier"
  | "aura"
  | "economy";

export type StatusPolarity = "buff" | "debuff";

// ═══════════════════════════════════════════════════════════════════════════
// INSTANCES (one variant per family)
// ═══════════════════════════════════════════════════════════════════════════

interface StatusEffectBase<F extends StatusEffectFamily, K extends StatusEffectKind> {
  family: F;
  kind: K;
  /** Display name, copied from the registry at creation */
  name: string;
  /** Turns remaining (null = permanent, or bound by charges) */
  remainingDuration: number | null;
  stacks: number;
  /** Id of the unit that applied it, if any. Attribution only. */
  sourceId: string | null;
}

export interface DamageOverTimeEffect extends StatusEffectBase<"damageOverTime", DamageOverTimeKind> {
  damagePerTick: number;
}

export interface HealOverTimeEffect extends StatusEffectBase<"healOverTime", HealOverTimeKind> {
  amountPerTick: number;
}

export interface StatModifierEffect extends StatusEffectBase<"statModifier", StatModifierKind> {
  /** Unsigned; the registry says which stat and which direction */
  amount: number;
}

export interface DamageModifierEffect extends StatusEffectBase<"damageModifier", DamageModifierKind> {
  /** Unsigned fraction (0.25 = 25%) */
  percent: number;
}

export interface MarkerEffect extends StatusEffectBase<"marker", MarkerKind> {
  /** Bonus HP damage fraction taken while marked */
  bonusPercent: number;
  /** Energy refunded to the attacking side when the mark is consumed */
  energyOnConsume: number;
}

export interface ChargedEffect extends StatusEffectBase<"charged", ChargedKind> {
  charges: number;
  magnitude: number;
}

export interface ReactiveEffect extends StatusEffectBase<"reactive", ReactiveKind> {
  magnitude: number;
  /** Cleared at the owner's turn start */
  triggeredThisTurn: boolean;
}

export type ControlEffect = StatusEffectBase<"control", ControlKind>;

export type ConditionEffect = StatusEffectBase<"condition", ConditionKind>;

export interface MovementEffect extends StatusEffectBase<"movement", MovementKind> {
  magnitude: number;
}

export interface TargetingEffect extends StatusEffectBase<"targeting", TargetingKind> {
  magnitude: number;
}

export interface ResourceDrainEffect extends StatusEffectBase<"resourceDrain", ResourceDrainKind> {
  amountPerTick: number;
}

export interface SurrenderModifierEffect
  extends StatusEffectBase<"surrenderModifier", SurrenderModifierKind> {
  /** Unsigned morale points; buffs lower the threshold, debuffs raise it */
  thresholdDelta: number;
}

export interface AuraEffect extends StatusEffectBase<"aura", AuraKind> {
  magnitude: number;
}

export interface EconomyEffect extends StatusEffectBase<"economy", EconomyKind> {
  amount: number;
}

export type StatusEffectInstance =
  | DamageOverTimeEffect
  | HealOverTimeEffect
  | StatModifierEffect
  | DamageModifierEffect
  | MarkerEffect
  | ChargedEffect
  | ReactiveEffect
  | ControlEffect
  | ConditionEffect
  | MovementEffect
  | TargetingEffect
  | ResourceDrainEffect
  | SurrenderModifierEffect
  | AuraEffect
  | EconomyEffect;

export type EffectOfFamily<F extends StatusEffectFamily> = Extract<StatusEffectInstance, { family: F }>;

/**
 * Status effects currently on one unit.
 * At most one instance per kind, kept in insertion order.
 */
export type StatusLedger = readonly StatusEffectInstance[];

/**
 * Creation parameters for data-driven content (abilities, relics).
 * `magnitude` maps onto the family's own field.
 */
export interface StatusEffectSpec {
  kind: StatusEffectKind;
  duration: number | null;
  magnitude?: number;
  charges?: number;
  energyOnConsume?: number;
}

export type ApplyOutcome =
  | "applied"
  | "stacked"
  | "refreshed"
  | "unchanged"
  | "resisted"
  | "immune"
  | "ineligible";
