/**
 * Combat - Status Registry
 *
 * Static, read-only rules for every status effect kind: polarity,
 * stackability, display name, and the family-specific behaviour tables
 * (which stat a modifier touches, which resource a drain takes, what an
 * aura grants). Every table is keyed by a kind union, so adding a kind
 * without its rules fails to compile.
 */

import type { CombatConfig } from "../types/config";
import type { HealableResource } from "../types/events";
import type { StatKey } from "../types/unit";
import {
  AURA_KINDS,
  CHARGED_KINDS,
  CONDITION_KINDS,
  CONTROL_KINDS,
  DAMAGE_MODIFIER_KINDS,
  DAMAGE_OVER_TIME_KINDS,
  ECONOMY_KINDS,
  HEAL_OVER_TIME_KINDS,
  MARKER_KINDS,
  MOVEMENT_KINDS,
  REACTIVE_KINDS,
  RESOURCE_DRAIN_KINDS,
  STAT_MODIFIER_KINDS,
  SURRENDER_MODIFIER_KINDS,
  TARGETING_KINDS,
} from "../types/status-effects";
import type {
  AuraKind,
  ChargedEffect,
  DamageModifierKind,
  DamageOverTimeKind,
  EconomyKind,
  EffectOfFamily,
  HealOverTimeKind,
  MarkerEffect,
  MovementKind,
  ResourceDrainKind,
  StatModifierKind,
  StatusEffectFamily,
  StatusEffectInstance,
  StatusEffectKind,
  StatusEffectSpec,
  StatusPolarity,
  TargetingKind,
} from "../types/status-effects";

// ═══════════════════════════════════════════════════════════════════════════
// EXHAUSTIVENESS
// ═══════════════════════════════════════════════════════════════════════════

export function assertNever(value: never, context = "value"): never {
  throw new Error(`Unhandled ${context}: ${JSON.stringify(value)}`);
}

// ═══════════════════════════════════════════════════════════════════════════
// KIND RULES
// ═══════════════════════════════════════════════════════════════════════════

export interface StatusKindRule {
  polarity: StatusPolarity;
  stackable: boolean;
  displayName: string;
}

const buff = (displayName: string, stackable = false): StatusKindRule => ({
  polarity: "buff",
  stackable,
  displayName,
});

const debuff = (displayName: string, stackable = false): StatusKindRule => ({
  polarity: "debuff",
  stackable,
  displayName,
});

export const STATUS_KIND_RULES: Record<StatusEffectKind, StatusKindRule> = {
  // Damage over time
  Fire: debuff("Burning", true),
  Poison: debuff("Poisoned", true),
  Bleed: debuff("Bleeding", true),
  Scalded: debuff("Scalded"),
  Frostbite: debuff("Frostbitten"),
  Venom: debuff("Envenomed", true),
  Scurvy: debuff("Scurvy"),
  Gangrene: debuff("Gangrene"),

  // Heal over time
  Regeneration: buff("Regenerating"),
  Rallying: buff("Rallying"),
  HullRepair: buff("Hull Repair"),
  SecondWind: buff("Second Wind"),
  Inspired: buff("Inspired"),

  // Stat modifiers
  PowerBoost: buff("Power Up"),
  PowerReduction: debuff("Power Down"),
  AimBoost: buff("Aim Up"),
  AimReduction: debuff("Aim Down"),
  TacticsBoost: buff("Tactics Up"),
  TacticsReduction: debuff("Tactics Down"),
  SpeedBoost: buff("Speed Up"),
  SpeedReduction: debuff("Speed Down"),
  GritBoost: buff("Grit Up"),
  GritReduction: debuff("Grit Down"),
  HullBoost: buff("Hull Up"),
  HullReduction: debuff("Hull Down"),
  ProficiencyBoost: buff("Proficiency Up"),
  ProficiencyReduction: debuff("Proficiency Down"),
  SkillBoost: buff("Skill Up"),
  SkillReduction: debuff("Skill Down"),

  // Damage modifiers
  DamageBoost: buff("Damage Up"),
  Enraged: buff("Enraged"),
  Weakened: debuff("Weakened"),
  Dazed: debuff("Dazed"),
  Vulnerable: debuff("Vulnerable"),
  Cracked: debuff("Cracked Armour", true),
  Protected: buff("Protected"),
  Shielded: buff("Shielded"),
  RangedShield: buff("Ranged Shield"),
  Deflecting: buff("Deflecting"),
  MoraleShield: buff("Morale Shield"),
  Rattled: debuff("Rattled"),
  Intimidating: buff("Intimidating"),
  Fearful: debuff("Fearful"),

  // Markers
  Marked: debuff("Marked", true),
  BountyMark: debuff("Bounty"),

  // Charged
  Cursed: debuff("Cursed"),
  Reflecting: buff("Reflecting"),
  Thorns: buff("Thorns", true),

  // Reactive
  CounterAttack: buff("Counter Attack"),
  Riposte: buff("Riposte"),
  KnockbackOnHit: buff("Repelling"),
  DrawCardOnHit: buff("Battle Insight"),
  EnergyOnHit: buff("Adrenaline"),
  Vengeance: buff("Vengeance"),

  // Control
  Stunned: debuff("Stunned"),
  Stasis: buff("Stasis"),
  Snared: debuff("Snared"),

  // Conditions
  Exposed: debuff("Exposed"),
  HealBlock: debuff("Heal Block"),
  Silenced: debuff("Silenced"),
  Disarmed: debuff("Disarmed"),
  SteadyHands: buff("Steady Hands"),
  Unflinching: buff("Unflinching"),

  // Movement
  Slowed: debuff("Slowed"),
  Rooted: debuff("Rooted"),
  MovementTrap: debuff("Trapped Ground"),
  Hobbled: debuff("Hobbled"),
  Hastened: buff("Hastened"),
  Anchored: buff("Anchored"),

  // Targeting
  Taunted: debuff("Taunted"),
  ForceTargetClosest: debuff("Tunnel Vision"),
  IgnoredByEnemies: buff("Unnoticed"),
  Disoriented: debuff("Disoriented"),
  Camouflaged: buff("Camouflaged"),
  Blinded: debuff("Blinded"),

  // Resource drains
  EnergyDrain: debuff("Energy Drain"),
  MoraleDrain: debuff("Dread"),
  Intoxicated: debuff("Intoxicated", true),
  Corroded: debuff("Corroded"),
  Pilfered: debuff("Pilfered"),
  GrogDrain: debuff("Leaking Casks"),

  // Surrender modifiers
  Steadfast: buff("Steadfast"),
  Resolute: buff("Resolute"),
  Demoralized: debuff("Demoralized"),
  Terrified: debuff("Terrified"),

  // Auras
  RallyAura: buff("Rallying Cry"),
  CommandAura: buff("Command Presence"),
  FearAura: buff("Dread Presence"),
  BulwarkAura: buff("Bulwark"),
  MenacingAura: buff("Menacing Presence"),
  HealingAura: buff("Healing Presence"),

  // Economy
  ExtraCardDraw: buff("Extra Draw"),
  Fumbling: debuff("Fumbling"),
  CardCostReduction: buff("Efficient"),
  CardCostIncrease: debuff("Encumbered"),
  EnergySurge: buff("Energy Surge"),
  EnergyStarved: debuff("Energy Starved"),
  QuickReload: buff("Quick Reload"),
};

export const ALL_STATUS_EFFECT_KINDS: readonly StatusEffectKind[] = [
  ...DAMAGE_OVER_TIME_KINDS,
  ...HEAL_OVER_TIME_KINDS,
  ...STAT_MODIFIER_KINDS,
  ...DAMAGE_MODIFIER_KINDS,
  ...MARKER_KINDS,
  ...CHARGED_KINDS,
  ...REACTIVE_KINDS,
  ...CONTROL_KINDS,
  ...CONDITION_KINDS,
  ...MOVEMENT_KINDS,
  ...TARGETING_KINDS,
  ...RESOURCE_DRAIN_KINDS,
  ...SURRENDER_MODIFIER_KINDS,
  ...AURA_KINDS,
  ...ECONOMY_KINDS,
];

export function isStatusEffectKind(value: string): value is StatusEffectKind {
  const kinds: readonly string[] = ALL_STATUS_EFFECT_KINDS;
  return kinds.includes(value);
}

export function isBuff(kind: StatusEffectKind): boolean {
  return STATUS_KIND_RULES[kind].polarity === "buff";
}

export function isDebuff(kind: StatusEffectKind): boolean {
  return STATUS_KIND_RULES[kind].polarity === "debuff";
}

export function isStackable(kind: StatusEffectKind): boolean {
  return STATUS_KIND_RULES[kind].stackable;
}

// ═══════════════════════════════════════════════════════════════════════════
// FAMILY CLASSIFICATION
// ═══════════════════════════════════════════════════════════════════════════

export type ClassifiedKind = {
  [F in StatusEffectFamily]: { family: F; kind: EffectOfFamily<F>["kind"] };
}[StatusEffectFamily];

function isKindIn<K extends StatusEffectKind>(kinds: readonly K[], kind: StatusEffectKind): kind is K {
  const list: readonly StatusEffectKind[] = kinds;
  return list.includes(kind);
}

export function classifyKind(kind: StatusEffectKind): ClassifiedKind {
  if (isKindIn(DAMAGE_OVER_TIME_KINDS, kind)) return { family: "damageOverTime", kind };
  if (isKindIn(HEAL_OVER_TIME_KINDS, kind)) return { family: "healOverTime", kind };
  if (isKindIn(STAT_MODIFIER_KINDS, kind)) return { family: "statModifier", kind };
  if (isKindIn(DAMAGE_MODIFIER_KINDS, kind)) return { family: "damageModifier", kind };
  if (isKindIn(MARKER_KINDS, kind)) return { family: "marker", kind };
  if (isKindIn(CHARGED_KINDS, kind)) return { family: "charged", kind };
  if (isKindIn(REACTIVE_KINDS, kind)) return { family: "reactive", kind };
  if (isKindIn(CONTROL_KINDS, kind)) return { family: "control", kind };
  if (isKindIn(CONDITION_KINDS, kind)) return { family: "condition", kind };
  if (isKindIn(MOVEMENT_KINDS, kind)) return { family: "movement", kind };
  if (isKindIn(TARGETING_KINDS, kind)) return { family: "targeting", kind };
  if (isKindIn(RESOURCE_DRAIN_KINDS, kind)) return { family: "resourceDrain", kind };
  if (isKindIn(SURRENDER_MODIFIER_KINDS, kind)) return { family: "surrenderModifier", kind };
  if (isKindIn(AURA_KINDS, kind)) return { family: "aura", kind };
  if (isKindIn(ECONOMY_KINDS, kind)) return { family: "economy", kind };
  return assertNever(kind, "status effect kind");
}

export function getStatusFamily(kind: StatusEffectKind): StatusEffectFamily {
  return classifyKind(kind).family;
}

// ═══════════════════════════════════════════════════════════════════════════
// FAMILY BEHAVIOUR TABLES
// ═══════════════════════════════════════════════════════════════════════════

export type DamageOverTimeTrigger = "turnStart" | "moved";

export const DAMAGE_OVER_TIME_TRIGGERS: Record<DamageOverTimeKind, DamageOverTimeTrigger> = {
  Fire: "turnStart",
  Poison: "turnStart",
  Bleed: "moved",
  Scalded: "turnStart",
  Frostbite: "turnStart",
  Venom: "turnStart",
  Scurvy: "turnStart",
  Gangrene: "turnStart",
};

export const HEAL_OVER_TIME_RESOURCES: Record<HealOverTimeKind, HealableResource> = {
  Regeneration: "hp",
  Rallying: "morale",
  HullRepair: "hull",
  SecondWind: "hp",
  Inspired: "morale",
};

export type ModifierSign = 1 | -1;

export const STAT_MODIFIER_RULES: Record<StatModifierKind, { stat: StatKey; sign: ModifierSign }> = {
  PowerBoost: { stat: "power", sign: 1 },
  PowerReduction: { stat: "power", sign: -1 },
  AimBoost: { stat: "aim", sign: 1 },
  AimReduction: { stat: "aim", sign: -1 },
  TacticsBoost: { stat: "tactics", sign: 1 },
  TacticsReduction: { stat: "tactics", sign: -1 },
  SpeedBoost: { stat: "speed", sign: 1 },
  SpeedReduction: { stat: "speed", sign: -1 },
  GritBoost: { stat: "grit", sign: 1 },
  GritReduction: { stat: "grit", sign: -1 },
  HullBoost: { stat: "hull", sign: 1 },
  HullReduction: { stat: "hull", sign: -1 },
  ProficiencyBoost: { stat: "proficiency", sign: 1 },
  ProficiencyReduction: { stat: "proficiency", sign: -1 },
  SkillBoost: { stat: "skill", sign: 1 },
  SkillReduction: { stat: "skill", sign: -1 },
};

/** The one boost and one reduction that can touch each stat. */
export const STAT_MODIFIER_PAIRS: Record<StatKey, { boost: StatModifierKind; reduction: StatModifierKind }> = {
  power: { boost: "PowerBoost", reduction: "PowerReduction" },
  aim: { boost: "AimBoost", reduction: "AimReduction" },
  tactics: { boost: "TacticsBoost", reduction: "TacticsReduction" },
  speed: { boost: "SpeedBoost", reduction: "SpeedReduction" },
  grit: { boost: "GritBoost", reduction: "GritReduction" },
  hull: { boost: "HullBoost", reduction: "HullReduction" },
  proficiency: { boost: "ProficiencyBoost", reduction: "ProficiencyReduction" },
  skill: { boost: "SkillBoost", reduction: "SkillReduction" },
};

/**
 * Which side of an exchange a damage modifier reads on.
 * Outgoing axes are read from the attacker, incoming ones from the target.
 */
export type DamageModifierAxis =
  | "outgoingHP"
  | "incomingHP"
  | "incomingRanged"
  | "outgoingMorale"
  | "incomingMorale";

export const DAMAGE_MODIFIER_RULES: Record<DamageModifierKind, { axis: DamageModifierAxis; sign: ModifierSign }> = {
  DamageBoost: { axis: "outgoingHP", sign: 1 },
  Enraged: { axis: "outgoingHP", sign: 1 },
  Weakened: { axis: "outgoingHP", sign: -1 },
  Dazed: { axis: "outgoingHP", sign: -1 },
  Vulnerable: { axis: "incomingHP", sign: 1 },
  Cracked: { axis: "incomingHP", sign: 1 },
  Protected: { axis: "incomingHP", sign: -1 },
  Shielded: { axis: "incomingHP", sign: -1 },
  RangedShield: { axis: "incomingRanged", sign: -1 },
  Deflecting: { axis: "incomingRanged", sign: -1 },
  MoraleShield: { axis: "incomingMorale", sign: -1 },
  Rattled: { axis: "incomingMorale", sign: 1 },
  Intimidating: { axis: "outgoingMorale", sign: 1 },
  Fearful: { axis: "outgoingMorale", sign: -1 },
};

export type MovementAxis = "range" | "blocked" | "trap" | "cost" | "knockbackImmune";

export const MOVEMENT_RULES: Record<MovementKind, { axis: MovementAxis; sign: ModifierSign }> = {
  Slowed: { axis: "range", sign: -1 },
  Rooted: { axis: "blocked", sign: 1 },
  MovementTrap: { axis: "trap", sign: 1 },
  Hobbled: { axis: "cost", sign: 1 },
  Hastened: { axis: "range", sign: 1 },
  Anchored: { axis: "knockbackImmune", sign: 1 },
};

export type TargetingRule = "taunt" | "closestOnly" | "untargetable" | "missChance" | "hiddenFromRanged";

export const TARGETING_RULES: Record<TargetingKind, TargetingRule> = {
  Taunted: "taunt",
  ForceTargetClosest: "closestOnly",
  IgnoredByEnemies: "untargetable",
  Disoriented: "missChance",
  Camouflaged: "hiddenFromRanged",
  Blinded: "missChance",
};

export type DrainedResource = "energy" | "grog" | "morale" | "buzz" | "hull" | "arrows";

export const RESOURCE_DRAIN_RULES: Record<ResourceDrainKind, DrainedResource> = {
  EnergyDrain: "energy",
  MoraleDrain: "morale",
  Intoxicated: "buzz",
  Corroded: "hull",
  Pilfered: "arrows",
  GrogDrain: "grog",
};

export interface AuraRule {
  affects: "allies" | "enemies";
  grants: StatusEffectKind;
  grantDuration: number;
}

export const AURA_RULES: Record<AuraKind, AuraRule> = {
  RallyAura: { affects: "allies", grants: "Rallying", grantDuration: 1 },
  CommandAura: { affects: "allies", grants: "DamageBoost", grantDuration: 1 },
  FearAura: { affects: "enemies", grants: "Rattled", grantDuration: 1 },
  BulwarkAura: { affects: "allies", grants: "Protected", grantDuration: 1 },
  MenacingAura: { affects: "enemies", grants: "Weakened", grantDuration: 1 },
  HealingAura: { affects: "allies", grants: "Regeneration", grantDuration: 1 },
};

export type EconomyAxis = "cardDraw" | "cardCost" | "energyIncome" | "arrows";

export const ECONOMY_RULES: Record<EconomyKind, { axis: EconomyAxis; sign: ModifierSign }> = {
  ExtraCardDraw: { axis: "cardDraw", sign: 1 },
  Fumbling: { axis: "cardDraw", sign: -1 },
  CardCostReduction: { axis: "cardCost", sign: -1 },
  CardCostIncrease: { axis: "cardCost", sign: 1 },
  EnergySurge: { axis: "energyIncome", sign: 1 },
  EnergyStarved: { axis: "energyIncome", sign: -1 },
  QuickReload: { axis: "arrows", sign: 1 },
};

// ═══════════════════════════════════════════════════════════════════════════
// FACTORIES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Build an instance from data-driven parameters. `magnitude`
 * lands in whichever field the kind's family uses.
 */
export function createStatusEffect(
  spec: StatusEffectSpec,
  sourceId: string | null = null
): StatusEffectInstance {
  const classified = classifyKind(spec.kind);
  const magnitude = spec.magnitude ?? 0;
  const base = {
    name: STATUS_KIND_RULES[spec.kind].displayName,
    remainingDuration: spec.duration,
    stacks: 1,
    sourceId,
  };

  switch (classified.family) {
    case "damageOverTime":
      return { ...base, family: classified.family, kind: classified.kind, damagePerTick: magnitude };
    case "healOverTime":
      return { ...base, family: classified.family, kind: classified.kind, amountPerTick: magnitude };
    case "statModifier":
      return { ...base, family: classified.family, kind: classified.kind, amount: magnitude };
    case "damageModifier":
      return { ...base, family: classified.family, kind: classified.kind, percent: magnitude };
    case "marker":
      return {
        ...base,
        family: classified.family,
        kind: classified.kind,
        bonusPercent: magnitude,
        energyOnConsume: spec.energyOnConsume ?? 0,
      };
    case "charged":
      return {
        ...base,
        family: classified.family,
        kind: classified.kind,
        charges: spec.charges ?? 1,
        magnitude,
      };
    case "reactive":
      return {
        ...base,
        family: classified.family,
        kind: classified.kind,
        magnitude,
        triggeredThisTurn: false,
      };
    case "control":
      return { ...base, family: classified.family, kind: classified.kind };
    case "condition":
      return { ...base, family: classified.family, kind: classified.kind };
    case "movement":
      return { ...base, family: classified.family, kind: classified.kind, magnitude };
    case "targeting":
      return { ...base, family: classified.family, kind: classified.kind, magnitude };
    case "resourceDrain":
      return { ...base, family: classified.family, kind: classified.kind, amountPerTick: magnitude };
    case "surrenderModifier":
      return { ...base, family: classified.family, kind: classified.kind, thresholdDelta: magnitude };
    case "aura":
      return { ...base, family: classified.family, kind: classified.kind, magnitude };
    case "economy":
      return { ...base, family: classified.family, kind: classified.kind, amount: magnitude };
    default:
      return assertNever(classified, "status effect family");
  }
}

export function createFire(damagePerTick: number, duration: number, sourceId: string | null = null) {
  return createStatusEffect({ kind: "Fire", duration, magnitude: damagePerTick }, sourceId);
}

export function createBleed(damagePerMove: number, duration: number, sourceId: string | null = null) {
  return createStatusEffect({ kind: "Bleed", duration, magnitude: damagePerMove }, sourceId);
}

export function createMarked(bonusPercent: number, duration: number, sourceId: string | null = null): MarkerEffect {
  return {
    family: "marker",
    kind: "Marked",
    name: STATUS_KIND_RULES.Marked.displayName,
    remainingDuration: duration,
    stacks: 1,
    sourceId,
    bonusPercent,
    energyOnConsume: 0,
  };
}

export function createBountyMark(
  bonusPercent: number,
  energyOnConsume: number,
  duration: number,
  sourceId: string | null = null
): MarkerEffect {
  return {
    ...createMarked(bonusPercent, duration, sourceId),
    kind: "BountyMark",
    name: STATUS_KIND_RULES.BountyMark.displayName,
    energyOnConsume,
  };
}

/** Curse strength and charges come from the battle config. */
export function createCurse(config: CombatConfig, sourceId: string | null = null): ChargedEffect {
  return {
    family: "charged",
    kind: "Cursed",
    name: STATUS_KIND_RULES.Cursed.displayName,
    remainingDuration: null,
    stacks: 1,
    sourceId,
    charges: config.curseCharges,
    magnitude: config.curseMultiplier,
  };
}

export function createReflect(charges: number, config: CombatConfig, sourceId: string | null = null) {
  return createStatusEffect(
    { kind: "Reflecting", duration: null, charges, magnitude: config.returnDamageFraction },
    sourceId
  );
}

export function createStun(duration: number, sourceId: string | null = null) {
  return createStatusEffect({ kind: "Stunned", duration }, sourceId);
}

export function createExposed(duration: number, sourceId: string | null = null) {
  return createStatusEffect({ kind: "Exposed", duration }, sourceId);
}

export function createHealBlock(duration: number, sourceId: string | null = null) {
  return createStatusEffect({ kind: "HealBlock", duration }, sourceId);
}

export function createMovementTrap(hpPercent: number, sourceId: string | null = null) {
  return createStatusEffect({ kind: "MovementTrap", duration: null, magnitude: hpPercent }, sourceId);
}

export function createRegeneration(amountPerTick: number, duration: number, sourceId: string | null = null) {
  return createStatusEffect({ kind: "Regeneration", duration, magnitude: amountPerTick }, sourceId);
}

export function createEnergyDrain(amountPerTick: number, duration: number, sourceId: string | null = null) {
  return createStatusEffect({ kind: "EnergyDrain", duration, magnitude: amountPerTick }, sourceId);
}
