/**
 * Combat - Ability Effects
 *
 * Abilities and relics are data: a list of effect descriptors loaded from
 * content. Damage descriptors go through the attack pipeline (the session
 * handles those); everything else becomes follow-ups here, scaled by the
 * caster's Tactics where it makes sense.
 */

import type { CombatConfig } from "../types/config";
import type { HealableResource } from "../types/events";
import type { FollowUpEffect } from "../types/follow-ups";
import type { StatusEffectSpec } from "../types/status-effects";
import type { AttackStyle, Unit } from "../types/unit";
import { getTacticsPotencyMultiplier, roundHalfAwayFromZero } from "./damage-calculator";
import { getEconomyModifier, getEffectiveStat } from "./status-queries";
import { assertNever, createStatusEffect } from "./status-registry";

// ═══════════════════════════════════════════════════════════════════════════
// DESCRIPTORS
// ═══════════════════════════════════════════════════════════════════════════

export type AbilityRecipient = "self" | "target";

export type AbilityEffectDescriptor =
  | { type: "damage"; baseDamage: number; style: AttackStyle }
  | { type: "applyStatus"; recipient: AbilityRecipient; effect: StatusEffectSpec }
  | { type: "heal"; recipient: AbilityRecipient; resource: HealableResource; amount: number }
  | { type: "cleanse"; recipient: AbilityRecipient }
  | { type: "restoreEnergy"; amount: number }
  | { type: "drawCards"; count: number };

export type AbilityTargeting = "enemy" | "ally" | "self";

export interface AbilityDefinition {
  id: string;
  name: string;
  energyCost: number;
  targeting: AbilityTargeting;
  effects: AbilityEffectDescriptor[];
}

export type StrikeDescriptor = Extract<AbilityEffectDescriptor, { type: "damage" }>;

/** Runs a single non-damage descriptor. */
export interface AbilityEffectExecutor {
  toFollowUps(caster: Unit, target: Unit, descriptor: Exclude<AbilityEffectDescriptor, StrikeDescriptor>): FollowUpEffect[];
}

// ═══════════════════════════════════════════════════════════════════════════
// DEFAULT EXECUTOR
// ═══════════════════════════════════════════════════════════════════════════

export function isStrike(descriptor: AbilityEffectDescriptor): descriptor is StrikeDescriptor {
  return descriptor.type === "damage";
}

/** Strike base damage after Tactics scaling. */
export function getStrikeBaseDamage(caster: Unit, descriptor: StrikeDescriptor, config: CombatConfig): number {
  const potency = getTacticsPotencyMultiplier(getEffectiveStat(caster, "tactics"), config);
  return roundHalfAwayFromZero(descriptor.baseDamage * potency);
}

export function createAbilityEffectExecutor(config: CombatConfig): AbilityEffectExecutor {
  return {
    toFollowUps(caster, target, descriptor) {
      const potency = getTacticsPotencyMultiplier(getEffectiveStat(caster, "tactics"), config);
      const recipientOf = (recipient: AbilityRecipient): Unit => (recipient === "self" ? caster : target);

      switch (descriptor.type) {
        case "applyStatus": {
          const spec: StatusEffectSpec = {
            ...descriptor.effect,
            magnitude:
              descriptor.effect.magnitude === undefined ? undefined : descriptor.effect.magnitude * potency,
          };
          return [
            {
              type: "applyStatus",
              targetId: recipientOf(descriptor.recipient).id,
              effect: createStatusEffect(spec, caster.id),
            },
          ];
        }
        case "heal":
          return [
            {
              type: "heal",
              targetId: recipientOf(descriptor.recipient).id,
              resource: descriptor.resource,
              amount: roundHalfAwayFromZero(descriptor.amount * potency),
            },
          ];
        case "cleanse":
          return [{ type: "cleanse", targetId: recipientOf(descriptor.recipient).id }];
        case "restoreEnergy":
          return [{ type: "restoreEnergy", team: caster.team, amount: descriptor.amount, cause: "ability" }];
        case "drawCards":
          return [{ type: "drawCards", team: caster.team, count: descriptor.count }];
        default:
          return assertNever(descriptor, "ability effect");
      }
    },
  };
}

/** Energy cost after the caster's card-cost modifiers, never below zero. */
export function getAbilityEnergyCost(caster: Unit, ability: AbilityDefinition): number {
  return Math.max(0, ability.energyCost + getEconomyModifier(caster.statusEffects, "cardCost"));
}
