/**
 * Combat - Events
 *
 * Notifications published by the battle session. Presentation, logging and
 * AI layers subscribe; nothing in the core reads them back.
 */

import type { ApplyOutcome, StatusEffectKind } from "./status-effects";
import type { AttackStyle, Team } from "./unit";
import type { InitiativeResult } from "./turn";

export type HealableResource = "hp" | "morale" | "hull";

export type RemovalReason = "consumed" | "depleted" | "cleansed" | "dispelled";

export type CombatEvent =
  // Lifecycle
  | { type: "battleStarted"; unitIds: string[] }
  | { type: "roundStarted"; round: number; initiative: InitiativeResult }
  | { type: "sideTurnStarted"; round: number; side: Team; energy: number; cardDrawModifier: number }
  | { type: "sideTurnEnded"; round: number; side: Team; grogGained: number }
  | { type: "battleEnded"; round: number; winner: Team | null }

  // Actions
  | {
      type: "attackResolved";
      attackerId: string;
      targetId: string;
      style: AttackStyle;
      hpDamage: number;
      moraleDamage: number;
      breakdown: string;
    }
  | { type: "attackMissed"; attackerId: string; targetId: string }
  | { type: "abilityUsed"; casterId: string; targetId: string; abilityId: string }
  | { type: "unitMoved"; unitId: string }
  | { type: "rumConsumed"; unitId: string; resource: "hp" | "morale"; amount: number }

  // Unit state
  | { type: "unitDamaged"; unitId: string; amount: number; sourceId: string | null; cause: string }
  | { type: "unitHealed"; unitId: string; resource: HealableResource; amount: number }
  | { type: "moraleChanged"; unitId: string; delta: number; current: number }
  | { type: "unitSurrendered"; unitId: string }
  | { type: "unitDied"; unitId: string; killerId: string | null }
  | { type: "unitStunned"; unitId: string; turns: number }
  | { type: "unitTrapped"; unitId: string }

  // Status effects
  | {
      type: "statusApplied";
      unitId: string;
      kind: StatusEffectKind;
      outcome: Extract<ApplyOutcome, "applied" | "stacked" | "refreshed">;
      stacks: number;
    }
  | {
      type: "statusResisted";
      unitId: string;
      kind: StatusEffectKind;
      outcome: Extract<ApplyOutcome, "resisted" | "immune" | "ineligible">;
    }
  | { type: "statusExpired"; unitId: string; kind: StatusEffectKind }
  | { type: "statusRemoved"; unitId: string; kind: StatusEffectKind; reason: RemovalReason }

  // Side resources
  | { type: "energyChanged"; team: Team; delta: number; current: number }
  | { type: "grogChanged"; team: Team; delta: number; current: number }

  // Requests for external layers
  | { type: "knockbackRequested"; unitId: string; sourceId: string; distance: number }
  | { type: "cardDrawRequested"; team: Team; count: number };

export type CombatEventType = CombatEvent["type"];

export type CombatEventOf<T extends CombatEventType> = Extract<CombatEvent, { type: T }>;

export interface EventSink {
  emit(event: CombatEvent): void;
}
