/**
 * Combat - Follow-up Effects
 *
 * Cross-unit consequences returned by a resolution step (reflected damage,
 * aura grants, bounty refunds...). The dispatcher applies them in order.
 */

import type { HealableResource, RemovalReason } from "./events";
import type { StatusEffectInstance, StatusEffectKind } from "./status-effects";
import type { Team } from "./unit";

export type FollowUpEffect =
  | { type: "rawDamage"; targetId: string; amount: number; sourceId: string | null; cause: string }
  | { type: "heal"; targetId: string; resource: HealableResource; amount: number }
  | { type: "applyStatus"; targetId: string; effect: StatusEffectInstance }
  | {
      type: "applyStatusToTeam";
      team: Team;
      /** Aura owner; never granted its own aura effect */
      excludeId: string | null;
      effect: StatusEffectInstance;
    }
  | { type: "removeStatus"; targetId: string; kind: StatusEffectKind; reason: RemovalReason }
  | { type: "cleanse"; targetId: string }
  | { type: "restoreEnergy"; team: Team; amount: number; cause: string }
  | { type: "drainEnergy"; team: Team; amount: number; cause: string }
  | { type: "drainGrog"; team: Team; amount: number; cause: string }
  | { type: "knockback"; targetId: string; sourceId: string; distance: number }
  | { type: "drawCards"; team: Team; count: number };

export type FollowUpType = FollowUpEffect["type"];
