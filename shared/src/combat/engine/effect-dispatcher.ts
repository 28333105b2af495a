/**
 * Combat - Follow-up Dispatcher
 *
 * Applies cross-unit follow-ups in the order they were produced. Each
 * application may yield further follow-ups, which join the back of the
 * queue, so ordering stays deterministic.
 */

import type { EnergyCollaborator } from "../types/collaborators";
import type { CombatEvent } from "../types/events";
import type { FollowUpEffect } from "../types/follow-ups";
import type { Team, Unit } from "../types/unit";
import { isActive } from "../types/unit";
import { applyStatusEffect, clearDebuffs, removeStatusEffect } from "./status-ledger";
import { isKnockbackImmune } from "./status-queries";
import { assertNever } from "./status-registry";
import { dealRawDamage, healUnit } from "./unit-vitals";

/** What the dispatcher may read and change. */
export interface DispatchTarget {
  getUnit(id: string): Unit | null;
  getActiveUnits(team: Team): readonly Unit[];
  updateUnit(unit: Unit): void;
  energyFor(team: Team): EnergyCollaborator;
  /** Returns the grog actually taken */
  drainGrog(team: Team, amount: number, cause: string): number;
  emit(event: CombatEvent): void;
}

interface StepOutput {
  updatedUnit: Unit;
  events: CombatEvent[];
  followUps?: FollowUpEffect[];
}

export function dispatchFollowUps(followUps: readonly FollowUpEffect[], target: DispatchTarget): string[] {
  const queue: FollowUpEffect[] = [...followUps];
  const audit: string[] = [];

  const commit = (output: StepOutput, lines: string | string[]): void => {
    target.updateUnit(output.updatedUnit);
    for (const event of output.events) target.emit(event);
    queue.push(...(output.followUps ?? []));
    audit.push(...(Array.isArray(lines) ? lines : [lines]));
  };

  for (let followUp = queue.shift(); followUp !== undefined; followUp = queue.shift()) {
    switch (followUp.type) {
      case "rawDamage": {
        const unit = target.getUnit(followUp.targetId);
        if (unit && isActive(unit)) {
          const result = dealRawDamage(unit, followUp.amount, followUp.sourceId, followUp.cause);
          commit(result, result.audit);
        }
        break;
      }

      case "heal": {
        const unit = target.getUnit(followUp.targetId);
        if (unit) {
          const result = healUnit(unit, followUp.resource, followUp.amount);
          commit(result, result.audit);
        }
        break;
      }

      case "applyStatus": {
        const unit = target.getUnit(followUp.targetId);
        if (unit) {
          const result = applyStatusEffect(unit, followUp.effect);
          commit(result, result.audit);
        }
        break;
      }

      case "applyStatusToTeam":
        for (const unit of target.getActiveUnits(followUp.team)) {
          if (unit.id === followUp.excludeId) continue;
          const result = applyStatusEffect(unit, followUp.effect);
          commit(result, result.audit);
        }
        break;

      case "removeStatus": {
        const unit = target.getUnit(followUp.targetId);
        if (unit) {
          const result = removeStatusEffect(unit, followUp.kind, followUp.reason);
          commit(result, result.audit);
        }
        break;
      }

      case "cleanse": {
        const unit = target.getUnit(followUp.targetId);
        if (unit) {
          const result = clearDebuffs(unit);
          commit(result, result.audit);
        }
        break;
      }

      case "restoreEnergy":
        target.energyFor(followUp.team).refund(followUp.amount);
        audit.push(`${followUp.cause}: ${followUp.team} +${followUp.amount} energy`);
        break;

      case "drainEnergy": {
        const energy = target.energyFor(followUp.team);
        const amount = Math.min(energy.current, Math.max(0, followUp.amount));
        if (amount > 0 && energy.trySpend(amount)) {
          audit.push(`${followUp.cause}: ${followUp.team} -${amount} energy`);
        }
        break;
      }

      case "drainGrog": {
        const drained = target.drainGrog(followUp.team, followUp.amount, followUp.cause);
        if (drained > 0) {
          audit.push(`${followUp.cause}: ${followUp.team} -${drained} grog`);
        }
        break;
      }

      case "knockback": {
        const unit = target.getUnit(followUp.targetId);
        if (unit && isActive(unit) && !isKnockbackImmune(unit.statusEffects)) {
          target.emit({
            type: "knockbackRequested",
            unitId: unit.id,
            sourceId: followUp.sourceId,
            distance: followUp.distance,
          });
          audit.push(`${unit.name} knocked back ${followUp.distance}`);
        }
        break;
      }

      case "drawCards":
        target.emit({ type: "cardDrawRequested", team: followUp.team, count: followUp.count });
        audit.push(`${followUp.team} draws ${followUp.count}`);
        break;

      default:
        return assertNever(followUp, "follow-up effect");
    }
  }

  return audit;
}
