/**
 * Combat - Status Effect Ledger
 *
 * Applies, stacks, refreshes, ticks and consumes the status effects a
 * unit carries. Lifecycle hooks:
 * - turn start: clear reactive triggers, DOT/HOT/drain/aura, tick, expire
 * - turn end:   stun countdown
 * - moved:      bleed, movement traps
 * - hit:        marks, curse charges, reflects, once-per-turn reactions
 *
 * Effects that reach other units (reflected damage, aura grants, energy
 * refunds) come back as follow-ups for the dispatcher.
 */

import type { CombatConfig } from "../types/config";
import type { CombatEvent, RemovalReason } from "../types/events";
import type { FollowUpEffect } from "../types/follow-ups";
import type {
  ApplyOutcome,
  StatusEffectInstance,
  StatusEffectKind,
  StatusLedger,
} from "../types/status-effects";
import type { Team, Unit } from "../types/unit";
import { getOpposingTeam, isActive } from "../types/unit";
import {
  AURA_RULES,
  DAMAGE_OVER_TIME_TRIGGERS,
  HEAL_OVER_TIME_RESOURCES,
  RESOURCE_DRAIN_RULES,
  assertNever,
  createStatusEffect,
  isBuff,
  isDebuff,
  isStackable,
} from "./status-registry";
import { getStatusEffect, hasStatusEffect } from "./status-queries";
import { getMeleeBaseDamage, roundHalfAwayFromZero } from "./damage-calculator";
import {
  addArrows,
  addBuzz,
  applyMoraleDamage,
  dealRawDamage,
  healUnit,
  reduceHull,
  removeArrows,
} from "./unit-vitals";

// ═══════════════════════════════════════════════════════════════════════════
// RESULTS
// ═══════════════════════════════════════════════════════════════════════════

export interface LedgerResult {
  updatedUnit: Unit;
  events: CombatEvent[];
  followUps: FollowUpEffect[];
  audit: string[];
}

export interface ApplyResult extends LedgerResult {
  outcome: ApplyOutcome;
}

export interface RemoveResult extends LedgerResult {
  removed: StatusEffectInstance | null;
}

/** Accumulates unit changes, events and follow-ups across one hook. */
class LedgerStep {
  unit: Unit;
  readonly events: CombatEvent[] = [];
  readonly followUps: FollowUpEffect[] = [];
  readonly audit: string[] = [];

  constructor(unit: Unit) {
    this.unit = unit;
  }

  absorb(result: { updatedUnit: Unit; events: CombatEvent[]; audit: string }): void {
    this.unit = result.updatedUnit;
    this.events.push(...result.events);
    this.audit.push(result.audit);
  }

  setLedger(statusEffects: StatusLedger): void {
    this.unit = { ...this.unit, statusEffects };
  }

  finish(): LedgerResult {
    return { updatedUnit: this.unit, events: this.events, followUps: this.followUps, audit: this.audit };
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// MAGNITUDE MERGING
// ═══════════════════════════════════════════════════════════════════════════

type Combine = (existing: number, incoming: number) => number;

const sum: Combine = (a, b) => a + b;

/**
 * Combine the family-specific magnitude of two instances of the same kind.
 * Families without a magnitude come back unchanged.
 */
function mergeMagnitudes(
  existing: StatusEffectInstance,
  incoming: StatusEffectInstance,
  combine: Combine
): StatusEffectInstance {
  switch (existing.family) {
    case "damageOverTime":
      return incoming.family === existing.family
        ? { ...existing, damagePerTick: combine(existing.damagePerTick, incoming.damagePerTick) }
        : existing;
    case "healOverTime":
      return incoming.family === existing.family
        ? { ...existing, amountPerTick: combine(existing.amountPerTick, incoming.amountPerTick) }
        : existing;
    case "statModifier":
      return incoming.family === existing.family
        ? { ...existing, amount: combine(existing.amount, incoming.amount) }
        : existing;
    case "damageModifier":
      return incoming.family === existing.family
        ? { ...existing, percent: combine(existing.percent, incoming.percent) }
        : existing;
    case "marker":
      return incoming.family === existing.family
        ? {
            ...existing,
            bonusPercent: combine(existing.bonusPercent, incoming.bonusPercent),
            energyOnConsume: combine(existing.energyOnConsume, incoming.energyOnConsume),
          }
        : existing;
    case "charged":
      return incoming.family === existing.family
        ? {
            ...existing,
            charges: combine(existing.charges, incoming.charges),
            magnitude: combine(existing.magnitude, incoming.magnitude),
          }
        : existing;
    case "reactive":
    case "movement":
    case "targeting":
    case "aura":
      return incoming.family === existing.family
        ? { ...existing, magnitude: combine(existing.magnitude, incoming.magnitude) }
        : existing;
    case "resourceDrain":
      return incoming.family === existing.family
        ? { ...existing, amountPerTick: combine(existing.amountPerTick, incoming.amountPerTick) }
        : existing;
    case "surrenderModifier":
      return incoming.family === existing.family
        ? { ...existing, thresholdDelta: combine(existing.thresholdDelta, incoming.thresholdDelta) }
        : existing;
    case "economy":
      return incoming.family === existing.family
        ? { ...existing, amount: combine(existing.amount, incoming.amount) }
        : existing;
    case "control":
    case "condition":
      return existing;
    default:
      return assertNever(existing, "status effect family");
  }
}

/** null is permanent, so it outlasts any count. */
function longerDuration(a: number | null, b: number | null): number | null {
  if (a === null || b === null) return null;
  return Math.max(a, b);
}

/**
 * Whether an incoming instance would last strictly longer. Charge-bound
 * effects with no duration compare by charges.
 */
function outlasts(incoming: StatusEffectInstance, existing: StatusEffectInstance): boolean {
  const a = incoming.remainingDuration;
  const b = existing.remainingDuration;
  if (a !== null && b !== null) return a > b;
  if (a === null && b !== null) return true;
  if (a !== null && b === null) return false;
  if (incoming.family === "charged" && existing.family === "charged") {
    return incoming.charges > existing.charges;
  }
  return false;
}

function replaceEffect(ledger: StatusLedger, effect: StatusEffectInstance): StatusLedger {
  return ledger.map((current) => (current.kind === effect.kind ? effect : current));
}

function withoutKind(ledger: StatusLedger, kind: StatusEffectKind): StatusLedger {
  return ledger.filter((effect) => effect.kind !== kind);
}

// ═══════════════════════════════════════════════════════════════════════════
// APPLY / REMOVE
// ═══════════════════════════════════════════════════════════════════════════

function rejected(unit: Unit, effect: StatusEffectInstance, outcome: "resisted" | "immune" | "ineligible", reason: string): ApplyResult {
  return {
    outcome,
    updatedUnit: unit,
    events: [{ type: "statusResisted", unitId: unit.id, kind: effect.kind, outcome }],
    followUps: [],
    audit: [`${unit.name}: ${effect.name} ${outcome} (${reason})`],
  };
}

/** The stun countdown never runs shorter than the Stunned entry. */
function extendStun(step: LedgerStep, effect: StatusEffectInstance): void {
  const turns = Math.max(step.unit.stunTurnsRemaining, effect.remainingDuration ?? 1);
  step.unit = { ...step.unit, stunTurnsRemaining: turns, flags: { ...step.unit.flags, stunned: true } };
  step.events.push({ type: "unitStunned", unitId: step.unit.id, turns });
  step.audit.push(`${step.unit.name} stunned for ${turns} turn(s)`);
}

/** Side effects that happen once, when a kind first lands on a unit. */
function onInserted(step: LedgerStep, effect: StatusEffectInstance): void {
  if (effect.kind === "Stunned") {
    extendStun(step, effect);
  } else if (effect.kind === "Snared") {
    step.unit = { ...step.unit, flags: { ...step.unit.flags, trapped: true } };
    step.events.push({ type: "unitTrapped", unitId: step.unit.id });
    step.audit.push(`${step.unit.name} is snared`);
  }
}

/**
 * Add an effect to a unit's ledger.
 *
 * - Dead or surrendered units, units in Stasis, and buffs on heal-blocked
 *   units reject it.
 * - A stackable kind already present gains a stack, sums magnitudes and
 *   keeps the longer duration.
 * - A non-stackable kind already present refreshes only when the new
 *   instance outlasts it, taking the larger magnitude.
 */
export function applyStatusEffect(unit: Unit, effect: StatusEffectInstance): ApplyResult {
  if (!isActive(unit)) {
    return rejected(unit, effect, "ineligible", "out of play");
  }
  if (hasStatusEffect(unit.statusEffects, "Stasis")) {
    return rejected(unit, effect, "immune", "in stasis");
  }
  if (isBuff(effect.kind) && hasStatusEffect(unit.statusEffects, "HealBlock")) {
    return rejected(unit, effect, "resisted", "heal blocked");
  }

  const step = new LedgerStep(unit);
  const existing = getStatusEffect(unit.statusEffects, effect.kind);

  if (existing && isStackable(effect.kind)) {
    const stacked: StatusEffectInstance = {
      ...mergeMagnitudes(existing, effect, sum),
      stacks: existing.stacks + effect.stacks,
      remainingDuration: longerDuration(existing.remainingDuration, effect.remainingDuration),
    };
    step.setLedger(replaceEffect(unit.statusEffects, stacked));
    step.events.push({ type: "statusApplied", unitId: unit.id, kind: effect.kind, outcome: "stacked", stacks: stacked.stacks });
    step.audit.push(`${unit.name}: ${effect.name} stacked x${stacked.stacks}`);
    return { ...step.finish(), outcome: "stacked" };
  }

  if (existing) {
    if (!outlasts(effect, existing)) {
      step.audit.push(`${unit.name}: ${effect.name} unchanged (existing lasts as long)`);
      return { ...step.finish(), outcome: "unchanged" };
    }
    const refreshed: StatusEffectInstance = {
      ...mergeMagnitudes(existing, effect, Math.max),
      remainingDuration: effect.remainingDuration,
      sourceId: effect.sourceId,
    };
    step.setLedger(replaceEffect(unit.statusEffects, refreshed));
    step.events.push({ type: "statusApplied", unitId: unit.id, kind: effect.kind, outcome: "refreshed", stacks: refreshed.stacks });
    step.audit.push(`${unit.name}: ${effect.name} refreshed (${refreshed.remainingDuration ?? "permanent"})`);
    if (refreshed.kind === "Stunned") extendStun(step, refreshed);
    return { ...step.finish(), outcome: "refreshed" };
  }

  step.setLedger([...unit.statusEffects, effect]);
  step.events.push({ type: "statusApplied", unitId: unit.id, kind: effect.kind, outcome: "applied", stacks: effect.stacks });
  step.audit.push(`${unit.name}: ${effect.name} applied`);
  onInserted(step, effect);
  return { ...step.finish(), outcome: "applied" };
}

/** Take a kind off the ledger, undoing its flag if it set one. */
export function removeStatusEffect(
  unit: Unit,
  kind: StatusEffectKind,
  reason: RemovalReason = "dispelled"
): RemoveResult {
  const existing = getStatusEffect(unit.statusEffects, kind);
  if (!existing) {
    return { updatedUnit: unit, events: [], followUps: [], audit: [], removed: null };
  }

  const step = new LedgerStep(unit);
  step.setLedger(withoutKind(unit.statusEffects, kind));
  if (kind === "Stunned") {
    step.unit = { ...step.unit, stunTurnsRemaining: 0, flags: { ...step.unit.flags, stunned: false } };
  } else if (kind === "Snared") {
    step.unit = { ...step.unit, flags: { ...step.unit.flags, trapped: false } };
  }
  step.events.push({ type: "statusRemoved", unitId: unit.id, kind, reason });
  step.audit.push(`${unit.name}: ${existing.name} removed (${reason})`);
  return { ...step.finish(), removed: existing };
}

/** Remove every debuff. */
export function clearDebuffs(unit: Unit): LedgerResult {
  const step = new LedgerStep(unit);
  for (const effect of unit.statusEffects) {
    if (!isDebuff(effect.kind)) continue;
    const result = removeStatusEffect(step.unit, effect.kind, "cleansed");
    step.unit = result.updatedUnit;
    step.events.push(...result.events);
    step.audit.push(...result.audit);
  }
  return step.finish();
}

// ═══════════════════════════════════════════════════════════════════════════
// TURN START
// ═══════════════════════════════════════════════════════════════════════════

function applyTurnStartEffect(step: LedgerStep, effect: StatusEffectInstance, config: CombatConfig): void {
  const owner = step.unit;

  switch (effect.family) {
    case "damageOverTime":
      if (DAMAGE_OVER_TIME_TRIGGERS[effect.kind] === "turnStart") {
        step.absorb(dealRawDamage(owner, roundHalfAwayFromZero(effect.damagePerTick), effect.sourceId, effect.name));
      }
      return;

    case "healOverTime":
      step.absorb(healUnit(owner, HEAL_OVER_TIME_RESOURCES[effect.kind], roundHalfAwayFromZero(effect.amountPerTick)));
      return;

    case "resourceDrain": {
      const amount = roundHalfAwayFromZero(effect.amountPerTick);
      const resource = RESOURCE_DRAIN_RULES[effect.kind];
      switch (resource) {
        case "energy":
          step.followUps.push({ type: "drainEnergy", team: owner.team, amount, cause: effect.name });
          return;
        case "grog":
          step.followUps.push({ type: "drainGrog", team: owner.team, amount, cause: effect.name });
          return;
        case "morale":
          step.absorb(applyMoraleDamage(owner, amount, config, effect.sourceId));
          return;
        case "buzz":
          step.unit = addBuzz(owner, amount);
          step.audit.push(`${effect.name}: ${owner.name} +${amount} buzz`);
          return;
        case "hull":
          step.unit = reduceHull(owner, amount);
          step.audit.push(`${effect.name}: ${owner.name} -${amount} hull`);
          return;
        case "arrows":
          step.unit = removeArrows(owner, amount);
          step.audit.push(`${effect.name}: ${owner.name} -${amount} arrows`);
          return;
        default:
          return assertNever(resource, "drained resource");
      }
    }

    case "aura": {
      const rule = AURA_RULES[effect.kind];
      const team: Team = rule.affects === "allies" ? owner.team : getOpposingTeam(owner.team);
      step.followUps.push({
        type: "applyStatusToTeam",
        team,
        excludeId: rule.affects === "allies" ? owner.id : null,
        effect: createStatusEffect(
          { kind: rule.grants, duration: rule.grantDuration, magnitude: effect.magnitude },
          owner.id
        ),
      });
      step.audit.push(`${effect.name}: grants ${rule.grants} to ${rule.affects}`);
      return;
    }

    case "economy":
      if (effect.kind === "QuickReload") {
        step.unit = addArrows(owner, effect.amount);
        step.audit.push(`${effect.name}: ${owner.name} +${effect.amount} arrows`);
      }
      return;

    case "statModifier":
    case "damageModifier":
    case "marker":
    case "charged":
    case "reactive":
    case "control":
    case "condition":
    case "movement":
    case "targeting":
    case "surrenderModifier":
      return;

    default:
      return assertNever(effect, "status effect family");
  }
}

/**
 * Owner's turn start. Reactive triggers reset first, then each effect
 * acts, then every timed effect loses a turn; expired ones are removed
 * only after the whole pass.
 */
export function processTurnStart(unit: Unit, config: CombatConfig): LedgerResult {
  const step = new LedgerStep(unit);
  if (!isActive(unit)) return step.finish();

  step.setLedger(
    unit.statusEffects.map((effect) =>
      effect.family === "reactive" && effect.triggeredThisTurn ? { ...effect, triggeredThisTurn: false } : effect
    )
  );

  for (const effect of step.unit.statusEffects) {
    applyTurnStartEffect(step, effect, config);
  }

  const ticked = step.unit.statusEffects.map((effect) =>
    effect.remainingDuration === null ? effect : { ...effect, remainingDuration: effect.remainingDuration - 1 }
  );
  const expired = ticked.filter((effect) => effect.remainingDuration !== null && effect.remainingDuration <= 0);
  step.setLedger(ticked.filter((effect) => effect.remainingDuration === null || effect.remainingDuration > 0));

  for (const effect of expired) {
    step.events.push({ type: "statusExpired", unitId: unit.id, kind: effect.kind });
    step.audit.push(`${unit.name}: ${effect.name} expired`);
  }

  return step.finish();
}

// ═══════════════════════════════════════════════════════════════════════════
// TURN END
// ═══════════════════════════════════════════════════════════════════════════

/** Counts the stun down. Nothing else ticks here. */
export function processTurnEnd(unit: Unit): LedgerResult {
  const step = new LedgerStep(unit);
  if (unit.stunTurnsRemaining <= 0) return step.finish();

  const remaining = unit.stunTurnsRemaining - 1;
  step.unit = {
    ...unit,
    stunTurnsRemaining: remaining,
    flags: { ...unit.flags, stunned: remaining > 0 },
  };
  step.audit.push(remaining > 0 ? `${unit.name} stunned (${remaining} left)` : `${unit.name} recovers from stun`);
  return step.finish();
}

// ═══════════════════════════════════════════════════════════════════════════
// MOVEMENT
// ═══════════════════════════════════════════════════════════════════════════

export function processUnitMoved(unit: Unit): LedgerResult {
  const step = new LedgerStep(unit);
  if (!isActive(unit)) return step.finish();

  for (const effect of unit.statusEffects) {
    if (effect.family === "damageOverTime" && DAMAGE_OVER_TIME_TRIGGERS[effect.kind] === "moved") {
      step.absorb(dealRawDamage(step.unit, roundHalfAwayFromZero(effect.damagePerTick), effect.sourceId, effect.name));
    } else if (effect.kind === "MovementTrap" && effect.family === "movement") {
      const damage = roundHalfAwayFromZero(step.unit.resources.hp.current * effect.magnitude);
      step.absorb(dealRawDamage(step.unit, damage, effect.sourceId, effect.name));
      const removed = removeStatusEffect(step.unit, effect.kind, "consumed");
      step.unit = removed.updatedUnit;
      step.events.push(...removed.events);
      step.audit.push(...removed.audit);
    }
  }

  return step.finish();
}

// ═══════════════════════════════════════════════════════════════════════════
// ON HIT
// ═══════════════════════════════════════════════════════════════════════════

export interface HitContext {
  attackerId: string;
  attackerTeam: Team;
  /** Base damage of the hit before any modifier */
  rawDamage: number;
  isMelee: boolean;
}

function spendCharge(step: LedgerStep, kind: StatusEffectKind): void {
  const current = getStatusEffect(step.unit.statusEffects, kind);
  if (!current || current.family !== "charged") return;

  const charges = current.charges - 1;
  if (charges <= 0) {
    const removed = removeStatusEffect(step.unit, kind, "depleted");
    step.unit = removed.updatedUnit;
    step.events.push(...removed.events);
    step.audit.push(...removed.audit);
    return;
  }
  step.setLedger(replaceEffect(step.unit.statusEffects, { ...current, charges }));
  step.audit.push(`${step.unit.name}: ${current.name} ${charges} charge(s) left`);
}

function triggerReaction(step: LedgerStep, kind: StatusEffectKind, hit: HitContext, config: CombatConfig): void {
  const effect = getStatusEffect(step.unit.statusEffects, kind);
  if (!effect || effect.family !== "reactive" || effect.triggeredThisTurn) return;
  if (!isActive(step.unit)) return;
  if (effect.kind === "Riposte" && !hit.isMelee) return;

  const owner = step.unit;
  switch (effect.kind) {
    case "CounterAttack":
    case "Riposte":
      step.followUps.push({
        type: "rawDamage",
        targetId: hit.attackerId,
        amount: roundHalfAwayFromZero(getMeleeBaseDamage(owner, config) * effect.magnitude),
        sourceId: owner.id,
        cause: effect.name,
      });
      break;
    case "KnockbackOnHit":
      step.followUps.push({ type: "knockback", targetId: hit.attackerId, sourceId: owner.id, distance: effect.magnitude });
      break;
    case "DrawCardOnHit":
      step.followUps.push({ type: "drawCards", team: owner.team, count: effect.magnitude });
      break;
    case "EnergyOnHit":
      step.followUps.push({ type: "restoreEnergy", team: owner.team, amount: effect.magnitude, cause: effect.name });
      break;
    case "Vengeance":
      step.followUps.push({
        type: "applyStatus",
        targetId: owner.id,
        effect: createStatusEffect({ kind: "DamageBoost", duration: 1, magnitude: effect.magnitude }, owner.id),
      });
      break;
    default:
      return assertNever(effect, "reactive kind");
  }

  step.setLedger(replaceEffect(step.unit.statusEffects, { ...effect, triggeredThisTurn: true }));
  step.audit.push(`${owner.name}: ${effect.name} triggers against ${hit.attackerId}`);
}

/**
 * Called once per incoming attack after its damage landed, whether or not
 * the unit survived. Marks are consumed even on a killing blow; reactions
 * only fire while the unit is still standing.
 */
export function processHit(unit: Unit, hit: HitContext, config: CombatConfig): LedgerResult {
  const step = new LedgerStep(unit);

  for (const effect of unit.statusEffects) {
    switch (effect.family) {
      case "marker": {
        const removed = removeStatusEffect(step.unit, effect.kind, "consumed");
        step.unit = removed.updatedUnit;
        step.events.push(...removed.events);
        step.audit.push(...removed.audit);
        if (effect.energyOnConsume > 0) {
          step.followUps.push({
            type: "restoreEnergy",
            team: hit.attackerTeam,
            amount: effect.energyOnConsume,
            cause: effect.name,
          });
        }
        break;
      }

      case "charged":
        if (effect.kind === "Reflecting") {
          const reflected = roundHalfAwayFromZero(hit.rawDamage * effect.magnitude);
          if (reflected > 0) {
            step.followUps.push({ type: "rawDamage", targetId: hit.attackerId, amount: reflected, sourceId: unit.id, cause: effect.name });
          }
        } else if (effect.kind === "Thorns") {
          step.followUps.push({
            type: "rawDamage",
            targetId: hit.attackerId,
            amount: roundHalfAwayFromZero(effect.magnitude),
            sourceId: unit.id,
            cause: effect.name,
          });
        }
        spendCharge(step, effect.kind);
        break;

      case "reactive":
        triggerReaction(step, effect.kind, hit, config);
        break;

      default:
        break;
    }
  }

  return step.finish();
}
