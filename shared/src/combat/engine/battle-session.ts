/**
 * Combat - Battle Session
 *
 * Stateful owner of one battle: the roster, the turn machine, each side's
 * energy pool and the event bus. Every rule lives in the pure engine
 * modules; the session looks units up, calls them, stores the results and
 * publishes what happened.
 */

import type { EnergyCollaborator, TerrainProvider, UnitProvider } from "../types/collaborators";
import { OPEN_GROUND } from "../types/collaborators";
import type { CombatConfig } from "../types/config";
import type { DamageCalculation } from "../types/damage";
import type { CombatEvent } from "../types/events";
import type { FollowUpEffect } from "../types/follow-ups";
import type { ApplyOutcome, StatusEffectInstance } from "../types/status-effects";
import type { TurnState } from "../types/turn";
import type { AttackStyle, Team, Unit } from "../types/unit";
import { TEAMS, isActive } from "../types/unit";
import {
  validateAbility,
  validateAttack,
  validateCanAct,
  validateMove,
  validateTurn,
  getMoveEnergyCost,
} from "../validation/action-validator";
import type { AbilityDefinition, AbilityEffectExecutor } from "./ability-executor";
import { createAbilityEffectExecutor, getAbilityEnergyCost, getStrikeBaseDamage, isStrike } from "./ability-executor";
import type { AttackContext } from "./attack-resolver";
import { previewAttack, resolveAttack } from "./attack-resolver";
import { dispatchFollowUps } from "./effect-dispatcher";
import type { EnergyPool, PoolResult } from "./energy-manager";
import {
  bankEnergy,
  convertUnspentEnergy,
  createEnergyPool,
  drainGrog,
  refillEnergy,
  refundEnergy,
  spendEnergy,
  spendGrog,
} from "./energy-manager";
import { CombatEventBus } from "./event-bus";
import { applyStatusEffect, processUnitMoved } from "./status-ledger";
import { getEconomyModifier, getMissChance } from "./status-queries";
import {
  beginRound,
  checkBattleEnd,
  createTurnState,
  endBattle,
  endSideTurn as advanceSideTurn,
  endUnitTurn,
  hasInitiative,
  markUnitActed,
  startUnitTurn,
} from "./turn-manager";
import { drinkRum as drinkRumVitals } from "./unit-vitals";

export interface BattleSessionOptions {
  config: CombatConfig;
  units: readonly Unit[];
  terrain?: TerrainProvider;
  /** Miss rolls; returns a number in [0, 1) */
  random?: () => number;
  abilityExecutor?: AbilityEffectExecutor;
}

export interface ActionResult {
  success: boolean;
  failureReason?: string;
  audit: string[];
}

function failed(reason: string): ActionResult {
  return { success: false, failureReason: reason, audit: [`FAILED - ${reason}`] };
}

// ═══════════════════════════════════════════════════════════════════════════
// ENERGY COLLABORATOR
// ═══════════════════════════════════════════════════════════════════════════

class SideEnergyAccount implements EnergyCollaborator {
  constructor(
    private readonly team: Team,
    private readonly read: () => EnergyPool,
    private readonly write: (result: PoolResult) => void,
    private readonly isActing: () => boolean
  ) {}

  get current(): number {
    return this.read().current;
  }

  trySpend(amount: number): boolean {
    const result = spendEnergy(this.read(), amount, `${this.team} energy`);
    if (!result.success) return false;
    this.write(result);
    return true;
  }

  /** Off-turn refunds are banked; a refill would otherwise overwrite them. */
  refund(amount: number): void {
    const pool = this.read();
    this.write(
      this.isActing()
        ? refundEnergy(pool, amount, `${this.team} refund`)
        : bankEnergy(pool, amount, `${this.team} refund`)
    );
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// SESSION
// ═══════════════════════════════════════════════════════════════════════════

export class BattleSession implements UnitProvider {
  readonly events = new CombatEventBus();
  readonly auditLog: string[] = [];

  private readonly config: CombatConfig;
  private readonly terrain: TerrainProvider;
  private readonly random: () => number;
  private readonly abilityExecutor: AbilityEffectExecutor;
  private readonly units = new Map<string, Unit>();
  private readonly pools: Record<Team, EnergyPool>;
  private readonly accounts: Record<Team, SideEnergyAccount>;
  private state: TurnState = createTurnState();

  constructor(options: BattleSessionOptions) {
    this.config = options.config;
    this.terrain = options.terrain ?? OPEN_GROUND;
    this.random = options.random ?? Math.random;
    this.abilityExecutor = options.abilityExecutor ?? createAbilityEffectExecutor(options.config);

    for (const unit of options.units) {
      if (this.units.has(unit.id)) {
        throw new Error(`Duplicate unit id in roster: ${unit.id}`);
      }
      this.units.set(unit.id, unit);
    }

    this.pools = { player: createEnergyPool(this.config), enemy: createEnergyPool(this.config) };
    this.accounts = {
      player: this.createAccount("player"),
      enemy: this.createAccount("enemy"),
    };
  }

  // ─── Queries ───

  get turnState(): TurnState {
    return this.state;
  }

  get isOver(): boolean {
    return this.state.phase === "battleEnded";
  }

  getUnit(id: string): Unit | null {
    return this.units.get(id) ?? null;
  }

  getUnits(): Unit[] {
    return [...this.units.values()];
  }

  getActiveUnits(team: Team): readonly Unit[] {
    return this.getUnits().filter((unit) => unit.team === team && isActive(unit));
  }

  getEnergyPool(team: Team): EnergyPool {
    return this.pools[team];
  }

  energyFor(team: Team): EnergyCollaborator {
    return this.accounts[team];
  }

  // ─── Lifecycle ───

  start(): void {
    if (this.state.round > 0) {
      throw new Error("Battle already started");
    }
    this.publish({ type: "battleStarted", unitIds: [...this.units.keys()] });
    this.beginNextRound();
  }

  /** Close the acting side's turn; starts the other side or the next round. */
  endSideTurn(): ActionResult {
    const side = this.state.actingSide;
    if (this.state.phase !== "sideActing" || side === null) {
      return failed(`No side is acting (phase: ${this.state.phase})`);
    }

    const audit: string[] = [];
    for (const unit of this.getActiveUnits(side)) {
      const result = endUnitTurn(unit);
      this.store(result.updatedUnit);
      this.publishAll(result.events);
      audit.push(...result.audit);
    }

    const conversion = convertUnspentEnergy(this.pools[side], this.config);
    this.pools[side] = conversion.updatedPool;
    audit.push(conversion.audit);
    if (conversion.amount > 0) {
      this.publish({ type: "grogChanged", team: side, delta: conversion.amount, current: conversion.updatedPool.grog });
    }
    this.publish({ type: "sideTurnEnded", round: this.state.round, side, grogGained: conversion.amount });
    this.record(audit);

    const advanced = advanceSideTurn(this.state);
    this.state = advanced.newState;
    if (advanced.nextSide !== null) {
      this.startSide(advanced.nextSide);
    } else {
      this.beginNextRound();
    }
    return { success: true, audit };
  }

  // ─── Actions ───

  previewAttack(attackerId: string, targetId: string, style?: AttackStyle): DamageCalculation | null {
    const attacker = this.getUnit(attackerId);
    const target = this.getUnit(targetId);
    if (!attacker || !target) return null;
    return previewAttack(attacker, target, { style }, this.attackContext(attacker));
  }

  /**
   * Spend energy and resolve a basic attack. A rejected attack changes
   * nothing; a miss still costs the energy.
   */
  attack(attackerId: string, targetId: string, style?: AttackStyle): ActionResult {
    const attacker = this.getUnit(attackerId);
    const target = this.getUnit(targetId);
    if (!attacker) return failed(`Unknown unit: ${attackerId}`);
    if (!target) return failed(`Unknown unit: ${targetId}`);

    const attackStyle = style ?? attacker.attackStyle;
    const energy = this.accounts[attacker.team];
    const validation = validateAttack(
      this.state,
      attacker,
      target,
      attackStyle,
      energy.current,
      this.config,
      (id) => this.getUnit(id)
    );
    if (!validation.valid) return failed(validation.errors.join("; "));

    if (!energy.trySpend(this.config.attackEnergyCost)) {
      return failed(`Insufficient energy: ${energy.current}/${this.config.attackEnergyCost}`);
    }
    this.state = markUnitActed(this.state, attacker.id);

    const missChance = getMissChance(attacker.statusEffects);
    if (missChance > 0 && this.random() < missChance) {
      this.store({ ...attacker, attacksThisTurn: attacker.attacksThisTurn + 1, comboCount: 0 });
      this.publish({ type: "attackMissed", attackerId, targetId });
      const audit = [`${attacker.name} misses ${target.name} (${Math.round(missChance * 100)}% miss chance)`];
      this.record(audit);
      return { success: true, audit };
    }

    const resolution = resolveAttack(attacker, target, { style: attackStyle }, this.attackContext(attacker));
    if (!resolution.success) {
      energy.refund(this.config.attackEnergyCost);
      return failed(resolution.failureReason ?? "Attack failed");
    }

    this.store(resolution.updatedAttacker);
    this.store(resolution.updatedTarget);
    this.publishAll(resolution.events);
    const audit = [...resolution.audit, ...this.dispatch(resolution.followUps)];
    this.record(audit);
    this.checkForBattleEnd();
    return { success: true, audit };
  }

  /** The position layer moved a unit; charge for it and run move triggers. */
  moveUnit(unitId: string): ActionResult {
    const unit = this.getUnit(unitId);
    if (!unit) return failed(`Unknown unit: ${unitId}`);

    const energy = this.accounts[unit.team];
    const validation = validateMove(this.state, unit, energy.current, this.config);
    if (!validation.valid) return failed(validation.errors.join("; "));

    const cost = getMoveEnergyCost(unit, this.config);
    if (!energy.trySpend(cost)) {
      return failed(`Insufficient energy: ${energy.current}/${cost}`);
    }

    const result = processUnitMoved(unit);
    this.store(result.updatedUnit);
    this.publish({ type: "unitMoved", unitId });
    this.publishAll(result.events);
    const audit = [...result.audit, ...this.dispatch(result.followUps)];
    this.record(audit);
    this.checkForBattleEnd();
    return { success: true, audit };
  }

  useAbility(casterId: string, targetId: string, ability: AbilityDefinition): ActionResult {
    const caster = this.getUnit(casterId);
    const target = this.getUnit(targetId);
    if (!caster) return failed(`Unknown unit: ${casterId}`);
    if (!target) return failed(`Unknown unit: ${targetId}`);

    const energy = this.accounts[caster.team];
    const validation = validateAbility(this.state, caster, target, ability, energy.current);
    if (!validation.valid) return failed(validation.errors.join("; "));

    const cost = getAbilityEnergyCost(caster, ability);
    if (!energy.trySpend(cost)) {
      return failed(`Insufficient energy: ${energy.current}/${cost}`);
    }
    this.state = markUnitActed(this.state, caster.id);
    this.publish({ type: "abilityUsed", casterId, targetId, abilityId: ability.id });

    const audit: string[] = [`${caster.name} uses ${ability.name} on ${target.name}`];
    for (const descriptor of ability.effects) {
      const currentCaster = this.getUnit(casterId);
      const currentTarget = this.getUnit(targetId);
      if (!currentCaster || !currentTarget || !isActive(currentCaster)) break;

      if (isStrike(descriptor)) {
        if (!isActive(currentTarget)) continue;
        const resolution = resolveAttack(
          currentCaster,
          currentTarget,
          {
            style: descriptor.style,
            baseDamage: getStrikeBaseDamage(currentCaster, descriptor, this.config),
            consumesAmmo: false,
          },
          this.attackContext(currentCaster)
        );
        this.store(resolution.updatedAttacker);
        this.store(resolution.updatedTarget);
        this.publishAll(resolution.events);
        audit.push(...resolution.audit, ...this.dispatch(resolution.followUps));
      } else {
        audit.push(...this.dispatch(this.abilityExecutor.toFollowUps(currentCaster, currentTarget, descriptor)));
      }
    }

    this.record(audit);
    this.checkForBattleEnd();
    return { success: true, audit };
  }

  /** Apply an effect from outside the attack flow (cards, scripted events). */
  applyStatusEffect(targetId: string, effect: StatusEffectInstance): ApplyOutcome | null {
    const unit = this.getUnit(targetId);
    if (!unit) return null;

    const result = applyStatusEffect(unit, effect);
    this.store(result.updatedUnit);
    this.publishAll(result.events);
    this.record([...result.audit, ...this.dispatch(result.followUps)]);
    return result.outcome;
  }

  /** Spend grog on a tot of rum for one unit. */
  drinkRum(unitId: string, resource: "hp" | "morale"): ActionResult {
    const unit = this.getUnit(unitId);
    if (!unit) return failed(`Unknown unit: ${unitId}`);

    const turnCheck = validateTurn(this.state, unit);
    if (!turnCheck.valid) return failed(turnCheck.errors.join("; "));
    const actCheck = validateCanAct(unit);
    if (!actCheck.valid) return failed(actCheck.errors.join("; "));

    const payment = spendGrog(this.pools[unit.team], this.config.rumGrogCost, `${unit.name} rum`);
    if (!payment.success) return failed(payment.failureReason ?? "Insufficient grog");
    this.pools[unit.team] = payment.updatedPool;
    this.publish({ type: "grogChanged", team: unit.team, delta: -payment.amount, current: payment.updatedPool.grog });

    const result = drinkRumVitals(unit, resource, this.config);
    this.store(result.updatedUnit);
    this.publish({ type: "rumConsumed", unitId, resource, amount: result.amount });
    this.publishAll(result.events);
    const audit = [payment.audit, result.audit];
    this.record(audit);
    return { success: true, audit };
  }

  // ─── Internals ───

  private createAccount(team: Team): SideEnergyAccount {
    return new SideEnergyAccount(
      team,
      () => this.pools[team],
      (result) => {
        const delta = result.updatedPool.current - this.pools[team].current;
        this.pools[team] = result.updatedPool;
        this.auditLog.push(result.audit);
        if (delta !== 0) {
          this.publish({ type: "energyChanged", team, delta, current: result.updatedPool.current });
        }
      },
      () => this.state.phase === "sideActing" && this.state.actingSide === team
    );
  }

  private attackContext(attacker: Unit): AttackContext {
    return {
      config: this.config,
      terrain: this.terrain,
      attackerHasInitiative: hasInitiative(this.state, attacker.team),
    };
  }

  private beginNextRound(): void {
    if (this.checkForBattleEnd()) return;

    const { newState, initiative } = beginRound(this.state, this.getUnits(), this.config);
    this.state = newState;
    this.publish({ type: "roundStarted", round: newState.round, initiative });
    this.record([
      `Round ${newState.round}: initiative ${initiative.playerTotal} (player) vs ${initiative.enemyTotal} (enemy)` +
        ` -> ${initiative.firstSide} first${initiative.isTie ? " (tie)" : ""}`,
    ]);
    this.startSide(initiative.firstSide);
  }

  private startSide(side: Team): void {
    const incomeModifier = this.sumSideModifier(side, "energyIncome");
    const refill = refillEnergy(this.pools[side], this.config, incomeModifier);
    this.pools[side] = refill.updatedPool;
    this.publish({ type: "energyChanged", team: side, delta: refill.amount, current: refill.updatedPool.current });

    const audit: string[] = [refill.audit];
    const followUps: FollowUpEffect[] = [];
    for (const unit of this.getActiveUnits(side)) {
      const result = startUnitTurn(unit, this.config);
      this.store(result.updatedUnit);
      this.publishAll(result.events);
      followUps.push(...result.followUps);
      audit.push(...result.audit);
    }
    audit.push(...this.dispatch(followUps));

    this.publish({
      type: "sideTurnStarted",
      round: this.state.round,
      side,
      energy: this.pools[side].current,
      cardDrawModifier: this.sumSideModifier(side, "cardDraw"),
    });
    this.record(audit);
    this.checkForBattleEnd();
  }

  private sumSideModifier(side: Team, axis: "energyIncome" | "cardDraw"): number {
    return this.getActiveUnits(side).reduce((total, unit) => total + getEconomyModifier(unit.statusEffects, axis), 0);
  }

  private dispatch(followUps: readonly FollowUpEffect[]): string[] {
    if (followUps.length === 0) return [];
    return dispatchFollowUps(followUps, {
      getUnit: (id) => this.getUnit(id),
      getActiveUnits: (team) => this.getActiveUnits(team),
      updateUnit: (unit) => this.store(unit),
      energyFor: (team) => this.accounts[team],
      drainGrog: (team, amount, cause) => {
        const result = drainGrog(this.pools[team], amount, cause);
        this.pools[team] = result.updatedPool;
        if (result.amount > 0) {
          this.publish({ type: "grogChanged", team, delta: -result.amount, current: result.updatedPool.grog });
        }
        return result.amount;
      },
      emit: (event) => this.publish(event),
    });
  }

  /** Ends the battle once a side has nobody left in play. */
  private checkForBattleEnd(): boolean {
    if (this.state.phase === "battleEnded") return true;

    const check = checkBattleEnd(this.getUnits());
    if (!check.ended) return false;

    this.state = endBattle(this.state, check.winner);
    this.publish({ type: "battleEnded", round: this.state.round, winner: check.winner });
    this.record([`Battle over: ${check.winner ?? "no"} side wins`]);
    return true;
  }

  private store(unit: Unit): void {
    this.units.set(unit.id, unit);
  }

  private publish(event: CombatEvent): void {
    this.events.emit(event);
  }

  private publishAll(events: readonly CombatEvent[]): void {
    this.events.emitAll(events);
  }

  private record(lines: readonly string[]): void {
    this.auditLog.push(...lines);
  }
}

export function getTeamsInPlay(session: UnitProvider): Team[] {
  return TEAMS.filter((team) => session.getActiveUnits(team).length > 0);
}
