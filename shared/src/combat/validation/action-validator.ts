/**
 * Combat - Action Validator
 *
 * Validates that actions are legal given the current turn and unit state.
 * Checks: turn order, ability to act, targets, ammunition, energy.
 */

import type { CombatConfig } from "../types/config";
import type { TurnState } from "../types/turn";
import type { AttackStyle, Unit } from "../types/unit";
import { isActive } from "../types/unit";
import type { AbilityDefinition } from "../engine/ability-executor";
import { getAbilityEnergyCost } from "../engine/ability-executor";
import {
  getMoveCostModifier,
  getTauntSourceId,
  hasStatusEffect,
  isMovementBlocked,
  isUntargetable,
  mustTargetClosest,
} from "../engine/status-queries";

// ═══════════════════════════════════════════════════════════════════════════
// VALIDATION RESULT
// ═══════════════════════════════════════════════════════════════════════════

export interface ValidationResult {
  /** Whether the action is valid */
  valid: boolean;
  /** Error messages if invalid */
  errors: string[];
  /** Warnings that don't prevent the action */
  warnings: string[];
}

function validResult(): ValidationResult {
  return { valid: true, errors: [], warnings: [] };
}

function invalidResult(...errors: string[]): ValidationResult {
  return { valid: false, errors, warnings: [] };
}

function addWarning(result: ValidationResult, warning: string): ValidationResult {
  return { ...result, warnings: [...result.warnings, warning] };
}

export function combineResults(...results: ValidationResult[]): ValidationResult {
  const allErrors = results.flatMap((r) => r.errors);
  const allWarnings = results.flatMap((r) => r.warnings);
  return {
    valid: allErrors.length === 0,
    errors: allErrors,
    warnings: allWarnings,
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// TURN & ACTOR
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Check that it is the unit's side's turn.
 */
export function validateTurn(state: TurnState, unit: Unit): ValidationResult {
  if (state.phase !== "sideActing") {
    return invalidResult(`No side is acting (phase: ${state.phase})`);
  }
  if (state.actingSide !== unit.team) {
    return invalidResult(`It is not ${unit.team}'s turn`);
  }
  return validResult();
}

/**
 * Check that the unit is able to take actions at all.
 */
export function validateCanAct(unit: Unit): ValidationResult {
  if (!unit.alive) {
    return invalidResult(`${unit.name} is dead`);
  }
  if (unit.flags.surrendered) {
    return invalidResult(`${unit.name} has surrendered`);
  }
  if (unit.flags.stunned) {
    return invalidResult(`${unit.name} is stunned`);
  }
  if (hasStatusEffect(unit.statusEffects, "Stasis")) {
    return invalidResult(`${unit.name} is in stasis`);
  }
  return validResult();
}

// ═══════════════════════════════════════════════════════════════════════════
// ATTACKS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Check the target can be attacked by this attacker.
 * Taunted attackers must hit the taunting unit while it is still standing.
 */
export function validateTarget(
  attacker: Unit,
  target: Unit,
  style: AttackStyle,
  findUnit: (id: string) => Unit | null
): ValidationResult {
  if (target.id === attacker.id) {
    return invalidResult("Cannot attack self");
  }
  if (target.team === attacker.team) {
    return invalidResult(`${target.name} is an ally`);
  }
  if (!isActive(target)) {
    return invalidResult(`${target.name} is out of play`);
  }
  if (isUntargetable(target.statusEffects, style === "ranged")) {
    return invalidResult(`${target.name} cannot be targeted`);
  }

  const tauntSourceId = getTauntSourceId(attacker.statusEffects);
  if (tauntSourceId !== null && tauntSourceId !== target.id) {
    const taunter = findUnit(tauntSourceId);
    if (taunter && isActive(taunter)) {
      return invalidResult(`${attacker.name} is taunted by ${taunter.name}`);
    }
  }

  let result = validResult();
  if (mustTargetClosest(attacker.statusEffects)) {
    result = addWarning(result, `${attacker.name} must attack the closest enemy`);
  }
  return result;
}

export function validateAttackResources(
  attacker: Unit,
  style: AttackStyle,
  energyAvailable: number,
  config: CombatConfig
): ValidationResult {
  const errors: string[] = [];

  if (hasStatusEffect(attacker.statusEffects, "Disarmed")) {
    errors.push(`${attacker.name} is disarmed`);
  }
  if (style === "ranged" && attacker.resources.arrows.current <= 0) {
    errors.push(`${attacker.name} has no arrows`);
  }
  if (energyAvailable < config.attackEnergyCost) {
    errors.push(`Insufficient energy: ${energyAvailable}/${config.attackEnergyCost}`);
  }

  return errors.length > 0 ? invalidResult(...errors) : validResult();
}

export function validateAttack(
  state: TurnState,
  attacker: Unit,
  target: Unit,
  style: AttackStyle,
  energyAvailable: number,
  config: CombatConfig,
  findUnit: (id: string) => Unit | null
): ValidationResult {
  const turnCheck = validateTurn(state, attacker);
  if (!turnCheck.valid) return turnCheck;

  const actCheck = validateCanAct(attacker);
  if (!actCheck.valid) return actCheck;

  return combineResults(
    validateTarget(attacker, target, style, findUnit),
    validateAttackResources(attacker, style, energyAvailable, config)
  );
}

// ═══════════════════════════════════════════════════════════════════════════
// MOVEMENT
// ═══════════════════════════════════════════════════════════════════════════

export function getMoveEnergyCost(unit: Unit, config: CombatConfig): number {
  return config.moveEnergyCost + getMoveCostModifier(unit.statusEffects);
}

/**
 * A unit may move during its side's turn until it attacks.
 */
export function validateMove(
  state: TurnState,
  unit: Unit,
  energyAvailable: number,
  config: CombatConfig
): ValidationResult {
  const turnCheck = validateTurn(state, unit);
  if (!turnCheck.valid) return turnCheck;

  const actCheck = validateCanAct(unit);
  if (!actCheck.valid) return actCheck;

  const errors: string[] = [];
  if (state.actedUnitIds.includes(unit.id)) {
    errors.push(`${unit.name} has already attacked this turn`);
  }
  if (unit.flags.trapped) {
    errors.push(`${unit.name} is trapped`);
  }
  if (isMovementBlocked(unit.statusEffects)) {
    errors.push(`${unit.name} cannot move`);
  }
  const cost = getMoveEnergyCost(unit, config);
  if (energyAvailable < cost) {
    errors.push(`Insufficient energy: ${energyAvailable}/${cost}`);
  }

  return errors.length > 0 ? invalidResult(...errors) : validResult();
}

// ═══════════════════════════════════════════════════════════════════════════
// ABILITIES
// ═══════════════════════════════════════════════════════════════════════════

export function validateAbility(
  state: TurnState,
  caster: Unit,
  target: Unit,
  ability: AbilityDefinition,
  energyAvailable: number
): ValidationResult {
  const turnCheck = validateTurn(state, caster);
  if (!turnCheck.valid) return turnCheck;

  const actCheck = validateCanAct(caster);
  if (!actCheck.valid) return actCheck;

  const errors: string[] = [];
  if (hasStatusEffect(caster.statusEffects, "Silenced")) {
    errors.push(`${caster.name} is silenced`);
  }

  switch (ability.targeting) {
    case "self":
      if (target.id !== caster.id) errors.push(`${ability.name} can only target its caster`);
      break;
    case "ally":
      if (target.team !== caster.team) errors.push(`${ability.name} must target an ally`);
      break;
    case "enemy":
      if (target.team === caster.team) errors.push(`${ability.name} must target an enemy`);
      else if (isUntargetable(target.statusEffects, false)) errors.push(`${target.name} cannot be targeted`);
      break;
  }
  if (!isActive(target)) {
    errors.push(`${target.name} is out of play`);
  }

  const cost = getAbilityEnergyCost(caster, ability);
  if (energyAvailable < cost) {
    errors.push(`Insufficient energy: ${energyAvailable}/${cost}`);
  }

  return errors.length > 0 ? invalidResult(...errors) : validResult();
}
