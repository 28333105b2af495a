/**
 * Combat - Validation Module Exports
 */

export {
  // Turn validation
  validateTurn,
  validateCanAct,

  // Attack validation
  validateTarget,
  validateAttackResources,
  validateAttack,

  // Movement validation
  getMoveEnergyCost,
  validateMove,

  // Ability validation
  validateAbility,

  // Helpers
  combineResults,

  // Types
  type ValidationResult,
} from "./action-validator";
