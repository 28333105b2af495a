/**
 * Combat - Configuration
 *
 * Tuning constants for one battle. Built once with createCombatConfig,
 * frozen, and passed by reference to every engine function that needs it.
 */

import type { Team } from "./unit";

export interface CombatConfig {
  // Base damage
  meleeBaseDamage: number;
  rangedBaseDamage: number;
  /** Fraction of the floor added per point of Power (melee) */
  powerScalingPercent: number;
  /** Fraction of the floor added per point of Aim (ranged) */
  aimScalingPercent: number;
  drunkDamageMultiplier: number;

  // Damage pipeline
  coverReduction: number;
  rangedHPMultiplier: number;
  meleeMoraleMultiplier: number;
  exposedDamageMultiplier: number;
  curseMultiplier: number;
  curseCharges: number;
  /** Morale bonus indexed by focus-fire stacks; the last index is the cap */
  focusFireBonuses: readonly number[];
  returnDamageFraction: number;

  // Initiative
  initiativeTieBreak: Team;
  firstActionBonusPerSpeed: number;
  firstActionBonusCap: number;

  // Combos
  comboSkillMultiplier: number;
  comboStepMin: number;
  comboStepMax: number;
  maxComboChain: number;

  // Grit damage reduction
  gritLowHPWeight: number;
  gritMoraleWeight: number;
  gritPerPointPercent: number;
  gritReductionCap: number;

  // Hull
  hullPerPoint: number;
  hullAbsorbPercent: number;

  // Morale
  surrenderThreshold: number;

  // Energy & grog
  energyPerTurn: number;
  attackEnergyCost: number;
  moveEnergyCost: number;
  grogPerUnspentEnergy: number;

  // Buzz & rum
  maxBuzz: number;
  buzzPerDrink: number;
  buzzDecayPerTurn: number;
  buzzDecayOnAttack: number;
  healthRumRestore: number;
  moraleRumRestore: number;
  rumGrogCost: number;

  // Ammunition
  defaultMaxArrows: number;

  // Abilities
  tacticsScalingPercent: number;
}

export const DEFAULT_COMBAT_CONFIG: CombatConfig = {
  meleeBaseDamage: 10,
  rangedBaseDamage: 8,
  powerScalingPercent: 0.01,
  aimScalingPercent: 0.01,
  drunkDamageMultiplier: 0.8,

  coverReduction: 0.1,
  rangedHPMultiplier: 1.1,
  meleeMoraleMultiplier: 1.1,
  exposedDamageMultiplier: 1.2,
  curseMultiplier: 1.5,
  curseCharges: 2,
  focusFireBonuses: [0, 0, 0.1, 0.25, 0.45, 0.65],
  returnDamageFraction: 0.5,

  initiativeTieBreak: "player",
  firstActionBonusPerSpeed: 0.002,
  firstActionBonusCap: 0.15,

  comboSkillMultiplier: 0.002,
  comboStepMin: 0.05,
  comboStepMax: 0.15,
  maxComboChain: 3,

  gritLowHPWeight: 0.5,
  gritMoraleWeight: 0.4,
  gritPerPointPercent: 0.01,
  gritReductionCap: 0.3,

  hullPerPoint: 10,
  hullAbsorbPercent: 0.5,

  surrenderThreshold: 20,

  energyPerTurn: 3,
  attackEnergyCost: 1,
  moveEnergyCost: 0,
  grogPerUnspentEnergy: 1,

  maxBuzz: 100,
  buzzPerDrink: 30,
  buzzDecayPerTurn: 15,
  buzzDecayOnAttack: 25,
  healthRumRestore: 20,
  moraleRumRestore: 20,
  rumGrogCost: 1,

  defaultMaxArrows: 10,

  tacticsScalingPercent: 0.01,
};

export type NumericConfigKey = {
  [K in keyof CombatConfig]: CombatConfig[K] extends number ? K : never;
}[keyof CombatConfig];

/** Every numeric key, for loaders that override values by name. */
export const NUMERIC_CONFIG_KEYS = [
  "meleeBaseDamage",
  "rangedBaseDamage",
  "powerScalingPercent",
  "aimScalingPercent",
  "drunkDamageMultiplier",
  "coverReduction",
  "rangedHPMultiplier",
  "meleeMoraleMultiplier",
  "exposedDamageMultiplier",
  "curseMultiplier",
  "curseCharges",
  "returnDamageFraction",
  "firstActionBonusPerSpeed",
  "firstActionBonusCap",
  "comboSkillMultiplier",
  "comboStepMin",
  "comboStepMax",
  "maxComboChain",
  "gritLowHPWeight",
  "gritMoraleWeight",
  "gritPerPointPercent",
  "gritReductionCap",
  "hullPerPoint",
  "hullAbsorbPercent",
  "surrenderThreshold",
  "energyPerTurn",
  "attackEnergyCost",
  "moveEnergyCost",
  "grogPerUnspentEnergy",
  "maxBuzz",
  "buzzPerDrink",
  "buzzDecayPerTurn",
  "buzzDecayOnAttack",
  "healthRumRestore",
  "moraleRumRestore",
  "rumGrogCost",
  "defaultMaxArrows",
  "tacticsScalingPercent",
] as const satisfies readonly NumericConfigKey[];

export function isNumericConfigKey(key: string): key is NumericConfigKey {
  return NUMERIC_CONFIG_KEYS.some((candidate) => candidate === key);
}

const FRACTION_KEYS: readonly NumericConfigKey[] = [
  "coverReduction",
  "returnDamageFraction",
  "gritReductionCap",
  "hullAbsorbPercent",
  "firstActionBonusCap",
];

/**
 * Merge overrides onto the defaults, validate, and freeze.
 * Throws on values no battle could run with.
 */
export function createCombatConfig(overrides: Partial<CombatConfig> = {}): Readonly<CombatConfig> {
  const config: CombatConfig = {
    ...DEFAULT_COMBAT_CONFIG,
    ...overrides,
    focusFireBonuses: [...(overrides.focusFireBonuses ?? DEFAULT_COMBAT_CONFIG.focusFireBonuses)],
  };

  const errors = validateCombatConfig(config);
  if (errors.length > 0) {
    throw new Error(`Invalid combat config: ${errors.join("; ")}`);
  }

  Object.freeze(config.focusFireBonuses);
  return Object.freeze(config);
}

export function validateCombatConfig(config: CombatConfig): string[] {
  const errors: string[] = [];

  for (const [key, value] of Object.entries(config)) {
    if (typeof value === "number" && (!Number.isFinite(value) || value < 0)) {
      errors.push(`${key} must be a non-negative finite number (got ${value})`);
    }
  }

  for (const key of FRACTION_KEYS) {
    if (config[key] > 1) {
      errors.push(`${key} must be between 0 and 1 (got ${config[key]})`);
    }
  }

  if (config.focusFireBonuses.length === 0) {
    errors.push("focusFireBonuses must have at least one entry");
  }
  if (config.focusFireBonuses.some((bonus) => !Number.isFinite(bonus))) {
    errors.push("focusFireBonuses must contain only finite numbers");
  }
  if (config.comboStepMin > config.comboStepMax) {
    errors.push("comboStepMin must not exceed comboStepMax");
  }
  if (config.maxComboChain < 1) {
    errors.push("maxComboChain must be at least 1");
  }
  if (config.initiativeTieBreak !== "player" && config.initiativeTieBreak !== "enemy") {
    errors.push(`initiativeTieBreak must be "player" or "enemy"`);
  }

  return errors;
}
