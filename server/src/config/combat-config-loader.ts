import type { CombatConfig, Team } from "@shared/combat/types";
import { TEAMS, createCombatConfig, isNumericConfigKey } from "@shared/combat/types";
import { expectArray, expectNumber, expectOneOf, expectRecord, readDocument } from "../content/fields";

export type Env = Record<string, string | undefined>;

const ENV_PREFIX = "COMBAT_";

/** coverReduction -> COVER_REDUCTION, rangedHPMultiplier -> RANGED_HP_MULTIPLIER */
export function toEnvSuffix(key: string): string {
  return key
    .replace(/([a-z0-9])([A-Z])/g, "$1_$2")
    .replace(/([A-Z])([A-Z][a-z])/g, "$1_$2")
    .toUpperCase();
}

function readFocusFireBonuses(value: unknown, where: string): number[] {
  return expectArray(value, where).map((entry, index) => expectNumber(entry, `${where}[${index}]`));
}

/** Reads a YAML or JSON tuning file into config overrides. */
export function loadCombatConfigFile(filePath: string): Partial<CombatConfig> {
  const document = readDocument(filePath);
  if (document === undefined || document === null) return {};

  const record = expectRecord(document, filePath);
  const overrides: Partial<CombatConfig> = {};

  for (const [key, value] of Object.entries(record)) {
    const where = `${filePath}: ${key}`;
    if (isNumericConfigKey(key)) {
      overrides[key] = expectNumber(value, where);
    } else if (key === "initiativeTieBreak") {
      overrides.initiativeTieBreak = expectOneOf<Team>(value, TEAMS, where);
    } else if (key === "focusFireBonuses") {
      overrides.focusFireBonuses = readFocusFireBonuses(value, where);
    } else {
      throw new Error(`${filePath}: unknown config key "${key}"`);
    }
  }

  return overrides;
}

/**
 * Picks COMBAT_* variables that name a config key. Other COMBAT_* variables
 * (paths, log level) are left to their readers.
 */
export function readConfigEnvOverrides(env: Env): Partial<CombatConfig> {
  const overrides: Partial<CombatConfig> = {};

  for (const key of Object.keys(createCombatConfig())) {
    const name = ENV_PREFIX + toEnvSuffix(key);
    const raw = env[name];
    if (raw === undefined || raw.trim() === "") continue;

    if (isNumericConfigKey(key)) {
      overrides[key] = parseEnvNumber(raw, name);
    } else if (key === "initiativeTieBreak") {
      overrides.initiativeTieBreak = expectOneOf<Team>(raw.trim(), TEAMS, name);
    } else if (key === "focusFireBonuses") {
      overrides.focusFireBonuses = raw.split(",").map((part) => parseEnvNumber(part, name));
    }
  }

  return overrides;
}

function parseEnvNumber(raw: string, name: string): number {
  const value = Number(raw.trim());
  if (raw.trim() === "" || !Number.isFinite(value)) {
    throw new Error(`${name} must be a number (got "${raw}")`);
  }
  return value;
}

export interface LoadCombatConfigOptions {
  filePath?: string;
  env?: Env;
}

/** File values first, then environment overrides; validated and frozen. */
export function loadCombatConfig(options: LoadCombatConfigOptions = {}): Readonly<CombatConfig> {
  const fromFile = options.filePath ? loadCombatConfigFile(options.filePath) : {};
  const fromEnv = options.env ? readConfigEnvOverrides(options.env) : {};
  return createCombatConfig({ ...fromFile, ...fromEnv });
}
