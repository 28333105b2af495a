import fs from "fs";
import os from "os";
import path from "path";
import { fileURLToPath } from "url";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { DEFAULT_COMBAT_CONFIG, NUMERIC_CONFIG_KEYS } from "@shared/combat/types";
import {
  loadCombatConfig,
  loadCombatConfigFile,
  readConfigEnvOverrides,
  toEnvSuffix,
} from "../config/combat-config-loader";

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "combat-config-"));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

function writeFile(name: string, contents: string): string {
  const filePath = path.join(dir, name);
  fs.writeFileSync(filePath, contents, "utf8");
  return filePath;
}

describe("toEnvSuffix", () => {
  it("turns config keys into upper snake case", () => {
    expect(toEnvSuffix("coverReduction")).toBe("COVER_REDUCTION");
    expect(toEnvSuffix("rangedHPMultiplier")).toBe("RANGED_HP_MULTIPLIER");
    expect(toEnvSuffix("firstActionBonusPerSpeed")).toBe("FIRST_ACTION_BONUS_PER_SPEED");
  });
});

describe("readConfigEnvOverrides", () => {
  it("picks only variables that name a config key", () => {
    expect(
      readConfigEnvOverrides({
        COMBAT_ENERGY_PER_TURN: "4",
        COMBAT_INITIATIVE_TIE_BREAK: "enemy",
        COMBAT_FOCUS_FIRE_BONUSES: "0, 0.2",
        COMBAT_LOG_LEVEL: "audit",
        COMBAT_CONFIG_PATH: "elsewhere.yaml",
        COMBAT_COVER_REDUCTION: "",
      })
    ).toEqual({ energyPerTurn: 4, initiativeTieBreak: "enemy", focusFireBonuses: [0, 0.2] });
  });

  it("rejects values that are not numbers", () => {
    expect(() => readConfigEnvOverrides({ COMBAT_COVER_REDUCTION: "lots" })).toThrow(
      'COMBAT_COVER_REDUCTION must be a number (got "lots")'
    );
    expect(() => readConfigEnvOverrides({ COMBAT_INITIATIVE_TIE_BREAK: "random" })).toThrow(
      "COMBAT_INITIATIVE_TIE_BREAK must be one of player, enemy (got random)"
    );
  });
});

describe("loadCombatConfigFile", () => {
  it("reads YAML and JSON", () => {
    const yamlPath = writeFile("combat.yaml", "energyPerTurn: 5\ncoverReduction: 0.2\nfocusFireBonuses: [0, 0.3]\n");
    expect(loadCombatConfigFile(yamlPath)).toEqual({ energyPerTurn: 5, coverReduction: 0.2, focusFireBonuses: [0, 0.3] });

    const jsonPath = writeFile("combat.json", JSON.stringify({ initiativeTieBreak: "enemy" }));
    expect(loadCombatConfigFile(jsonPath)).toEqual({ initiativeTieBreak: "enemy" });
  });

  it("treats an empty file as no overrides", () => {
    expect(loadCombatConfigFile(writeFile("empty.yaml", ""))).toEqual({});
  });

  it("names the file and key it cannot use", () => {
    const unknown = writeFile("unknown.yaml", "bogus: 1\n");
    expect(() => loadCombatConfigFile(unknown)).toThrow(`${unknown}: unknown config key "bogus"`);

    const wrongType = writeFile("wrong.yaml", "energyPerTurn: three\n");
    expect(() => loadCombatConfigFile(wrongType)).toThrow(`${wrongType}: energyPerTurn must be a number`);

    const text = writeFile("combat.txt", "energyPerTurn: 3");
    expect(() => loadCombatConfigFile(text)).toThrow("Unsupported content file extension: .txt");
  });
});

describe("loadCombatConfig", () => {
  it("layers environment overrides over the file and freezes the result", () => {
    const filePath = writeFile("combat.yaml", "energyPerTurn: 5\ncoverReduction: 0.2\n");
    const config = loadCombatConfig({ filePath, env: { COMBAT_ENERGY_PER_TURN: "2" } });

    expect(config.energyPerTurn).toBe(2);
    expect(config.coverReduction).toBe(0.2);
    expect(config.meleeBaseDamage).toBe(10);
    expect(Object.isFrozen(config)).toBe(true);
  });

  it("fails validation for values no battle can run with", () => {
    const filePath = writeFile("combat.yaml", "coverReduction: 2\n");
    expect(() => loadCombatConfig({ filePath })).toThrow(
      "Invalid combat config: coverReduction must be between 0 and 1 (got 2)"
    );
  });

  it("loads the shipped tuning file", () => {
    const shipped = fileURLToPath(new URL("../../content/combat.yaml", import.meta.url));
    expect(loadCombatConfig({ filePath: shipped })).toEqual(DEFAULT_COMBAT_CONFIG);
  });

  it("knows every numeric key by name", () => {
    const numericDefaults = Object.entries(DEFAULT_COMBAT_CONFIG)
      .filter(([, value]) => typeof value === "number")
      .map(([key]) => key);
    expect([...NUMERIC_CONFIG_KEYS]).toEqual(numericDefaults);
  });
});
