import path from "path";
import dotenv from "dotenv";
import { BattleSession, createUnit } from "@shared/combat/engine";
import type { Env } from "./config/combat-config-loader";
import { loadCombatConfig } from "./config/combat-config-loader";
import { loadBattleContent } from "./content/import";
import { ConsoleEventSink, parseLogLevel } from "./logging/console-event-sink";
import type { AutoBattleResult } from "./simulation/auto-battle";
import { runAutoBattle } from "./simulation/auto-battle";

dotenv.config();

const resolvePath = (value: string | undefined, fallback: string): string =>
  path.resolve(process.cwd(), value ?? fallback);

export function simulate(env: Env): AutoBattleResult {
  const level = parseLogLevel(env.COMBAT_LOG_LEVEL);
  const config = loadCombatConfig({
    filePath: resolvePath(env.COMBAT_CONFIG_PATH, "server/content/combat.yaml"),
    env,
  });
  const content = loadBattleContent(
    resolvePath(env.COMBAT_ROSTER_PATH, "server/content/roster.yaml"),
    resolvePath(env.COMBAT_ABILITIES_PATH, "server/content/abilities.yaml")
  );

  const session = new BattleSession({
    config,
    units: content.roster.units.map((template) => createUnit(template, config)),
  });
  const sink = new ConsoleEventSink(level, (id) => session.getUnit(id)?.name ?? id);
  session.events.subscribe((event) => sink.emit(event));

  const abilityIds = new Map(content.roster.units.map((unit) => [unit.id, unit.abilities]));
  return runAutoBattle(session, {
    config,
    abilitiesFor: (unitId) =>
      (abilityIds.get(unitId) ?? []).flatMap((abilityId) => content.abilities.get(abilityId) ?? []),
    onAudit: (lines) => sink.audit(lines),
    onFailure: (reason) => sink.failure(reason),
  });
}

try {
  const result = simulate(process.env);
  if (result.stalemate) {
    console.log(`Stalemate after ${result.rounds} rounds`);
  } else {
    console.log(`${result.winner ?? "Nobody"} wins after ${result.rounds} rounds`);
  }
} catch (error) {
  console.error("Battle simulation failed:", error instanceof Error ? error.message : error);
  process.exitCode = 1;
}
