import type { CombatEvent, EventSink } from "@shared/combat/types";
import { assertNever } from "@shared/combat/engine";
import { expectOneOf } from "../content/fields";

export type LogLevel = "quiet" | "events" | "audit";

export const LOG_LEVELS: readonly LogLevel[] = ["quiet", "events", "audit"];

export function parseLogLevel(value: string | undefined): LogLevel {
  if (value === undefined || value.trim() === "") return "events";
  return expectOneOf(value.trim().toLowerCase(), LOG_LEVELS, "COMBAT_LOG_LEVEL");
}

export type LogOutput = Pick<Console, "log" | "error">;

type NameLookup = (unitId: string) => string;

export function formatEvent(event: CombatEvent, nameOf: NameLookup): string {
  switch (event.type) {
    case "battleStarted":
      return `Battle started with ${event.unitIds.length} units`;
    case "roundStarted":
      return `Round ${event.round}: ${event.initiative.firstSide} has initiative (${event.initiative.playerTotal} vs ${event.initiative.enemyTotal})`;
    case "sideTurnStarted":
      return `${event.side} turn, ${event.energy} energy`;
    case "sideTurnEnded":
      return `${event.side} turn ends, +${event.grogGained} grog`;
    case "battleEnded":
      return event.winner ? `Battle over in round ${event.round}: ${event.winner} wins` : `Battle over in round ${event.round}: no winner`;
    case "attackResolved":
      return `${nameOf(event.attackerId)} hits ${nameOf(event.targetId)} (${event.style}) for ${event.hpDamage} HP / ${event.moraleDamage} morale`;
    case "attackMissed":
      return `${nameOf(event.attackerId)} misses ${nameOf(event.targetId)}`;
    case "abilityUsed":
      return `${nameOf(event.casterId)} uses ${event.abilityId} on ${nameOf(event.targetId)}`;
    case "unitMoved":
      return `${nameOf(event.unitId)} moves`;
    case "rumConsumed":
      return `${nameOf(event.unitId)} drinks rum, +${event.amount} ${event.resource}`;
    case "unitDamaged":
      return `${nameOf(event.unitId)} takes ${event.amount} (${event.cause})`;
    case "unitHealed":
      return `${nameOf(event.unitId)} recovers ${event.amount} ${event.resource}`;
    case "moraleChanged":
      return `${nameOf(event.unitId)} morale ${event.delta >= 0 ? "+" : ""}${event.delta} -> ${event.current}`;
    case "unitSurrendered":
      return `${nameOf(event.unitId)} surrenders`;
    case "unitDied":
      return event.killerId
        ? `${nameOf(event.unitId)} is killed by ${nameOf(event.killerId)}`
        : `${nameOf(event.unitId)} dies`;
    case "unitStunned":
      return `${nameOf(event.unitId)} is stunned for ${event.turns} turn(s)`;
    case "unitTrapped":
      return `${nameOf(event.unitId)} is trapped`;
    case "statusApplied":
      return `${nameOf(event.unitId)} gains ${event.kind} (${event.outcome}, x${event.stacks})`;
    case "statusResisted":
      return `${nameOf(event.unitId)} ${event.outcome} ${event.kind}`;
    case "statusExpired":
      return `${event.kind} expires on ${nameOf(event.unitId)}`;
    case "statusRemoved":
      return `${event.kind} removed from ${nameOf(event.unitId)} (${event.reason})`;
    case "energyChanged":
      return `${event.team} energy ${event.delta >= 0 ? "+" : ""}${event.delta} -> ${event.current}`;
    case "grogChanged":
      return `${event.team} grog ${event.delta >= 0 ? "+" : ""}${event.delta} -> ${event.current}`;
    case "knockbackRequested":
      return `${nameOf(event.unitId)} knocked back ${event.distance}`;
    case "cardDrawRequested":
      return `${event.team} draws ${event.count} card(s)`;
    default:
      return assertNever(event, "combat event");
  }
}

/**
 * Writes battle output to the console. Events go to `log` at "events" and
 * above; audit lines only at "audit". Failures always go to `error`.
 */
export class ConsoleEventSink implements EventSink {
  constructor(
    private readonly level: LogLevel,
    private readonly nameOf: NameLookup,
    private readonly output: LogOutput = console
  ) {}

  emit(event: CombatEvent): void {
    if (this.level === "quiet") return;
    this.output.log(`[combat] ${formatEvent(event, this.nameOf)}`);
  }

  audit(lines: readonly string[]): void {
    if (this.level !== "audit") return;
    for (const line of lines) {
      this.output.log(`[audit] ${line}`);
    }
  }

  failure(message: string): void {
    this.output.error(`[combat] ${message}`);
  }
}
