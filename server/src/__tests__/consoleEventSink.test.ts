import { describe, expect, it, vi } from "vitest";
import type { CombatEvent } from "@shared/combat/types";
import type { LogOutput } from "../logging/console-event-sink";
import { ConsoleEventSink, formatEvent, parseLogLevel } from "../logging/console-event-sink";

const names: Record<string, string> = { p1: "Gunner", e1: "Brute" };
const nameOf = (id: string): string => names[id] ?? id;

const hit: CombatEvent = {
  type: "attackResolved",
  attackerId: "p1",
  targetId: "e1",
  style: "melee",
  hpDamage: 13,
  moraleDamage: 14,
  breakdown: "13 Base",
};

function fakeOutput(): LogOutput & { log: ReturnType<typeof vi.fn>; error: ReturnType<typeof vi.fn> } {
  return { log: vi.fn(), error: vi.fn() };
}

describe("formatEvent", () => {
  it("names units in the line", () => {
    expect(formatEvent(hit, nameOf)).toBe("Gunner hits Brute (melee) for 13 HP / 14 morale");
    expect(formatEvent({ type: "unitDied", unitId: "e1", killerId: "p1" }, nameOf)).toBe("Brute is killed by Gunner");
    expect(formatEvent({ type: "moraleChanged", unitId: "e1", delta: -14, current: 86 }, nameOf)).toBe(
      "Brute morale -14 -> 86"
    );
    expect(formatEvent({ type: "battleEnded", round: 3, winner: null }, nameOf)).toBe("Battle over in round 3: no winner");
  });
});

describe("parseLogLevel", () => {
  it("defaults to events and rejects unknown levels", () => {
    expect(parseLogLevel(undefined)).toBe("events");
    expect(parseLogLevel("AUDIT")).toBe("audit");
    expect(() => parseLogLevel("loud")).toThrow("COMBAT_LOG_LEVEL must be one of quiet, events, audit (got loud)");
  });
});

describe("ConsoleEventSink", () => {
  it("logs events but not audit lines at the events level", () => {
    const output = fakeOutput();
    const sink = new ConsoleEventSink("events", nameOf, output);
    sink.emit(hit);
    sink.audit(["13 Base"]);

    expect(output.log.mock.calls).toEqual([["[combat] Gunner hits Brute (melee) for 13 HP / 14 morale"]]);
  });

  it("adds audit lines at the audit level", () => {
    const output = fakeOutput();
    const sink = new ConsoleEventSink("audit", nameOf, output);
    sink.audit(["first", "second"]);
    expect(output.log.mock.calls).toEqual([["[audit] first"], ["[audit] second"]]);
  });

  it("stays silent when quiet except for failures", () => {
    const output = fakeOutput();
    const sink = new ConsoleEventSink("quiet", nameOf, output);
    sink.emit(hit);
    sink.failure("Insufficient energy: 0/1");

    expect(output.log).not.toHaveBeenCalled();
    expect(output.error).toHaveBeenCalledWith("[combat] Insufficient energy: 0/1");
  });
});
