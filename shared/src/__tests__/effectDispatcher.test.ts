import { beforeEach, describe, expect, it } from "vitest";
import type { DispatchTarget } from "@shared/combat/engine/effect-dispatcher";
import { dispatchFollowUps } from "@shared/combat/engine/effect-dispatcher";
import { hasStatusEffect } from "@shared/combat/engine/status-queries";
import { createFire, createStatusEffect } from "@shared/combat/engine/status-registry";
import type { EnergyCollaborator } from "@shared/combat/types/collaborators";
import type { CombatEvent } from "@shared/combat/types/events";
import type { Team, Unit } from "@shared/combat/types/unit";
import { isActive } from "@shared/combat/types/unit";
import { createEnemyUnit, createTestUnit, resetUnitCounter, withEffects } from "../test-utils/factories/unitFactory";

class FakeEnergy implements EnergyCollaborator {
  readonly calls: string[] = [];
  constructor(public current: number) {}

  trySpend(amount: number): boolean {
    this.calls.push(`spend ${amount}`);
    if (amount > this.current) return false;
    this.current -= amount;
    return true;
  }

  refund(amount: number): void {
    this.calls.push(`refund ${amount}`);
    this.current += amount;
  }
}

class FakeBattlefield implements DispatchTarget {
  readonly units = new Map<string, Unit>();
  readonly events: CombatEvent[] = [];
  readonly energy: Record<Team, FakeEnergy> = { player: new FakeEnergy(3), enemy: new FakeEnergy(3) };
  readonly grogDrains: string[] = [];
  readonly grog: Record<Team, number> = { player: 0, enemy: 1 };

  constructor(units: Unit[]) {
    for (const unit of units) this.units.set(unit.id, unit);
  }

  getUnit(id: string): Unit | null {
    return this.units.get(id) ?? null;
  }

  getActiveUnits(team: Team): readonly Unit[] {
    return [...this.units.values()].filter((unit) => unit.team === team && isActive(unit));
  }

  updateUnit(unit: Unit): void {
    this.units.set(unit.id, unit);
  }

  energyFor(team: Team): EnergyCollaborator {
    return this.energy[team];
  }

  drainGrog(team: Team, amount: number, cause: string): number {
    this.grogDrains.push(`${team} ${amount} ${cause}`);
    const drained = Math.min(this.grog[team], amount);
    this.grog[team] -= drained;
    return drained;
  }

  emit(event: CombatEvent): void {
    this.events.push(event);
  }

  hp(id: string): number | undefined {
    return this.units.get(id)?.resources.hp.current;
  }
}

beforeEach(() => {
  resetUnitCounter();
});

describe("dispatchFollowUps", () => {
  it("applies raw damage and heals in order", () => {
    const field = new FakeBattlefield([createTestUnit({ id: "a" })]);
    dispatchFollowUps(
      [
        { type: "rawDamage", targetId: "a", amount: 30, sourceId: "b", cause: "Thorns" },
        { type: "heal", targetId: "a", resource: "hp", amount: 10 },
      ],
      field
    );

    expect(field.hp("a")).toBe(80);
    expect(field.events.map((event) => event.type)).toEqual(["unitDamaged", "unitHealed"]);
  });

  it("skips raw damage against units already out of play", () => {
    const field = new FakeBattlefield([createTestUnit({ id: "a", alive: false })]);
    const audit = dispatchFollowUps([{ type: "rawDamage", targetId: "a", amount: 5, sourceId: null, cause: "Thorns" }], field);
    expect(audit).toEqual([]);
    expect(field.events).toEqual([]);
  });

  it("grants team effects to active allies except the source", () => {
    const field = new FakeBattlefield([
      createTestUnit({ id: "captain" }),
      createTestUnit({ id: "mate" }),
      createTestUnit({ id: "fallen", alive: false }),
      createEnemyUnit({ id: "foe" }),
    ]);
    const rallying = createStatusEffect({ kind: "Rallying", duration: 1, magnitude: 4 }, "captain");

    dispatchFollowUps([{ type: "applyStatusToTeam", team: "player", excludeId: "captain", effect: rallying }], field);

    const has = (id: string): boolean => hasStatusEffect(field.getUnit(id)?.statusEffects ?? [], "Rallying");
    expect(has("mate")).toBe(true);
    expect(has("captain")).toBe(false);
    expect(has("fallen")).toBe(false);
    expect(has("foe")).toBe(false);
  });

  it("removes and cleanses status effects", () => {
    const field = new FakeBattlefield([
      withEffects(createTestUnit({ id: "a" }), createFire(2, 2), createStatusEffect({ kind: "Exposed", duration: 2 })),
    ]);
    dispatchFollowUps([{ type: "removeStatus", targetId: "a", kind: "Exposed", reason: "dispelled" }], field);
    expect(field.getUnit("a")?.statusEffects.map((effect) => effect.kind)).toEqual(["Fire"]);

    dispatchFollowUps([{ type: "cleanse", targetId: "a" }], field);
    expect(field.getUnit("a")?.statusEffects).toEqual([]);
  });

  it("refunds and drains side energy through the collaborator", () => {
    const field = new FakeBattlefield([]);
    dispatchFollowUps(
      [
        { type: "restoreEnergy", team: "player", amount: 2, cause: "Bounty" },
        { type: "drainEnergy", team: "enemy", amount: 5, cause: "Energy Drain" },
        { type: "drainGrog", team: "enemy", amount: 1, cause: "Leaking Casks" },
      ],
      field
    );

    expect(field.energy.player.calls).toEqual(["refund 2"]);
    expect(field.energy.enemy.calls).toEqual(["spend 3"]);
    expect(field.energy.enemy.current).toBe(0);
    expect(field.grogDrains).toEqual(["enemy 1 Leaking Casks"]);
  });

  it("logs the grog a side actually lost", () => {
    const field = new FakeBattlefield([]);
    const audit = dispatchFollowUps(
      [
        { type: "drainGrog", team: "enemy", amount: 3, cause: "Leaking Casks" },
        { type: "drainGrog", team: "player", amount: 2, cause: "Leaking Casks" },
      ],
      field
    );

    expect(field.grog.enemy).toBe(0);
    expect(audit).toEqual(["Leaking Casks: enemy -1 grog"]);
  });

  it("requests knockback unless the unit is anchored", () => {
    const field = new FakeBattlefield([
      createTestUnit({ id: "loose" }),
      withEffects(createTestUnit({ id: "anchored" }), createStatusEffect({ kind: "Anchored", duration: 2 })),
    ]);
    dispatchFollowUps(
      [
        { type: "knockback", targetId: "loose", sourceId: "x", distance: 2 },
        { type: "knockback", targetId: "anchored", sourceId: "x", distance: 2 },
      ],
      field
    );

    expect(field.events).toEqual([{ type: "knockbackRequested", unitId: "loose", sourceId: "x", distance: 2 }]);
  });

  it("passes card draws on as requests", () => {
    const field = new FakeBattlefield([]);
    const audit = dispatchFollowUps([{ type: "drawCards", team: "enemy", count: 2 }], field);
    expect(field.events).toEqual([{ type: "cardDrawRequested", team: "enemy", count: 2 }]);
    expect(audit).toEqual(["enemy draws 2"]);
  });
});
