/**
 * Combat - Unit Vitals
 *
 * HP, Morale, Hull, Buzz and Arrow changes on a single unit.
 * Handles death at 0 HP and surrender below the morale threshold.
 * All functions return a new unit; the input is never mutated.
 */

import type { CombatConfig } from "../types/config";
import type { CombatEvent, HealableResource } from "../types/events";
import type { ResourcePool, Unit } from "../types/unit";
import { clampPool, isActive } from "../types/unit";
import { getSurrenderThresholdModifier, hasStatusEffect } from "./status-queries";

export interface VitalsResult {
  updatedUnit: Unit;
  /** Signed change actually made to the affected pool */
  amount: number;
  events: CombatEvent[];
  audit: string;
}

function unchanged(unit: Unit, audit: string): VitalsResult {
  return { updatedUnit: unit, amount: 0, events: [], audit };
}

// ═══════════════════════════════════════════════════════════════════════════
// HP
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Remove HP directly, bypassing every damage modifier. Used by DOTs,
 * reflected damage and traps. Negative amounts heal, still clamped to max.
 */
export function dealRawDamage(
  unit: Unit,
  amount: number,
  sourceId: string | null,
  cause: string
): VitalsResult {
  if (!isActive(unit)) {
    return unchanged(unit, `${cause}: ${unit.name} is out of play`);
  }

  const before = unit.resources.hp.current;
  const hp = clampPool(unit.resources.hp, before - amount);
  const lost = before - hp.current;
  const died = hp.current <= 0;

  const updatedUnit: Unit = {
    ...unit,
    alive: !died,
    resources: { ...unit.resources, hp },
  };

  const events: CombatEvent[] = [];
  if (lost !== 0) {
    events.push({ type: "unitDamaged", unitId: unit.id, amount: lost, sourceId, cause });
  }
  if (died) {
    events.push({ type: "unitDied", unitId: unit.id, killerId: sourceId });
  }

  return {
    updatedUnit,
    amount: -lost,
    events,
    audit: `${cause}: ${unit.name} ${before} → ${hp.current} HP${died ? " -> DEAD" : ""}`,
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// MORALE
// ═══════════════════════════════════════════════════════════════════════════

export function getEffectiveSurrenderThreshold(unit: Unit, config: CombatConfig): number {
  return Math.max(0, config.surrenderThreshold + getSurrenderThresholdModifier(unit.statusEffects));
}

/**
 * Remove morale. Dropping below the surrender threshold surrenders the unit
 * for the rest of the battle; later morale gains never undo it.
 */
export function applyMoraleDamage(
  unit: Unit,
  amount: number,
  config: CombatConfig,
  sourceId: string | null = null
): VitalsResult {
  if (!isActive(unit)) {
    return unchanged(unit, `${unit.name} is out of play`);
  }

  const before = unit.resources.morale.current;
  const morale = clampPool(unit.resources.morale, before - amount);
  const delta = morale.current - before;
  const threshold = getEffectiveSurrenderThreshold(unit, config);
  const surrenders = morale.current < threshold;

  const updatedUnit: Unit = {
    ...unit,
    resources: { ...unit.resources, morale },
    flags: { ...unit.flags, surrendered: surrenders },
  };

  const events: CombatEvent[] = [];
  if (delta !== 0) {
    events.push({ type: "moraleChanged", unitId: unit.id, delta, current: morale.current });
  }
  if (surrenders) {
    events.push({ type: "unitSurrendered", unitId: unit.id });
  }

  const sourceText = sourceId ? ` from ${sourceId}` : "";
  return {
    updatedUnit,
    amount: delta,
    events,
    audit: `${unit.name} morale ${before} → ${morale.current}${sourceText}${surrenders ? ` -> SURRENDERS (< ${threshold})` : ""}`,
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// HEALING
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Restore HP, Morale or Hull. Heal Block stops HP and Morale restoration;
 * hull repairs go through.
 */
export function healUnit(unit: Unit, resource: HealableResource, amount: number): VitalsResult {
  if (!isActive(unit) || amount <= 0) {
    return unchanged(unit, `${unit.name}: nothing to heal`);
  }
  if (resource !== "hull" && hasStatusEffect(unit.statusEffects, "HealBlock")) {
    return unchanged(unit, `${unit.name}: ${resource} heal blocked`);
  }

  const pool = unit.resources[resource];
  const healed = clampPool(pool, pool.current + amount);
  const restored = healed.current - pool.current;
  if (restored === 0) {
    return unchanged(unit, `${unit.name}: ${resource} already full`);
  }

  const updatedUnit: Unit = {
    ...unit,
    resources: { ...unit.resources, [resource]: healed },
  };

  const events: CombatEvent[] = [{ type: "unitHealed", unitId: unit.id, resource, amount: restored }];
  if (resource === "morale") {
    events.push({ type: "moraleChanged", unitId: unit.id, delta: restored, current: healed.current });
  }

  return {
    updatedUnit,
    amount: restored,
    events,
    audit: `${unit.name} +${restored} ${resource} (${pool.current} → ${healed.current})`,
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// HULL, BUZZ & ARROWS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Soak part of incoming HP damage with hull points.
 * Absorbs at most `hullAbsorbPercent` of the hit, limited by the pool.
 */
export function absorbWithHull(
  unit: Unit,
  damage: number,
  config: CombatConfig
): { updatedUnit: Unit; absorbed: number } {
  if (damage <= 0 || unit.resources.hull.current <= 0) {
    return { updatedUnit: unit, absorbed: 0 };
  }
  const absorbed = Math.min(unit.resources.hull.current, Math.round(damage * config.hullAbsorbPercent));
  const hull = clampPool(unit.resources.hull, unit.resources.hull.current - absorbed);
  return {
    updatedUnit: { ...unit, resources: { ...unit.resources, hull } },
    absorbed,
  };
}

function adjustPool(unit: Unit, key: "buzz" | "arrows" | "hull", delta: number): Unit {
  const pool: ResourcePool = clampPool(unit.resources[key], unit.resources[key].current + delta);
  return { ...unit, resources: { ...unit.resources, [key]: pool } };
}

export function addBuzz(unit: Unit, amount: number): Unit {
  return adjustPool(unit, "buzz", amount);
}

export function reduceBuzz(unit: Unit, amount: number): Unit {
  return adjustPool(unit, "buzz", -amount);
}

export function reduceHull(unit: Unit, amount: number): Unit {
  return adjustPool(unit, "hull", -amount);
}

export function addArrows(unit: Unit, amount: number): Unit {
  return adjustPool(unit, "arrows", amount);
}

export function removeArrows(unit: Unit, amount: number): Unit {
  return adjustPool(unit, "arrows", -amount);
}

/** At max buzz the unit is drunk and hits for less. */
export function isTooDrunk(unit: Unit): boolean {
  return unit.resources.buzz.current >= unit.resources.buzz.max;
}

/**
 * Drink a tot of rum: restores HP or Morale and adds buzz.
 * Grog is paid by the caller from the side's pool.
 */
export function drinkRum(unit: Unit, resource: "hp" | "morale", config: CombatConfig): VitalsResult {
  const restore = resource === "hp" ? config.healthRumRestore : config.moraleRumRestore;
  const healed = healUnit(unit, resource, restore);
  const updatedUnit = addBuzz(healed.updatedUnit, config.buzzPerDrink);
  return {
    ...healed,
    updatedUnit,
    audit: `${healed.audit}; buzz ${unit.resources.buzz.current} → ${updatedUnit.resources.buzz.current}`,
  };
}
