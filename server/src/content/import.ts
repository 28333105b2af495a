// Content import pipeline. Reads roster and ability packs from YAML/JSON
// and validates them into engine input types.

import type {
  AbilityDefinition,
  AbilityEffectDescriptor,
  AbilityRecipient,
  AbilityTargeting,
} from "@shared/combat/engine";
import { isStatusEffectKind } from "@shared/combat/engine";
import type { AttackStyle, HealableResource, StatusEffectSpec, Team, UnitStats } from "@shared/combat/types";
import { STAT_KEYS, TEAMS } from "@shared/combat/types";
import type { AbilityPack, BattleContent, RosterPack, RosterUnit } from "./content-types";
import {
  expectArray,
  expectNumber,
  expectOneOf,
  expectRecord,
  expectString,
  optionalNumber,
  optionalString,
  readDocument,
  rejectUnknownKeys,
} from "./fields";

const ATTACK_STYLES: readonly AttackStyle[] = ["melee", "ranged"];
const TARGETINGS: readonly AbilityTargeting[] = ["enemy", "ally", "self"];
const RECIPIENTS: readonly AbilityRecipient[] = ["self", "target"];
const HEALABLE: readonly HealableResource[] = ["hp", "morale", "hull"];
const EFFECT_TYPES = ["damage", "applyStatus", "heal", "cleanse", "restoreEnergy", "drawCards"] as const;

const UNIT_FIELDS = [
  "id",
  "name",
  "role",
  "team",
  "attackStyle",
  "stats",
  "maxHP",
  "maxMorale",
  "maxArrows",
  "startingEffects",
  "abilities",
];

// ─── Status effects ───

export function parseStatusEffectSpec(value: unknown, where: string): StatusEffectSpec {
  const record = expectRecord(value, where);
  rejectUnknownKeys(record, ["kind", "duration", "magnitude", "charges", "energyOnConsume"], where);

  const kind = expectString(record.kind, `${where}.kind`);
  if (!isStatusEffectKind(kind)) {
    throw new Error(`${where}.kind: unknown status effect kind "${kind}"`);
  }

  const duration = record.duration === null || record.duration === undefined
    ? null
    : expectNumber(record.duration, `${where}.duration`);

  const spec: StatusEffectSpec = { kind, duration };
  const magnitude = optionalNumber(record.magnitude, `${where}.magnitude`);
  const charges = optionalNumber(record.charges, `${where}.charges`);
  const energyOnConsume = optionalNumber(record.energyOnConsume, `${where}.energyOnConsume`);
  if (magnitude !== undefined) spec.magnitude = magnitude;
  if (charges !== undefined) spec.charges = charges;
  if (energyOnConsume !== undefined) spec.energyOnConsume = energyOnConsume;
  return spec;
}

// ─── Roster ───

function parseStats(value: unknown, where: string): Partial<UnitStats> {
  if (value === undefined) return {};
  const record = expectRecord(value, where);
  rejectUnknownKeys(record, STAT_KEYS, where);

  const stats: Partial<UnitStats> = {};
  for (const key of STAT_KEYS) {
    const stat = optionalNumber(record[key], `${where}.${key}`);
    if (stat !== undefined) stats[key] = stat;
  }
  return stats;
}

export function parseRosterUnit(value: unknown, where: string): RosterUnit {
  const record = expectRecord(value, where);
  rejectUnknownKeys(record, UNIT_FIELDS, where);

  const unit: RosterUnit = {
    id: expectString(record.id, `${where}.id`),
    name: expectString(record.name, `${where}.name`),
    team: expectOneOf<Team>(record.team, TEAMS, `${where}.team`),
    attackStyle: record.attackStyle === undefined
      ? "melee"
      : expectOneOf(record.attackStyle, ATTACK_STYLES, `${where}.attackStyle`),
    stats: parseStats(record.stats, `${where}.stats`),
    maxHP: expectNumber(record.maxHP, `${where}.maxHP`),
    maxMorale: expectNumber(record.maxMorale, `${where}.maxMorale`),
    startingEffects: (record.startingEffects === undefined ? [] : expectArray(record.startingEffects, `${where}.startingEffects`))
      .map((entry, index) => parseStatusEffectSpec(entry, `${where}.startingEffects[${index}]`)),
    abilities: (record.abilities === undefined ? [] : expectArray(record.abilities, `${where}.abilities`))
      .map((entry, index) => expectString(entry, `${where}.abilities[${index}]`)),
  };

  const role = optionalString(record.role, `${where}.role`);
  const maxArrows = optionalNumber(record.maxArrows, `${where}.maxArrows`);
  if (role !== undefined) unit.role = role;
  if (maxArrows !== undefined) unit.maxArrows = maxArrows;
  return unit;
}

export function parseRosterPack(data: unknown, source: string): RosterPack {
  const record = expectRecord(data, source);
  const units = expectArray(record.units, `${source}: units`).map((entry, index) =>
    parseRosterUnit(entry, `${source}: units[${index}]`)
  );

  const seen = new Set<string>();
  for (const unit of units) {
    if (seen.has(unit.id)) {
      throw new Error(`${source}: duplicate unit id "${unit.id}"`);
    }
    seen.add(unit.id);
  }

  return { name: optionalString(record.name, `${source}: name`) ?? source, units };
}

// ─── Abilities ───

export function parseAbilityEffect(value: unknown, where: string): AbilityEffectDescriptor {
  const record = expectRecord(value, where);
  const type = expectOneOf(record.type, EFFECT_TYPES, `${where}.type`);

  switch (type) {
    case "damage":
      return {
        type,
        baseDamage: expectNumber(record.baseDamage, `${where}.baseDamage`),
        style: expectOneOf(record.style, ATTACK_STYLES, `${where}.style`),
      };
    case "applyStatus":
      return {
        type,
        recipient: expectOneOf(record.recipient, RECIPIENTS, `${where}.recipient`),
        effect: parseStatusEffectSpec(record.effect, `${where}.effect`),
      };
    case "heal":
      return {
        type,
        recipient: expectOneOf(record.recipient, RECIPIENTS, `${where}.recipient`),
        resource: expectOneOf(record.resource, HEALABLE, `${where}.resource`),
        amount: expectNumber(record.amount, `${where}.amount`),
      };
    case "cleanse":
      return { type, recipient: expectOneOf(record.recipient, RECIPIENTS, `${where}.recipient`) };
    case "restoreEnergy":
      return { type, amount: expectNumber(record.amount, `${where}.amount`) };
    case "drawCards":
      return { type, count: expectNumber(record.count, `${where}.count`) };
  }
}

export function parseAbility(value: unknown, where: string): AbilityDefinition {
  const record = expectRecord(value, where);
  rejectUnknownKeys(record, ["id", "name", "energyCost", "targeting", "effects"], where);

  return {
    id: expectString(record.id, `${where}.id`),
    name: expectString(record.name, `${where}.name`),
    energyCost: expectNumber(record.energyCost, `${where}.energyCost`),
    targeting: expectOneOf(record.targeting, TARGETINGS, `${where}.targeting`),
    effects: expectArray(record.effects, `${where}.effects`).map((entry, index) =>
      parseAbilityEffect(entry, `${where}.effects[${index}]`)
    ),
  };
}

export function parseAbilityPack(data: unknown, source: string): AbilityPack {
  const record = expectRecord(data, source);
  return {
    abilities: expectArray(record.abilities, `${source}: abilities`).map((entry, index) =>
      parseAbility(entry, `${source}: abilities[${index}]`)
    ),
  };
}

// ─── Files ───

export function loadRosterFromFile(filePath: string): RosterPack {
  return parseRosterPack(readDocument(filePath), filePath);
}

export function loadAbilitiesFromFile(filePath: string): AbilityPack {
  return parseAbilityPack(readDocument(filePath), filePath);
}

/** Joins a roster to its abilities; every referenced ability must exist. */
export function linkBattleContent(roster: RosterPack, pack: AbilityPack): BattleContent {
  const abilities = new Map<string, AbilityDefinition>();
  for (const ability of pack.abilities) {
    if (abilities.has(ability.id)) {
      throw new Error(`Duplicate ability id "${ability.id}"`);
    }
    abilities.set(ability.id, ability);
  }

  for (const unit of roster.units) {
    for (const abilityId of unit.abilities) {
      if (!abilities.has(abilityId)) {
        throw new Error(`Unit "${unit.id}" references unknown ability "${abilityId}"`);
      }
    }
  }

  return { roster, abilities };
}

export function loadBattleContent(rosterPath: string, abilitiesPath: string): BattleContent {
  return linkBattleContent(loadRosterFromFile(rosterPath), loadAbilitiesFromFile(abilitiesPath));
}
