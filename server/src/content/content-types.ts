// Types for hand-authored content packs (YAML/JSON): the roster that
// fills both sides of a battle and the abilities units can use.

import type { AbilityDefinition, UnitTemplate } from "@shared/combat/engine";

export interface RosterUnit extends UnitTemplate {
  id: string;
  /** Ability ids from the ability pack */
  abilities: string[];
}

export interface RosterPack {
  name: string;
  units: RosterUnit[];
}

export interface AbilityPack {
  abilities: AbilityDefinition[];
}

export interface BattleContent {
  roster: RosterPack;
  abilities: Map<string, AbilityDefinition>;
}
