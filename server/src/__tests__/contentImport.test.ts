import { fileURLToPath } from "url";
import { describe, expect, it } from "vitest";
import {
  linkBattleContent,
  loadBattleContent,
  parseAbility,
  parseAbilityPack,
  parseRosterPack,
} from "../content/import";

const shipped = (name: string): string => fileURLToPath(new URL(`../../content/${name}`, import.meta.url));

const deckhand = { id: "a", name: "Deckhand", team: "player", maxHP: 30, maxMorale: 20 };

describe("parseRosterPack", () => {
  it("fills in defaults for optional fields", () => {
    const pack = parseRosterPack({ units: [deckhand] }, "roster");
    expect(pack).toEqual({
      name: "roster",
      units: [
        {
          id: "a",
          name: "Deckhand",
          team: "player",
          attackStyle: "melee",
          stats: {},
          maxHP: 30,
          maxMorale: 20,
          startingEffects: [],
          abilities: [],
        },
      ],
    });
  });

  it("reads stats and starting effects", () => {
    const pack = parseRosterPack(
      {
        name: "Crew",
        units: [
          {
            ...deckhand,
            role: "Lookout",
            attackStyle: "ranged",
            maxArrows: 4,
            stats: { aim: 12, speed: 3 },
            startingEffects: [{ kind: "Camouflaged" }, { kind: "Fire", duration: 2, magnitude: 3 }],
          },
        ],
      },
      "roster"
    );

    const [unit] = pack.units;
    expect(pack.name).toBe("Crew");
    expect(unit).toMatchObject({ role: "Lookout", attackStyle: "ranged", maxArrows: 4, stats: { aim: 12, speed: 3 } });
    expect(unit?.startingEffects).toEqual([
      { kind: "Camouflaged", duration: null },
      { kind: "Fire", duration: 2, magnitude: 3 },
    ]);
  });

  it("reports the field it cannot use", () => {
    expect(() => parseRosterPack({ units: [{ ...deckhand, team: "pirates" }] }, "roster")).toThrow(
      "roster: units[0].team must be one of player, enemy (got pirates)"
    );
    expect(() =>
      parseRosterPack({ units: [{ ...deckhand, startingEffects: [{ kind: "Burning", duration: 1 }] }] }, "roster")
    ).toThrow('roster: units[0].startingEffects[0].kind: unknown status effect kind "Burning"');
    expect(() => parseRosterPack({ units: [{ ...deckhand, stats: { luck: 3 } }] }, "roster")).toThrow(
      'roster: units[0].stats: unknown field "luck"'
    );
    expect(() => parseRosterPack({ units: [{ ...deckhand, maxHP: "lots" }] }, "roster")).toThrow(
      "roster: units[0].maxHP must be a number"
    );
    expect(() => parseRosterPack({ crew: [] }, "roster")).toThrow("roster: units must be an array");
  });

  it("rejects duplicate unit ids", () => {
    expect(() => parseRosterPack({ units: [deckhand, deckhand] }, "roster")).toThrow('roster: duplicate unit id "a"');
  });
});

describe("parseAbility", () => {
  it("reads each effect type", () => {
    const ability = parseAbility(
      {
        id: "rally",
        name: "Rally",
        energyCost: 2,
        targeting: "ally",
        effects: [
          { type: "heal", recipient: "target", resource: "morale", amount: 10 },
          { type: "applyStatus", recipient: "self", effect: { kind: "RallyAura", duration: 2, magnitude: 5 } },
          { type: "cleanse", recipient: "target" },
          { type: "restoreEnergy", amount: 1 },
          { type: "drawCards", count: 2 },
          { type: "damage", baseDamage: 4, style: "melee" },
        ],
      },
      "rally"
    );

    expect(ability.effects).toEqual([
      { type: "heal", recipient: "target", resource: "morale", amount: 10 },
      { type: "applyStatus", recipient: "self", effect: { kind: "RallyAura", duration: 2, magnitude: 5 } },
      { type: "cleanse", recipient: "target" },
      { type: "restoreEnergy", amount: 1 },
      { type: "drawCards", count: 2 },
      { type: "damage", baseDamage: 4, style: "melee" },
    ]);
  });

  it("rejects unknown effect types", () => {
    expect(() =>
      parseAbility({ id: "x", name: "X", energyCost: 1, targeting: "enemy", effects: [{ type: "explode" }] }, "x")
    ).toThrow("x.effects[0].type must be one of damage, applyStatus, heal, cleanse, restoreEnergy, drawCards (got explode)");
  });
});

describe("linkBattleContent", () => {
  const roster = parseRosterPack({ units: [{ ...deckhand, abilities: ["rally"] }] }, "roster");

  it("indexes abilities by id", () => {
    const pack = parseAbilityPack(
      { abilities: [{ id: "rally", name: "Rally", energyCost: 1, targeting: "self", effects: [] }] },
      "abilities"
    );
    expect(linkBattleContent(roster, pack).abilities.get("rally")?.name).toBe("Rally");
  });

  it("refuses rosters that reference missing abilities", () => {
    expect(() => linkBattleContent(roster, { abilities: [] })).toThrow('Unit "a" references unknown ability "rally"');
  });

  it("loads the shipped content", () => {
    const content = loadBattleContent(shipped("roster.yaml"), shipped("abilities.yaml"));
    expect(content.roster.units.map((unit) => unit.id)).toEqual([
      "bosun",
      "gunner",
      "surgeon",
      "corsair",
      "cutthroat",
      "powder-monkey",
    ]);
    expect([...content.abilities.keys()]).toEqual(["broadside-brawl", "patch-up", "firebomb"]);
  });
});
