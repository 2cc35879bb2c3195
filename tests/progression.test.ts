import { describe, it, expect } from "vitest";
import { characterInfo, checkLevelUp, levelUpXp, statusLine } from "../src/sim/progression.js";
import { DEFAULT_CONFIG, PLAYER } from "../src/shared/constants.js";
import { makeFloorState, messages, ScriptedPrompter } from "./fixtures.js";

function withXp(xp: number) {
  const state = makeFloorState();
  const fighter = state.entities[PLAYER].fighter;
  if (!fighter) throw new Error("player has no fighter");
  fighter.xp = xp;
  return { state, fighter };
}

describe("Level-up", () => {
  it("needs base + level * factor experience", () => {
    expect(levelUpXp(1, DEFAULT_CONFIG)).toBe(350);
    expect(levelUpXp(2, DEFAULT_CONFIG)).toBe(500);
  });

  it("does nothing below the threshold", () => {
    const { state } = withXp(349);
    expect(checkLevelUp(state, { config: DEFAULT_CONFIG, prompter: new ScriptedPrompter() })).toBe(false);
    expect(state.entities[PLAYER].level).toBe(1);
  });

  it("keeps asking until a stat is chosen", () => {
    const { state, fighter } = withXp(400);
    const prompter = new ScriptedPrompter([], [null, 5, 1]);

    expect(checkLevelUp(state, { config: DEFAULT_CONFIG, prompter })).toBe(true);
    expect(state.entities[PLAYER].level).toBe(2);
    expect(fighter.xp).toBe(50);
    expect(fighter.power).toBe(5);
    expect(prompter.menus).toHaveLength(3);
    expect(prompter.menus[0].options.map(o => o.text)).toEqual([
      "Constitution (+20 HP, from 100)",
      "Strength (+1 attack, from 4)",
      "Agility (+1 defense, from 1)",
    ]);
    expect(messages(state)).toEqual(["Your battle skills grow stronger! You reached level 2!"]);
  });

  it("constitution raises both max and current hp", () => {
    const { state, fighter } = withXp(350);
    fighter.hp = 60;
    checkLevelUp(state, { config: DEFAULT_CONFIG, prompter: new ScriptedPrompter([], [0]) });
    expect(fighter.maxHp).toBe(120);
    expect(fighter.hp).toBe(80);
    expect(fighter.xp).toBe(0);
  });

  it("agility raises defense", () => {
    const { state, fighter } = withXp(350);
    checkLevelUp(state, { config: DEFAULT_CONFIG, prompter: new ScriptedPrompter([], [2]) });
    expect(fighter.defense).toBe(2);
  });
});

describe("Character sheet", () => {
  it("reports the player's stats", () => {
    const { state } = withXp(20);
    expect(characterInfo(state, DEFAULT_CONFIG)).toEqual({
      level: 1,
      xp: 20,
      xpToLevel: 350,
      maxHp: 100,
      power: 4,
      defense: 1,
    });
    expect(statusLine(state)).toEqual({ hp: 100, maxHp: 100, level: 1, xp: 20, dungeonLevel: 1 });
  });
});
