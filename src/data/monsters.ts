import { MonsterKind } from "../shared/types.js";
import { COLORS, GLYPHS } from "../shared/constants.js";

export interface MonsterTemplate {
  name: string;
  glyph: string;
  color: string;
  hp: number;
  defense: number;
  power: number;
  xpReward: number;
}

export const MONSTER_TEMPLATES: Record<MonsterKind, MonsterTemplate> = {
  [MonsterKind.Orc]: {
    name: "orc",
    glyph: GLYPHS.orc,
    color: COLORS.desaturatedGreen,
    hp: 20,
    defense: 0,
    power: 4,
    xpReward: 35,
  },
  [MonsterKind.Troll]: {
    name: "troll",
    glyph: GLYPHS.troll,
    color: COLORS.darkerGreen,
    hp: 30,
    defense: 2,
    power: 8,
    xpReward: 100,
  },
};
