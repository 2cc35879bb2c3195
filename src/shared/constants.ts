import type { SpawnTables } from "../data/spawnTables.js";
import { SPAWN_TABLES } from "../data/spawnTables.js";

// ── Map defaults ─────────────────────────────────────────────
export const DEFAULT_MAP_WIDTH = 80;
export const DEFAULT_MAP_HEIGHT = 43;

// ── Golden seed ──────────────────────────────────────────────
export const GOLDEN_SEED = 184201;

// ── Store / UI limits ────────────────────────────────────────
export const PLAYER = 0; // the player always occupies the first slot of the entity store
export const MENU_LETTERS = "abcdefghijklmnopqrstuvwxyz";
export const STAIRS_NAME = "stairs";
export const MAX_LOG_MESSAGES = 100;

// ── Game configuration ───────────────────────────────────────
export interface GameConfig {
  mapWidth: number;
  mapHeight: number;
  roomMinSize: number;
  roomMaxSize: number;
  maxRooms: number; // placement attempts, not a room count

  healAmount: number;
  lightningDamage: number;
  lightningRange: number;
  confuseRange: number;
  confuseNumTurns: number;
  fireballRadius: number;
  fireballDamage: number;

  levelUpBase: number;
  levelUpFactor: number;
  levelUpHpBonus: number;
  levelUpPowerBonus: number;
  levelUpDefenseBonus: number;

  torchRadius: number;
  fovLightWalls: boolean;

  inventoryCapacity: number;

  spawnTables: SpawnTables;
}

export const DEFAULT_CONFIG: Readonly<GameConfig> = Object.freeze({
  mapWidth: DEFAULT_MAP_WIDTH,
  mapHeight: DEFAULT_MAP_HEIGHT,
  roomMinSize: 6,
  roomMaxSize: 10,
  maxRooms: 30,

  healAmount: 40,
  lightningDamage: 40,
  lightningRange: 5,
  confuseRange: 8,
  confuseNumTurns: 10,
  fireballRadius: 3,
  fireballDamage: 25,

  levelUpBase: 200,
  levelUpFactor: 150,
  levelUpHpBonus: 20,
  levelUpPowerBonus: 1,
  levelUpDefenseBonus: 1,

  torchRadius: 10,
  fovLightWalls: true,

  inventoryCapacity: MENU_LETTERS.length,

  spawnTables: SPAWN_TABLES,
});

/** Build a config from the defaults with some fields replaced (tests, difficulty variants). */
export function createConfig(overrides: Partial<GameConfig> = {}): GameConfig {
  return { ...DEFAULT_CONFIG, ...overrides };
}

// ── Colors ───────────────────────────────────────────────────
export const COLORS = {
  white: "#ffffff",
  red: "#ff0000",
  darkRed: "#bf0000",
  green: "#00ff00",
  lightGreen: "#72ff72",
  desaturatedGreen: "#3f7f3f",
  darkerGreen: "#007f00",
  yellow: "#ffff00",
  lightYellow: "#ffff72",
  orange: "#ff7f00",
  violet: "#7f00ff",
  lightViolet: "#b972ff",
  lightBlue: "#72b9ff",
  lightCyan: "#72ffff",
} as const;

// ── Glyphs ───────────────────────────────────────────────────
export const GLYPHS = {
  player: "@",
  corpse: "%",
  stairs: "<",
  orc: "o",
  troll: "T",
  potion: "!",
  scroll: "#",
  wall: "#",
  floor: ".",
  unexplored: " ",
} as const;
