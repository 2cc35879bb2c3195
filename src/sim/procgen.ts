import type { Entity, ItemKind, MonsterKind, Position, Rect, TileGrid, Weighted } from "../shared/types.js";
import type { GameConfig } from "../shared/constants.js";
import { GenerationError } from "../shared/errors.js";
import type { Rng } from "./rng.js";
import { coinFlip, range } from "./rng.js";
import {
  carveHorizontalTunnel,
  carveRoom,
  carveVerticalTunnel,
  createWallGrid,
  intersects,
  makeRect,
  rectCenter,
} from "./rooms.js";
import { createItem, createMonster, createStairs, isBlocked } from "./entities.js";
import { fromDungeonLevel, weightedChoice } from "./tables.js";

export interface GeneratedLevel {
  map: TileGrid;
  /** Monsters, items and the stairs. The player is not included. */
  entities: Entity[];
  playerStart: Position;
  stairs: Position;
  rooms: Rect[];
}

/**
 * Scatter up to `maxRooms` non-overlapping rectangular rooms, chain each new
 * room to the previous one with an L-shaped corridor, populate them, and put
 * the stairs in the middle of the last room.
 */
export function generate(level: number, config: GameConfig, rng: Rng): GeneratedLevel {
  const map = createWallGrid(config.mapWidth, config.mapHeight);
  const entities: Entity[] = [];
  const rooms: Rect[] = [];
  let playerStart: Position | null = null;

  for (let attempt = 0; attempt < config.maxRooms; attempt++) {
    const w = range(rng, config.roomMinSize, config.roomMaxSize);
    const h = range(rng, config.roomMinSize, config.roomMaxSize);
    const x = range(rng, 0, config.mapWidth - w - 1);
    const y = range(rng, 0, config.mapHeight - h - 1);
    const room = makeRect(x, y, w, h);

    if (rooms.some(other => intersects(room, other))) continue;

    carveRoom(map, room);
    const center = rectCenter(room);

    if (rooms.length === 0) {
      playerStart = center;
    } else {
      const prev = rectCenter(rooms[rooms.length - 1]);
      connect(map, prev, center, rng);
    }

    // The start tile is reserved before the first room is stocked.
    populateRoom(room, map, entities, playerStart, level, config, rng);
    rooms.push(room);
  }

  if (playerStart === null || rooms.length === 0) {
    throw new GenerationError("NO_ROOMS", "Dungeon generation accepted no rooms", {
      level,
      maxRooms: config.maxRooms,
    });
  }

  const stairs = rectCenter(rooms[rooms.length - 1]);
  entities.push(createStairs(stairs));

  return { map, entities, playerStart, stairs, rooms };
}

function connect(map: TileGrid, from: Position, to: Position, rng: Rng): void {
  if (coinFlip(rng)) {
    carveHorizontalTunnel(map, from.x, to.x, from.y);
    carveVerticalTunnel(map, from.y, to.y, to.x);
  } else {
    carveVerticalTunnel(map, from.y, to.y, from.x);
    carveHorizontalTunnel(map, from.x, to.x, to.y);
  }
}

// ── Room population ──────────────────────────────────────────

function isSpawnBlocked(
  map: TileGrid,
  entities: readonly Entity[],
  playerStart: Position | null,
  x: number,
  y: number,
): boolean {
  if (playerStart !== null && playerStart.x === x && playerStart.y === y) return true;
  return isBlocked(map, entities, x, y);
}

function randomInteriorTile(room: Rect, rng: Rng): Position {
  return {
    x: range(rng, room.x1 + 1, room.x2 - 1),
    y: range(rng, room.y1 + 1, room.y2 - 1),
  };
}

export function monsterWeights(level: number, config: GameConfig): Weighted<MonsterKind>[] {
  return config.spawnTables.monsterChances.map(c => ({
    weight: fromDungeonLevel(c.chance, level),
    value: c.kind,
  }));
}

export function itemWeights(level: number, config: GameConfig): Weighted<ItemKind>[] {
  return config.spawnTables.itemChances.map(c => ({
    weight: fromDungeonLevel(c.chance, level),
    value: c.kind,
  }));
}

/**
 * Spawn monsters, then items, on random interior tiles. A spawn whose tile is
 * already blocked is skipped rather than retried, so rooms often end up with
 * fewer than the rolled count.
 */
function populateRoom(
  room: Rect,
  map: TileGrid,
  entities: Entity[],
  playerStart: Position | null,
  level: number,
  config: GameConfig,
  rng: Rng,
): void {
  const tables = config.spawnTables;

  const maxMonsters = fromDungeonLevel(tables.maxMonstersPerRoom, level);
  const numMonsters = range(rng, 0, maxMonsters);
  for (let i = 0; i < numMonsters; i++) {
    const pos = randomInteriorTile(room, rng);
    if (isSpawnBlocked(map, entities, playerStart, pos.x, pos.y)) continue;
    entities.push(createMonster(weightedChoice(monsterWeights(level, config), rng), pos));
  }

  const maxItems = fromDungeonLevel(tables.maxItemsPerRoom, level);
  const numItems = range(rng, 0, maxItems);
  for (let i = 0; i < numItems; i++) {
    const pos = randomInteriorTile(room, rng);
    if (isSpawnBlocked(map, entities, playerStart, pos.x, pos.y)) continue;
    entities.push(createItem(weightedChoice(itemWeights(level, config), rng), pos));
  }
}
