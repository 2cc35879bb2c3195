/**
 * Entity store helpers.
 *
 * Entities are addressed only by their index in `state.entities`. The player
 * lives at index PLAYER. `swapRemove` moves the last entity into the freed
 * slot, so any index computed before a removal must be looked up again.
 */
import type { Entity, GameState, Position, TileGrid } from "../shared/types.js";
import { AiType, DeathKind, ItemKind, MonsterKind } from "../shared/types.js";
import { COLORS, GLYPHS, PLAYER, STAIRS_NAME } from "../shared/constants.js";
import { assertContract } from "../shared/errors.js";
import { MONSTER_TEMPLATES } from "../data/monsters.js";
import { ITEM_TEMPLATES } from "../data/items.js";
import { isInBounds } from "./rooms.js";

// ── Construction ─────────────────────────────────────────────

export function makeEntity(
  pos: Position,
  glyph: string,
  name: string,
  color: string,
  blocks: boolean,
): Entity {
  return {
    pos: { ...pos },
    glyph,
    color,
    name,
    blocks,
    alive: false,
    alwaysVisible: false,
    level: 0,
  };
}

export function createPlayer(pos: Position = { x: 0, y: 0 }): Entity {
  const player = makeEntity(pos, GLYPHS.player, "player", COLORS.white, true);
  player.alive = true;
  player.level = 1;
  player.fighter = {
    maxHp: 100,
    hp: 100,
    defense: 1,
    power: 4,
    xp: 0,
    xpReward: 0,
    onDeath: DeathKind.PlayerDeath,
  };
  return player;
}

export function createMonster(kind: MonsterKind, pos: Position): Entity {
  const t = MONSTER_TEMPLATES[kind];
  const monster = makeEntity(pos, t.glyph, t.name, t.color, true);
  monster.alive = true;
  monster.fighter = {
    maxHp: t.hp,
    hp: t.hp,
    defense: t.defense,
    power: t.power,
    xp: 0,
    xpReward: t.xpReward,
    onDeath: DeathKind.MonsterDeath,
  };
  monster.ai = { type: AiType.Basic };
  return monster;
}

export function createItem(kind: ItemKind, pos: Position): Entity {
  const t = ITEM_TEMPLATES[kind];
  const item = makeEntity(pos, t.glyph, t.name, t.color, false);
  item.item = kind;
  return item;
}

export function createStairs(pos: Position): Entity {
  const stairs = makeEntity(pos, GLYPHS.stairs, STAIRS_NAME, COLORS.white, false);
  stairs.alwaysVisible = true;
  return stairs;
}

// ── Store operations ─────────────────────────────────────────

function isIndexIn(items: readonly unknown[], index: number): boolean {
  return Number.isInteger(index) && index >= 0 && index < items.length;
}

/**
 * Borrow two distinct elements at once, e.g. attacker and defender.
 * The array is split at the larger index so each view comes from its own
 * sub-range. Equal or out-of-range indices are a contract violation.
 */
export function mutTwo<T>(items: T[], first: number, second: number): [T, T] {
  assertContract(first !== second, "mutTwo requires two distinct indices", { first, second });
  assertContract(
    isIndexIn(items, first) && isIndexIn(items, second),
    "mutTwo index out of bounds",
    { first, second, length: items.length },
  );
  const splitAt = Math.max(first, second);
  const head = items.slice(0, splitAt);
  const tail = items.slice(splitAt);
  return first < second ? [head[first], tail[0]] : [tail[0], head[second]];
}

/**
 * O(1) removal: the last element takes the removed slot.
 * Invalidates the index of whatever entity was previously last.
 */
export function swapRemove<T>(items: T[], index: number): T {
  assertContract(isIndexIn(items, index), "swapRemove index out of bounds", {
    index,
    length: items.length,
  });
  const removed = items[index];
  const last = items.pop();
  if (index < items.length && last !== undefined) {
    items[index] = last;
  }
  return removed;
}

// ── Geometry ─────────────────────────────────────────────────

export function distanceTo(a: Entity, b: Entity): number {
  return distance(a, b.pos.x, b.pos.y);
}

export function distance(entity: Entity, x: number, y: number): number {
  const dx = x - entity.pos.x;
  const dy = y - entity.pos.y;
  return Math.sqrt(dx * dx + dy * dy);
}

export function samePos(a: Position, b: Position): boolean {
  return a.x === b.x && a.y === b.y;
}

// ── Queries ──────────────────────────────────────────────────

/** Walls, off-map coordinates and tiles holding a blocking entity are all blocked. */
export function isBlocked(map: TileGrid, entities: readonly Entity[], x: number, y: number): boolean {
  if (!isInBounds(map, x, y)) return true;
  if (map[y][x].blocked) return true;
  return entities.some(e => e.blocks && e.pos.x === x && e.pos.y === y);
}

/** Index of the first entity carrying a Fighter at (x, y), or -1. */
export function findFighterAt(entities: readonly Entity[], x: number, y: number): number {
  return entities.findIndex(e => e.fighter !== undefined && e.pos.x === x && e.pos.y === y);
}

/** Index of the first collectible item at (x, y), or -1. */
export function findItemAt(entities: readonly Entity[], x: number, y: number): number {
  return entities.findIndex(e => e.item !== undefined && e.pos.x === x && e.pos.y === y);
}

export function isOnStairs(state: GameState): boolean {
  const player = state.entities[PLAYER];
  return state.entities.some(e => e.name === STAIRS_NAME && samePos(e.pos, player.pos));
}

// ── Movement ─────────────────────────────────────────────────

/** Move by the given delta unless the destination is blocked. Returns true if the entity moved. */
export function moveBy(state: GameState, index: number, dx: number, dy: number): boolean {
  const entity = state.entities[index];
  const nx = entity.pos.x + dx;
  const ny = entity.pos.y + dy;
  if (isBlocked(state.map, state.entities, nx, ny)) return false;
  entity.pos = { x: nx, y: ny };
  return true;
}

/**
 * Step one tile toward the target: the direction vector is normalized to
 * length 1 and rounded to the grid, which allows diagonal steps.
 */
export function moveTowards(state: GameState, index: number, targetX: number, targetY: number): boolean {
  const entity = state.entities[index];
  const dx = targetX - entity.pos.x;
  const dy = targetY - entity.pos.y;
  const dist = Math.sqrt(dx * dx + dy * dy);
  if (dist === 0) return false;
  return moveBy(state, index, Math.round(dx / dist), Math.round(dy / dist));
}
