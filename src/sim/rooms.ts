/**
 * Tile grid and room rectangle utilities, shared by procgen.ts, vision.ts and entities.ts.
 */
import type { Position, Rect, Tile, TileGrid } from "../shared/types.js";

/** A fresh grid where every tile is solid, opaque and unexplored. */
export function createWallGrid(width: number, height: number): TileGrid {
  const map: TileGrid = [];
  for (let y = 0; y < height; y++) {
    const row: Tile[] = [];
    for (let x = 0; x < width; x++) {
      row.push({ blocked: true, blockSight: true, explored: false });
    }
    map.push(row);
  }
  return map;
}

export function makeRect(x: number, y: number, w: number, h: number): Rect {
  return { x1: x, y1: y, x2: x + w, y2: y + h };
}

export function rectCenter(rect: Rect): Position {
  return {
    x: Math.floor((rect.x1 + rect.x2) / 2),
    y: Math.floor((rect.y1 + rect.y2) / 2),
  };
}

/** Inclusive-bound overlap test: rooms sharing a wall count as intersecting. */
export function intersects(a: Rect, b: Rect): boolean {
  return a.x1 <= b.x2 && a.x2 >= b.x1 && a.y1 <= b.y2 && a.y2 >= b.y1;
}

/** True when pos lies on the carved floor of the room (strictly inside its walls). */
export function isInsideRoom(rect: Rect, pos: Position): boolean {
  return pos.x > rect.x1 && pos.x < rect.x2 && pos.y > rect.y1 && pos.y < rect.y2;
}

function dig(map: TileGrid, x: number, y: number): void {
  const tile = map[y][x];
  tile.blocked = false;
  tile.blockSight = false;
}

/** Make the interior of the rectangle passable, leaving its border as wall. */
export function carveRoom(map: TileGrid, rect: Rect): void {
  for (let y = rect.y1 + 1; y < rect.y2; y++) {
    for (let x = rect.x1 + 1; x < rect.x2; x++) {
      dig(map, x, y);
    }
  }
}

export function carveHorizontalTunnel(map: TileGrid, x1: number, x2: number, y: number): void {
  for (let x = Math.min(x1, x2); x <= Math.max(x1, x2); x++) {
    dig(map, x, y);
  }
}

export function carveVerticalTunnel(map: TileGrid, y1: number, y2: number, x: number): void {
  for (let y = Math.min(y1, y2); y <= Math.max(y1, y2); y++) {
    dig(map, x, y);
  }
}

export function isInBounds(map: TileGrid, x: number, y: number): boolean {
  return y >= 0 && y < map.length && x >= 0 && x < (map[0]?.length ?? 0);
}
