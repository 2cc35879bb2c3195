import * as ROT from "rot-js";
import type { Entity, GameState, TileGrid } from "../shared/types.js";
import { PLAYER } from "../shared/constants.js";
import { isInBounds } from "./rooms.js";

/**
 * The field-of-view service the turn engine talks to. `recompute` replaces the
 * visible set; `isVisible` answers for the most recent computation.
 */
export interface Visibility {
  isVisible(x: number, y: number): boolean;
  recompute(originX: number, originY: number, radius: number, lightWalls: boolean): void;
}

/**
 * rot-js PreciseShadowcasting over the live tile grid. The grid is read through
 * a getter so a map swapped in on descent or load is picked up automatically.
 */
export class ShadowcastingVisibility implements Visibility {
  private visible = new Set<string>();

  constructor(private readonly getMap: () => TileGrid) {}

  isVisible(x: number, y: number): boolean {
    return this.visible.has(`${x},${y}`);
  }

  recompute(originX: number, originY: number, radius: number, lightWalls: boolean): void {
    const map = this.getMap();
    const visible = new Set<string>();

    const lightPasses = (x: number, y: number): boolean =>
      isInBounds(map, x, y) && !map[y][x].blockSight;

    const fov = new ROT.FOV.PreciseShadowcasting(lightPasses, { topology: 8 });
    fov.compute(originX, originY, radius, (x: number, y: number) => {
      if (!isInBounds(map, x, y)) return;
      // Opaque cells are reported too; keep them only when walls are lit.
      if (!lightWalls && map[y][x].blockSight && !(x === originX && y === originY)) return;
      visible.add(`${x},${y}`);
    });

    this.visible = visible;
  }
}

/** Flag every currently visible tile as explored. Explored never reverts. */
export function markExplored(state: GameState, visibility: Visibility): void {
  for (let y = 0; y < state.map.length; y++) {
    const row = state.map[y];
    for (let x = 0; x < row.length; x++) {
      if (visibility.isVisible(x, y)) {
        row[x].explored = true;
      }
    }
  }
}

/** Recompute around the player and mark the result explored. */
export function refreshVision(state: GameState, visibility: Visibility, radius: number, lightWalls: boolean): void {
  const player = state.entities[PLAYER];
  visibility.recompute(player.pos.x, player.pos.y, radius, lightWalls);
  markExplored(state, visibility);
  state.fovRecompute = false;
}

/** Whether a renderer should draw the entity: in view, or a landmark on an explored tile. */
export function isEntityShown(state: GameState, visibility: Visibility, entity: Entity): boolean {
  const { x, y } = entity.pos;
  if (visibility.isVisible(x, y)) return true;
  return entity.alwaysVisible && isInBounds(state.map, x, y) && state.map[y][x].explored;
}
