import type { GameState, Menu, Position } from "../shared/types.js";
import { PLAYER } from "../shared/constants.js";
import { distance, distanceTo } from "./entities.js";
import type { Visibility } from "./vision.js";

/**
 * The interactive half of the game, supplied by whatever front end is running.
 * Both calls block until the player answers.
 */
export interface Prompter {
  /** A tile the player clicked, or null to cancel. */
  pickTile(state: GameState): Position | null;
  /** Index of the chosen option, or null when the player picks nothing valid. */
  choose(menu: Menu): number | null;
}

/**
 * Index of the nearest visible fighter other than the player that lies
 * strictly within `maxRange + 1`, or null. Ties keep the earlier index.
 */
export function closestMonster(state: GameState, visibility: Visibility, maxRange: number): number | null {
  const player = state.entities[PLAYER];
  let closest: number | null = null;
  let closestDist = maxRange + 1;

  for (let i = 0; i < state.entities.length; i++) {
    const e = state.entities[i];
    if (i === PLAYER || !e.fighter) continue;
    if (!visibility.isVisible(e.pos.x, e.pos.y)) continue;
    const dist = distanceTo(player, e);
    if (dist < closestDist) {
      closest = i;
      closestDist = dist;
    }
  }

  return closest;
}

/**
 * Ask the prompter for tiles until one inside the field of view (and inside
 * `maxRange` of the player, when given) is confirmed. Null means cancelled.
 */
export function targetTile(
  state: GameState,
  visibility: Visibility,
  prompter: Prompter,
  maxRange?: number,
): Position | null {
  const player = state.entities[PLAYER];
  for (;;) {
    const tile = prompter.pickTile(state);
    if (tile === null) return null;
    const inFov = visibility.isVisible(tile.x, tile.y);
    const inRange = maxRange === undefined || distance(player, tile.x, tile.y) <= maxRange;
    if (inFov && inRange) return tile;
  }
}
