import type { Direction, GameState, Position } from "../shared/types.js";
import { PLAYER } from "../shared/constants.js";
import { attack } from "./combat.js";
import { findFighterAt, moveBy } from "./entities.js";

const DIRECTION_DELTAS: Record<Direction, Position> = {
  north: { x: 0, y: -1 },
  south: { x: 0, y: 1 },
  east: { x: 1, y: 0 },
  west: { x: -1, y: 0 },
  northeast: { x: 1, y: -1 },
  northwest: { x: -1, y: -1 },
  southeast: { x: 1, y: 1 },
  southwest: { x: -1, y: 1 },
};

export function getDirectionDelta(direction: Direction): Position {
  return DIRECTION_DELTAS[direction];
}

/**
 * Bump in a direction: attack whatever fighter stands there, otherwise try to
 * walk. Walking into a wall still spends the turn. Only a completed step
 * flags the field of view for recomputing.
 */
export function playerMoveOrAttack(state: GameState, direction: Direction): void {
  const player = state.entities[PLAYER];
  const delta = getDirectionDelta(direction);
  const x = player.pos.x + delta.x;
  const y = player.pos.y + delta.y;

  const target = findFighterAt(state.entities, x, y);
  if (target !== -1 && target !== PLAYER) {
    attack(state, PLAYER, target);
  } else if (moveBy(state, PLAYER, delta.x, delta.y)) {
    state.fovRecompute = true;
  }
}
