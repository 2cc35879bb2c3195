import type { GameState } from "../shared/types.js";
import { GameStatus, TurnPhase } from "../shared/types.js";
import type { GameConfig } from "../shared/constants.js";
import { COLORS, PLAYER } from "../shared/constants.js";
import { addMessage } from "./log.js";
import { createPlayer } from "./entities.js";
import { generate } from "./procgen.js";
import type { Rng } from "./rng.js";

/** A fresh game on dungeon level 1 with the player at the first room's center. */
export function newGame(config: GameConfig, rng: Rng, seed: number): GameState {
  const level = generate(1, config, rng);
  const player = createPlayer(level.playerStart);

  const state: GameState = {
    seed,
    turn: 0,
    width: config.mapWidth,
    height: config.mapHeight,
    map: level.map,
    entities: [player, ...level.entities],
    inventory: [],
    log: [],
    dungeonLevel: 1,
    status: GameStatus.Playing,
    phase: TurnPhase.AwaitingPlayerInput,
    fovRecompute: true,
  };

  addMessage(state, "Welcome stranger! Prepare to perish in the Tombs of the Ancient Kings.", COLORS.red);
  return state;
}

/**
 * Rest, then go one level deeper: the player recovers half their maximum hit
 * points, every other entity is dropped and a new level is generated.
 *
 * The level is generated before anything else changes, so a
 * `GenerationError` leaves the state as it was.
 */
export function nextLevel(state: GameState, config: GameConfig, rng: Rng): void {
  const level = generate(state.dungeonLevel + 1, config, rng);
  const player = state.entities[PLAYER];

  addMessage(state, "You take a moment to rest, and recover your strength.", COLORS.lightViolet);
  const fighter = player.fighter;
  if (fighter) {
    fighter.hp = Math.min(fighter.hp + Math.floor(fighter.maxHp / 2), fighter.maxHp);
  }

  addMessage(
    state,
    "After a rare moment of peace, you descend deeper into the heart of the dungeon...",
    COLORS.red,
  );
  state.dungeonLevel += 1;

  state.entities.length = 1;
  player.pos = { ...level.playerStart };
  state.entities.push(...level.entities);
  state.map = level.map;
  state.fovRecompute = true;
}
