import type { CharacterInfo, GameState, Intent, Menu } from "../shared/types.js";
import { GameStatus, IntentType, PlayerAction, TurnPhase, UseResult } from "../shared/types.js";
import type { GameConfig } from "../shared/constants.js";
import { PLAYER } from "../shared/constants.js";
import { playerMoveOrAttack } from "./actions.js";
import { runMonsterTurns } from "./ai.js";
import { findItemAt, isOnStairs } from "./entities.js";
import { dropItem, pickItemUp, useItem } from "./inventory.js";
import { addMessage } from "./log.js";
import { inventoryMenu } from "./menu.js";
import { characterInfo, checkLevelUp } from "./progression.js";
import type { Rng } from "./rng.js";
import { nextLevel } from "./state.js";
import type { Prompter } from "./targeting.js";
import type { Visibility } from "./vision.js";
import { refreshVision } from "./vision.js";

export interface StepContext {
  config: GameConfig;
  rng: Rng;
  visibility: Visibility;
  prompter: Prompter;
}

/**
 * What a step produced. `inventory` and `character` carry data for the front
 * end to show when the intent asked for it.
 */
export interface TurnResult {
  action: PlayerAction;
  inventory?: Menu;
  character?: CharacterInfo;
}

const TOOK_TURN: TurnResult = { action: PlayerAction.TookTurn };
const NO_TURN: TurnResult = { action: PlayerAction.DidntTakeTurn };

function hasSlot(state: GameState, slot: number): boolean {
  return Number.isInteger(slot) && slot >= 0 && slot < state.inventory.length;
}

function resolveIntent(state: GameState, intent: Intent, ctx: StepContext): TurnResult {
  switch (intent.type) {
    case IntentType.Move:
      playerMoveOrAttack(state, intent.direction);
      return TOOK_TURN;

    case IntentType.Wait:
      return TOOK_TURN;

    case IntentType.Pickup: {
      const player = state.entities[PLAYER];
      const index = findItemAt(state.entities, player.pos.x, player.pos.y);
      if (index !== -1) pickItemUp(state, index, ctx.config);
      return NO_TURN;
    }

    case IntentType.OpenInventory:
      return {
        action: PlayerAction.DidntTakeTurn,
        inventory: inventoryMenu(state, "Press the key next to an item to use it, or any other to cancel.\n"),
      };

    case IntentType.UseItem:
      if (!hasSlot(state, intent.slot)) return NO_TURN;
      return useItem(state, intent.slot, ctx) === UseResult.Used ? TOOK_TURN : NO_TURN;

    case IntentType.DropItem:
      if (hasSlot(state, intent.slot)) dropItem(state, intent.slot);
      return NO_TURN;

    case IntentType.DescendStairs:
      if (!isOnStairs(state)) {
        addMessage(state, "There are no stairs here.");
        return NO_TURN;
      }
      state.phase = TurnPhase.Descending;
      nextLevel(state, ctx.config, ctx.rng);
      return TOOK_TURN;

    case IntentType.ShowCharacterInfo:
      return { action: PlayerAction.DidntTakeTurn, character: characterInfo(state, ctx.config) };

    case IntentType.None:
      return NO_TURN;
  }
}

/**
 * Advance the game by one player intent.
 *
 * Order: resolve the player's action, refresh the field of view if it moved,
 * let every monster act if the action spent the turn, then offer a level-up.
 * Intents that spend no time leave the monsters untouched. If resolving the
 * intent throws, the phase is put back before the error propagates.
 */
export function step(state: GameState, intent: Intent, ctx: StepContext): TurnResult {
  if (state.status !== GameStatus.Playing) {
    state.phase = TurnPhase.GameOver;
    return NO_TURN;
  }

  const phaseBefore = state.phase;
  state.phase = TurnPhase.ResolvingPlayerAction;
  let result: TurnResult;
  try {
    result = resolveIntent(state, intent, ctx);
  } catch (err) {
    state.phase = phaseBefore;
    throw err;
  }

  if (state.fovRecompute) {
    refreshVision(state, ctx.visibility, ctx.config.torchRadius, ctx.config.fovLightWalls);
  }

  if (result.action === PlayerAction.TookTurn) {
    state.turn += 1;
    if (state.status === GameStatus.Playing) {
      state.phase = TurnPhase.RunningMonsterTurns;
      runMonsterTurns(state, ctx.visibility, ctx.rng);
    }
  }

  if (state.status === GameStatus.Playing) {
    checkLevelUp(state, ctx);
    state.phase = TurnPhase.AwaitingPlayerInput;
  } else {
    state.phase = TurnPhase.GameOver;
  }

  return { ...result };
}
