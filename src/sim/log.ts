import type { GameState } from "../shared/types.js";
import { COLORS, MAX_LOG_MESSAGES } from "../shared/constants.js";

/**
 * Append a message to the game log, newest last. The oldest entries are
 * dropped once the log is full.
 */
export function addMessage(state: GameState, text: string, color: string = COLORS.white): void {
  if (state.log.length >= MAX_LOG_MESSAGES) {
    state.log.splice(0, state.log.length - MAX_LOG_MESSAGES + 1);
  }
  state.log.push({ text, color });
}
