import type { GameState } from "../shared/types.js";
import { AiType } from "../shared/types.js";
import { COLORS, PLAYER } from "../shared/constants.js";
import { addMessage } from "./log.js";
import { attack } from "./combat.js";
import { distanceTo, moveBy, moveTowards } from "./entities.js";
import type { Rng } from "./rng.js";
import { range } from "./rng.js";
import type { Visibility } from "./vision.js";

// ── Behaviours ───────────────────────────────────────────────

/** If the player can see the monster, the monster can see the player. */
function basicTurn(state: GameState, index: number, visibility: Visibility): void {
  const monster = state.entities[index];
  const player = state.entities[PLAYER];
  if (!visibility.isVisible(monster.pos.x, monster.pos.y)) return;

  if (distanceTo(monster, player) >= 2) {
    moveTowards(state, index, player.pos.x, player.pos.y);
  } else if (player.alive) {
    attack(state, index, PLAYER);
  }
}

/** Stumble one random step. The previous AI comes back once the counter runs out. */
function confusedTurn(state: GameState, index: number, rng: Rng): void {
  const monster = state.entities[index];
  const ai = monster.ai;
  if (ai?.type !== AiType.Confused) return;

  moveBy(state, index, range(rng, -1, 1), range(rng, -1, 1));
  ai.turnsRemaining -= 1;
  if (ai.turnsRemaining <= 0) {
    monster.ai = ai.previousAi;
    addMessage(state, `The ${monster.name} is no longer confused!`, COLORS.red);
  }
}

// ── Driver ───────────────────────────────────────────────────

/** One turn for every living AI-controlled entity, in ascending store order. */
export function runMonsterTurns(state: GameState, visibility: Visibility, rng: Rng): void {
  for (let i = 0; i < state.entities.length; i++) {
    if (i === PLAYER) continue;
    const entity = state.entities[i];
    if (!entity.alive || !entity.ai) continue;
    switch (entity.ai.type) {
      case AiType.Basic:
        basicTurn(state, i, visibility);
        break;
      case AiType.Confused:
        confusedTurn(state, i, rng);
        break;
    }
  }
}
