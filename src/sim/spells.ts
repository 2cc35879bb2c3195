import type { GameState } from "../shared/types.js";
import { AiType, ItemKind, UseResult } from "../shared/types.js";
import type { GameConfig } from "../shared/constants.js";
import { COLORS, PLAYER } from "../shared/constants.js";
import { addMessage } from "./log.js";
import { creditXp, takeDamage } from "./combat.js";
import { distance } from "./entities.js";
import type { Prompter } from "./targeting.js";
import { closestMonster, targetTile } from "./targeting.js";
import type { Visibility } from "./vision.js";

export interface SpellContext {
  config: GameConfig;
  visibility: Visibility;
  prompter: Prompter;
}

// Every effect decides whether it is cancelled before touching any state.

export function castHeal(state: GameState, ctx: SpellContext): UseResult {
  const fighter = state.entities[PLAYER].fighter;
  if (!fighter) return UseResult.Cancelled;
  if (fighter.hp === fighter.maxHp) {
    addMessage(state, "You are already at full health.", COLORS.red);
    return UseResult.Cancelled;
  }
  addMessage(state, "Your wounds start to feel better!", COLORS.lightViolet);
  fighter.hp = Math.min(fighter.hp + ctx.config.healAmount, fighter.maxHp);
  return UseResult.Used;
}

export function castLightning(state: GameState, ctx: SpellContext): UseResult {
  const target = closestMonster(state, ctx.visibility, ctx.config.lightningRange);
  if (target === null) {
    addMessage(state, "No enemy is close enough to strike.", COLORS.red);
    return UseResult.Cancelled;
  }
  const damage = ctx.config.lightningDamage;
  addMessage(
    state,
    `A lightning bolt strikes the ${state.entities[target].name} with a loud thunder! The damage is ${damage} hit points.`,
    COLORS.lightBlue,
  );
  const xp = takeDamage(state, target, damage);
  if (xp !== null) creditXp(state, xp);
  return UseResult.Used;
}

/**
 * Burns every fighter within the radius of a chosen tile, the caster
 * included. Experience from kills other than the caster is credited once,
 * after the sweep.
 */
export function castFireball(state: GameState, ctx: SpellContext): UseResult {
  addMessage(state, "Left-click a target tile for the fireball, or right-click to cancel.", COLORS.lightCyan);
  const tile = targetTile(state, ctx.visibility, ctx.prompter);
  if (tile === null) return UseResult.Cancelled;

  const { fireballRadius, fireballDamage } = ctx.config;
  addMessage(state, `The fireball explodes, burning everything within ${fireballRadius} tiles!`, COLORS.orange);

  const victims: number[] = [];
  state.entities.forEach((e, i) => {
    if (e.fighter && distance(e, tile.x, tile.y) <= fireballRadius) victims.push(i);
  });

  let xpGained = 0;
  for (const i of victims) {
    addMessage(state, `The ${state.entities[i].name} gets burned for ${fireballDamage} hit points.`, COLORS.orange);
    const xp = takeDamage(state, i, fireballDamage);
    if (xp !== null && i !== PLAYER) xpGained += xp;
  }
  creditXp(state, xpGained);
  return UseResult.Used;
}

export function castConfuse(state: GameState, ctx: SpellContext): UseResult {
  const target = closestMonster(state, ctx.visibility, ctx.config.confuseRange);
  if (target === null) {
    addMessage(state, "No enemy is close enough to confuse.", COLORS.red);
    return UseResult.Cancelled;
  }
  const monster = state.entities[target];
  monster.ai = {
    type: AiType.Confused,
    previousAi: monster.ai,
    turnsRemaining: ctx.config.confuseNumTurns,
  };
  addMessage(state, `The eyes of the ${monster.name} look vacant, as he starts to stumble around!`, COLORS.lightGreen);
  return UseResult.Used;
}

const EFFECTS: Record<ItemKind, (state: GameState, ctx: SpellContext) => UseResult> = {
  [ItemKind.Heal]: castHeal,
  [ItemKind.Lightning]: castLightning,
  [ItemKind.Fireball]: castFireball,
  [ItemKind.Confuse]: castConfuse,
};

export function castItem(kind: ItemKind, state: GameState, ctx: SpellContext): UseResult {
  return EFFECTS[kind](state, ctx);
}
