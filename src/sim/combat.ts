import type { Entity, GameState } from "../shared/types.js";
import { DeathKind, GameStatus, TurnPhase } from "../shared/types.js";
import { COLORS, GLYPHS, PLAYER } from "../shared/constants.js";
import { addMessage } from "./log.js";
import { mutTwo } from "./entities.js";

export interface AttackOutcome {
  damage: number;
  killed: boolean;
  /** Experience credited to the attacker by this attack (player only). */
  xp: number;
}

// ── Death ────────────────────────────────────────────────────

function playerDeath(state: GameState, player: Entity): void {
  addMessage(state, "You died!", COLORS.red);
  state.status = GameStatus.Dead;
  state.phase = TurnPhase.GameOver;
  player.glyph = GLYPHS.corpse;
  player.color = COLORS.darkRed;
}

/** The monster becomes a corpse: walkable, inert, and renamed. */
function monsterDeath(state: GameState, monster: Entity, xpReward: number): void {
  addMessage(state, `${monster.name} is dead! You gain ${xpReward} experience points.`, COLORS.orange);
  monster.glyph = GLYPHS.corpse;
  monster.color = COLORS.darkRed;
  monster.blocks = false;
  monster.fighter = undefined;
  monster.ai = undefined;
  monster.name = `remains of ${monster.name}`;
}

/**
 * Subtract damage from an entity's hit points. When this drops a living
 * fighter to 0 or below it dies: the death handler runs exactly once and the
 * xp reward is returned. Otherwise returns null.
 */
export function takeDamage(state: GameState, index: number, damage: number): number | null {
  return damageEntity(state, state.entities[index], damage);
}

export function damageEntity(state: GameState, entity: Entity, damage: number): number | null {
  const fighter = entity.fighter;
  if (!fighter) return null;

  if (damage > 0) {
    fighter.hp -= damage;
  }
  if (fighter.hp > 0 || !entity.alive) return null;

  entity.alive = false;
  const xpReward = fighter.xpReward;
  switch (fighter.onDeath) {
    case DeathKind.PlayerDeath:
      playerDeath(state, entity);
      break;
    case DeathKind.MonsterDeath:
      monsterDeath(state, entity, xpReward);
      break;
  }
  return xpReward;
}

/** Add experience to the player's fighter. */
export function creditXp(state: GameState, xp: number): void {
  const fighter = state.entities[PLAYER].fighter;
  if (fighter && xp > 0) {
    fighter.xp += xp;
  }
}

// ── Melee ────────────────────────────────────────────────────

export function attack(state: GameState, attackerIndex: number, defenderIndex: number): AttackOutcome {
  const [attacker, defender] = mutTwo(state.entities, attackerIndex, defenderIndex);
  const power = attacker.fighter?.power ?? 0;
  const defense = defender.fighter?.defense ?? 0;
  const damage = power - defense;

  if (damage <= 0) {
    addMessage(state, `${attacker.name} attacks ${defender.name} but it has no effect!`);
    return { damage: 0, killed: false, xp: 0 };
  }

  addMessage(state, `${attacker.name} attacks ${defender.name} for ${damage} hit points.`);
  const reward = damageEntity(state, defender, damage);
  if (reward === null) {
    return { damage, killed: false, xp: 0 };
  }
  if (attackerIndex !== PLAYER) {
    return { damage, killed: true, xp: 0 };
  }
  creditXp(state, reward);
  return { damage, killed: true, xp: reward };
}
