import type { CharacterInfo, GameState, StatusLine } from "../shared/types.js";
import type { GameConfig } from "../shared/constants.js";
import { COLORS, PLAYER } from "../shared/constants.js";
import { addMessage } from "./log.js";
import { buildMenu } from "./menu.js";
import type { Prompter } from "./targeting.js";

/** Experience needed to advance past `level`. */
export function levelUpXp(level: number, config: GameConfig): number {
  return config.levelUpBase + level * config.levelUpFactor;
}

export interface LevelUpContext {
  config: GameConfig;
  prompter: Prompter;
}

/**
 * Advance the player one level if they have enough experience, then keep
 * asking until one of the three stat boosts is chosen. At most one level is
 * gained per call. Returns true on level-up.
 */
export function checkLevelUp(state: GameState, ctx: LevelUpContext): boolean {
  const player = state.entities[PLAYER];
  const fighter = player.fighter;
  if (!fighter) return false;

  const threshold = levelUpXp(player.level, ctx.config);
  if (fighter.xp < threshold) return false;

  player.level += 1;
  fighter.xp -= threshold;
  addMessage(state, `Your battle skills grow stronger! You reached level ${player.level}!`, COLORS.yellow);

  const { levelUpHpBonus, levelUpPowerBonus, levelUpDefenseBonus } = ctx.config;
  const menu = buildMenu("Level up! Choose a stat to raise:\n", [
    `Constitution (+${levelUpHpBonus} HP, from ${fighter.maxHp})`,
    `Strength (+${levelUpPowerBonus} attack, from ${fighter.power})`,
    `Agility (+${levelUpDefenseBonus} defense, from ${fighter.defense})`,
  ]);

  for (;;) {
    switch (ctx.prompter.choose(menu)) {
      case 0:
        fighter.maxHp += levelUpHpBonus;
        fighter.hp += levelUpHpBonus;
        return true;
      case 1:
        fighter.power += levelUpPowerBonus;
        return true;
      case 2:
        fighter.defense += levelUpDefenseBonus;
        return true;
      default:
        continue;
    }
  }
}

export function characterInfo(state: GameState, config: GameConfig): CharacterInfo {
  const player = state.entities[PLAYER];
  const fighter = player.fighter;
  return {
    level: player.level,
    xp: fighter?.xp ?? 0,
    xpToLevel: levelUpXp(player.level, config),
    maxHp: fighter?.maxHp ?? 0,
    power: fighter?.power ?? 0,
    defense: fighter?.defense ?? 0,
  };
}

export function statusLine(state: GameState): StatusLine {
  const player = state.entities[PLAYER];
  return {
    hp: player.fighter?.hp ?? 0,
    maxHp: player.fighter?.maxHp ?? 0,
    level: player.level,
    xp: player.fighter?.xp ?? 0,
    dungeonLevel: state.dungeonLevel,
  };
}
