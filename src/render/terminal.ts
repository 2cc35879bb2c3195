import type { CharacterInfo, Entity, GameState, Menu } from "../shared/types.js";
import { GLYPHS, PLAYER } from "../shared/constants.js";
import { statusLine } from "../sim/progression.js";
import type { Visibility } from "../sim/vision.js";
import { isEntityShown } from "../sim/vision.js";

export interface RenderOptions {
  /** Ignore exploration and field of view (debug dumps). */
  revealAll?: boolean;
  /** How many of the newest log messages to print under the map. */
  messages?: number;
}

/** Blocking entities are drawn over items and corpses; the player goes on top. */
function drawOrder(state: GameState): Entity[] {
  const others = state.entities.filter((_, i) => i !== PLAYER);
  const sorted = [...others.filter(e => !e.blocks), ...others.filter(e => e.blocks)];
  sorted.push(state.entities[PLAYER]);
  return sorted;
}

/**
 * Render game state to a plain-text string (for headless use).
 * Unexplored tiles are blank; explored tiles show walls and floor.
 */
export function renderToString(state: GameState, visibility: Visibility, options: RenderOptions = {}): string {
  const revealAll = options.revealAll ?? false;
  const rows: string[][] = state.map.map(row =>
    row.map(tile => {
      if (!revealAll && !tile.explored) return GLYPHS.unexplored;
      return tile.blockSight ? GLYPHS.wall : GLYPHS.floor;
    }),
  );

  for (const e of drawOrder(state)) {
    if (!revealAll && !isEntityShown(state, visibility, e)) continue;
    const row = rows[e.pos.y];
    if (row && e.pos.x >= 0 && e.pos.x < row.length) {
      row[e.pos.x] = e.glyph;
    }
  }

  const lines = rows.map(r => r.join(""));
  const s = statusLine(state);
  lines.push(`HP: ${s.hp}/${s.maxHp}  Level: ${s.level}  XP: ${s.xp}  Dungeon level: ${s.dungeonLevel}  Turn: ${state.turn}`);

  const count = options.messages ?? 5;
  if (count > 0) {
    for (const m of state.log.slice(-count)) {
      lines.push(m.text);
    }
  }
  return lines.join("\n");
}

export function renderMenu(menu: Menu): string {
  const lines = menu.header.length > 0 ? [menu.header.trimEnd()] : [];
  for (const o of menu.options) {
    lines.push(`(${o.key}) ${o.text}`);
  }
  return lines.join("\n");
}

export function renderCharacterInfo(info: CharacterInfo): string {
  return [
    "Character information",
    "",
    `Level: ${info.level}`,
    `Experience: ${info.xp}`,
    `Experience to level up: ${info.xpToLevel}`,
    "",
    `Maximum HP: ${info.maxHp}`,
    `Attack: ${info.power}`,
    `Defense: ${info.defense}`,
  ].join("\n");
}
