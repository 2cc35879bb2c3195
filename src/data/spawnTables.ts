import type { Transition } from "../shared/types.js";
import { ItemKind, MonsterKind } from "../shared/types.js";

/**
 * Depth-scaled spawn tables. Every table is a step function over dungeon level
 * and must stay sorted ascending by level.
 */
export interface SpawnTables {
  maxMonstersPerRoom: Transition[];
  maxItemsPerRoom: Transition[];
  monsterChances: { kind: MonsterKind; chance: Transition[] }[];
  itemChances: { kind: ItemKind; chance: Transition[] }[];
}

export const SPAWN_TABLES: SpawnTables = {
  maxMonstersPerRoom: [
    { level: 1, value: 2 },
    { level: 4, value: 3 },
    { level: 6, value: 5 },
  ],
  maxItemsPerRoom: [
    { level: 1, value: 1 },
    { level: 4, value: 2 },
  ],
  monsterChances: [
    { kind: MonsterKind.Orc, chance: [{ level: 1, value: 80 }] },
    {
      kind: MonsterKind.Troll,
      chance: [
        { level: 3, value: 15 },
        { level: 5, value: 30 },
        { level: 7, value: 60 },
      ],
    },
  ],
  // Only healing potions show up on the first level; scrolls phase in deeper.
  itemChances: [
    { kind: ItemKind.Heal, chance: [{ level: 1, value: 35 }] },
    { kind: ItemKind.Lightning, chance: [{ level: 4, value: 25 }] },
    { kind: ItemKind.Fireball, chance: [{ level: 6, value: 25 }] },
    { kind: ItemKind.Confuse, chance: [{ level: 2, value: 10 }] },
  ],
};
