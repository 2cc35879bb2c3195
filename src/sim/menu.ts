import type { GameState, Menu } from "../shared/types.js";
import { MENU_LETTERS } from "../shared/constants.js";
import { assertContract } from "../shared/errors.js";

/** Label options a, b, c, ... in order. More than 26 options cannot be keyed. */
export function buildMenu(header: string, options: readonly string[]): Menu {
  assertContract(options.length <= MENU_LETTERS.length, "Cannot have a menu with more than 26 options.", {
    options: options.length,
  });
  return {
    header,
    options: options.map((text, i) => ({ key: MENU_LETTERS[i], text })),
  };
}

/** Option index for a pressed key, or null if the key labels nothing. */
export function menuChoice(menu: Menu, key: string): number | null {
  const index = menu.options.findIndex(o => o.key === key.toLowerCase());
  return index === -1 ? null : index;
}

/**
 * One option per carried item. An empty inventory shows a single placeholder
 * line which never maps to a slot; see `inventorySlot`.
 */
export function inventoryMenu(state: GameState, header: string): Menu {
  if (state.inventory.length === 0) {
    return buildMenu(header, ["Inventory is empty."]);
  }
  return buildMenu(header, state.inventory.map(item => item.name));
}

/** Resolve a key pressed on the inventory menu to an inventory slot. */
export function inventorySlot(state: GameState, key: string): number | null {
  if (state.inventory.length === 0) return null;
  return menuChoice(inventoryMenu(state, ""), key);
}
