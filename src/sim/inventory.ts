import type { GameState } from "../shared/types.js";
import { UseResult } from "../shared/types.js";
import type { GameConfig } from "../shared/constants.js";
import { COLORS, PLAYER } from "../shared/constants.js";
import { assertContract } from "../shared/errors.js";
import { addMessage } from "./log.js";
import { swapRemove } from "./entities.js";
import type { SpellContext } from "./spells.js";
import { castItem } from "./spells.js";

function assertSlot(state: GameState, slot: number): void {
  assertContract(
    Number.isInteger(slot) && slot >= 0 && slot < state.inventory.length,
    "Inventory slot out of range",
    { slot, size: state.inventory.length },
  );
}

/**
 * Move the entity at `index` from the map into the inventory. The store is
 * compacted with swapRemove, so the previously last entity now sits at `index`.
 * Returns true if the item was taken.
 */
export function pickItemUp(state: GameState, index: number, config: GameConfig): boolean {
  const name = state.entities[index].name;
  if (state.inventory.length >= config.inventoryCapacity) {
    addMessage(state, `Your inventory is full, cannot pick up ${name}.`, COLORS.red);
    return false;
  }
  const item = swapRemove(state.entities, index);
  addMessage(state, `You picked up a ${item.name}!`, COLORS.green);
  state.inventory.push(item);
  return true;
}

/** Use the item in `slot`. Consumed items leave the inventory; the rest keep their order. */
export function useItem(state: GameState, slot: number, ctx: SpellContext): UseResult {
  assertSlot(state, slot);
  const entity = state.inventory[slot];
  if (entity.item === undefined) {
    addMessage(state, `The ${entity.name} cannot be used.`);
    return UseResult.Cancelled;
  }
  const result = castItem(entity.item, state, ctx);
  if (result === UseResult.Used) {
    state.inventory.splice(slot, 1);
  } else {
    addMessage(state, "Cancelled");
  }
  return result;
}

/** Put the item back in the store at the player's feet. */
export function dropItem(state: GameState, slot: number): void {
  assertSlot(state, slot);
  const [item] = state.inventory.splice(slot, 1);
  item.pos = { ...state.entities[PLAYER].pos };
  addMessage(state, `You dropped a ${item.name}.`, COLORS.yellow);
  state.entities.push(item);
}
