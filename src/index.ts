export * from "./shared/types.js";
export * from "./shared/constants.js";
export * from "./shared/errors.js";
export type { SpawnTables } from "./data/spawnTables.js";

export { createRng, type Rng } from "./sim/rng.js";
export { generate, type GeneratedLevel } from "./sim/procgen.js";
export { fromDungeonLevel, weightedChoice } from "./sim/tables.js";
export { mutTwo, swapRemove, isBlocked } from "./sim/entities.js";
export { attack, takeDamage, type AttackOutcome } from "./sim/combat.js";
export { closestMonster, targetTile, type Prompter } from "./sim/targeting.js";
export { castItem, type SpellContext } from "./sim/spells.js";
export { runMonsterTurns } from "./sim/ai.js";
export { pickItemUp, useItem, dropItem } from "./sim/inventory.js";
export { buildMenu, menuChoice, inventoryMenu, inventorySlot } from "./sim/menu.js";
export { ShadowcastingVisibility, markExplored, refreshVision, isEntityShown, type Visibility } from "./sim/vision.js";
export { levelUpXp, checkLevelUp, characterInfo, statusLine } from "./sim/progression.js";
export { newGame, nextLevel } from "./sim/state.js";
export { step, type StepContext, type TurnResult } from "./sim/step.js";
export { saveSnapshot, loadSnapshot, saveGame, loadGame, type SnapshotResult, type SaveResult } from "./sim/saveLoad.js";
export { renderToString, renderMenu, renderCharacterInfo } from "./render/terminal.js";
