import { describe, it, expect } from "vitest";
import { step } from "../src/sim/step.js";
import type { StepContext } from "../src/sim/step.js";
import { newGame } from "../src/sim/state.js";
import { createItem } from "../src/sim/entities.js";
import { createRng } from "../src/sim/rng.js";
import { createConfig, DEFAULT_CONFIG, PLAYER, STAIRS_NAME } from "../src/shared/constants.js";
import { GenerationError } from "../src/shared/errors.js";
import {
  Direction,
  GameStatus,
  IntentType,
  ItemKind,
  PlayerAction,
  TurnPhase,
} from "../src/shared/types.js";
import type { GameState } from "../src/shared/types.js";
import { addOrc, makeFloorState, messages, ScriptedPrompter, StubVisibility } from "./fixtures.js";

function makeCtx(overrides: Partial<StepContext> = {}): StepContext {
  return {
    config: DEFAULT_CONFIG,
    rng: createRng(1),
    visibility: new StubVisibility(),
    prompter: new ScriptedPrompter(),
    ...overrides,
  };
}

function hp(state: GameState): number | undefined {
  return state.entities[PLAYER].fighter?.hp;
}

describe("Turn engine", () => {
  it("lets monsters act after a wait", () => {
    const state = makeFloorState();
    addOrc(state, { x: 11, y: 10 });

    const result = step(state, { type: IntentType.Wait }, makeCtx());

    expect(result.action).toBe(PlayerAction.TookTurn);
    expect(hp(state)).toBe(97);
    expect(state.turn).toBe(1);
    expect(state.phase).toBe(TurnPhase.AwaitingPlayerInput);
  });

  it("keeps monsters still when no time passes", () => {
    const state = makeFloorState();
    addOrc(state, { x: 11, y: 10 });
    const ctx = makeCtx();

    for (const type of [IntentType.Pickup, IntentType.OpenInventory, IntentType.ShowCharacterInfo, IntentType.None] as const) {
      expect(step(state, { type }, ctx).action).toBe(PlayerAction.DidntTakeTurn);
    }
    expect(step(state, { type: IntentType.UseItem, slot: 3 }, ctx).action).toBe(PlayerAction.DidntTakeTurn);
    expect(step(state, { type: IntentType.DropItem, slot: 0 }, ctx).action).toBe(PlayerAction.DidntTakeTurn);
    expect(step(state, { type: IntentType.DescendStairs }, ctx).action).toBe(PlayerAction.DidntTakeTurn);

    expect(hp(state)).toBe(100);
    expect(state.turn).toBe(0);
    expect(messages(state)).toEqual(["There are no stairs here."]);
  });

  it("bumping a monster attacks it, then it strikes back", () => {
    const state = makeFloorState();
    const orc = addOrc(state, { x: 11, y: 10 });
    const vis = new StubVisibility();

    step(state, { type: IntentType.Move, direction: Direction.East }, makeCtx({ visibility: vis }));

    expect(state.entities[PLAYER].pos).toEqual({ x: 10, y: 10 });
    expect(state.entities[orc].fighter?.hp).toBe(16);
    expect(messages(state)).toEqual([
      "player attacks orc for 4 hit points.",
      "orc attacks player for 3 hit points.",
    ]);
    expect(vis.recomputes).toEqual([]);
  });

  it("walking into a wall spends the turn without recomputing the view", () => {
    const state = makeFloorState();
    state.map[10][11].blocked = true;
    const vis = new StubVisibility();

    const result = step(state, { type: IntentType.Move, direction: Direction.East }, makeCtx({ visibility: vis }));

    expect(result.action).toBe(PlayerAction.TookTurn);
    expect(state.entities[PLAYER].pos).toEqual({ x: 10, y: 10 });
    expect(state.turn).toBe(1);
    expect(vis.recomputes).toEqual([]);
  });

  it("walking recomputes the field of view from the new tile", () => {
    const state = makeFloorState();
    const vis = new StubVisibility();

    step(state, { type: IntentType.Move, direction: Direction.SouthWest }, makeCtx({ visibility: vis }));

    expect(state.entities[PLAYER].pos).toEqual({ x: 9, y: 11 });
    expect(vis.recomputes).toEqual([{ x: 9, y: 11, radius: 10, lightWalls: true }]);
    expect(state.map[0][0].explored).toBe(true);
    expect(state.fovRecompute).toBe(false);
  });

  it("returns the inventory menu and character sheet", () => {
    const state = makeFloorState();
    state.inventory.push(createItem(ItemKind.Heal, { x: 0, y: 0 }));

    const inv = step(state, { type: IntentType.OpenInventory }, makeCtx());
    expect(inv.inventory?.options).toEqual([{ key: "a", text: "healing potion" }]);

    const sheet = step(state, { type: IntentType.ShowCharacterInfo }, makeCtx());
    expect(sheet.character?.xpToLevel).toBe(350);
  });

  it("a cancelled item costs no time", () => {
    const state = makeFloorState();
    addOrc(state, { x: 11, y: 10 });
    state.inventory.push(createItem(ItemKind.Heal, { x: 0, y: 0 }));

    const result = step(state, { type: IntentType.UseItem, slot: 0 }, makeCtx());

    expect(result.action).toBe(PlayerAction.DidntTakeTurn);
    expect(hp(state)).toBe(100);
    expect(messages(state)).toEqual(["You are already at full health.", "Cancelled"]);
  });

  it("a used item spends the turn", () => {
    const state = makeFloorState();
    addOrc(state, { x: 11, y: 10 });
    const fighter = state.entities[PLAYER].fighter;
    if (!fighter) throw new Error("player has no fighter");
    fighter.hp = 50;
    state.inventory.push(createItem(ItemKind.Heal, { x: 0, y: 0 }));

    const result = step(state, { type: IntentType.UseItem, slot: 0 }, makeCtx());

    expect(result.action).toBe(PlayerAction.TookTurn);
    expect(fighter.hp).toBe(87);
    expect(state.inventory).toEqual([]);
  });

  it("picks up and drops without spending a turn", () => {
    const state = makeFloorState();
    state.entities.push(createItem(ItemKind.Confuse, { x: 10, y: 10 }));

    expect(step(state, { type: IntentType.Pickup }, makeCtx()).action).toBe(PlayerAction.DidntTakeTurn);
    expect(state.inventory.map(i => i.name)).toEqual(["scroll of confusion"]);
    expect(state.entities).toHaveLength(1);

    expect(step(state, { type: IntentType.DropItem, slot: 0 }, makeCtx()).action).toBe(PlayerAction.DidntTakeTurn);
    expect(state.inventory).toEqual([]);
    expect(state.entities[1].pos).toEqual({ x: 10, y: 10 });
    expect(state.turn).toBe(0);
  });

  it("ends the game when the player falls", () => {
    const state = makeFloorState();
    addOrc(state, { x: 11, y: 10 });
    const fighter = state.entities[PLAYER].fighter;
    if (!fighter) throw new Error("player has no fighter");
    fighter.hp = 2;

    step(state, { type: IntentType.Wait }, makeCtx());

    expect(state.status).toBe(GameStatus.Dead);
    expect(state.phase).toBe(TurnPhase.GameOver);
    expect(messages(state).slice(-1)).toEqual(["You died!"]);

    const after = step(state, { type: IntentType.Wait }, makeCtx());
    expect(after.action).toBe(PlayerAction.DidntTakeTurn);
    expect(state.turn).toBe(1);
  });

  it("offers a level-up once enough experience is banked", () => {
    const state = makeFloorState();
    const fighter = state.entities[PLAYER].fighter;
    if (!fighter) throw new Error("player has no fighter");
    fighter.xp = 360;
    const prompter = new ScriptedPrompter([], [1]);

    step(state, { type: IntentType.Wait }, makeCtx({ prompter }));

    expect(state.entities[PLAYER].level).toBe(2);
    expect(fighter.power).toBe(5);
    expect(fighter.xp).toBe(10);
  });
});

describe("Descending", () => {
  it("rests, regenerates the level and keeps only the player", () => {
    const rng = createRng(5);
    const state = newGame(DEFAULT_CONFIG, rng, 5);
    const stairs = state.entities.find(e => e.name === STAIRS_NAME);
    if (!stairs) throw new Error("level has no stairs");
    const player = state.entities[PLAYER];
    player.pos = { ...stairs.pos };
    const fighter = player.fighter;
    if (!fighter) throw new Error("player has no fighter");
    fighter.hp = 40;
    const oldMap = state.map;
    const logBefore = state.log.length;

    const result = step(
      state,
      { type: IntentType.DescendStairs },
      makeCtx({ rng, visibility: new StubVisibility(() => false) }),
    );

    expect(result.action).toBe(PlayerAction.TookTurn);
    expect(state.dungeonLevel).toBe(2);
    expect(fighter.hp).toBe(90);
    expect(state.entities[PLAYER]).toBe(player);
    expect(state.map).not.toBe(oldMap);
    expect(state.map[player.pos.y][player.pos.x].blocked).toBe(false);
    expect(state.entities.filter(e => e.name === STAIRS_NAME)).toHaveLength(1);
    expect(messages(state).slice(logBefore)).toEqual([
      "You take a moment to rest, and recover your strength.",
      "After a rare moment of peace, you descend deeper into the heart of the dungeon...",
    ]);
    expect(state.phase).toBe(TurnPhase.AwaitingPlayerInput);
  });

  it("leaves the game untouched when the next level cannot be built", () => {
    const rng = createRng(5);
    const state = newGame(DEFAULT_CONFIG, rng, 5);
    const stairs = state.entities.find(e => e.name === STAIRS_NAME);
    if (!stairs) throw new Error("level has no stairs");
    const player = state.entities[PLAYER];
    player.pos = { ...stairs.pos };
    const fighter = player.fighter;
    if (!fighter) throw new Error("player has no fighter");
    fighter.hp = 40;
    const oldMap = state.map;
    const entityCount = state.entities.length;
    const logBefore = state.log.length;

    expect(() =>
      step(state, { type: IntentType.DescendStairs }, makeCtx({ rng, config: createConfig({ maxRooms: 0 }) })),
    ).toThrow(GenerationError);

    expect(state.dungeonLevel).toBe(1);
    expect(fighter.hp).toBe(40);
    expect(state.map).toBe(oldMap);
    expect(state.entities).toHaveLength(entityCount);
    expect(state.log).toHaveLength(logBefore);
    expect(state.turn).toBe(0);
    expect(state.phase).toBe(TurnPhase.AwaitingPlayerInput);
  });
});
