import type { Entity, GameState, Menu, Position } from "../src/shared/types.js";
import { GameStatus, MonsterKind, TurnPhase } from "../src/shared/types.js";
import { createWallGrid } from "../src/sim/rooms.js";
import { createMonster, createPlayer } from "../src/sim/entities.js";
import type { Visibility } from "../src/sim/vision.js";
import type { Prompter } from "../src/sim/targeting.js";

/** An open room: every tile is floor, only the player is in the store. */
export function makeFloorState(width = 20, height = 20, playerPos: Position = { x: 10, y: 10 }): GameState {
  const map = createWallGrid(width, height);
  for (const row of map) {
    for (const tile of row) {
      tile.blocked = false;
      tile.blockSight = false;
    }
  }
  return {
    seed: 1,
    turn: 0,
    width,
    height,
    map,
    entities: [createPlayer(playerPos)],
    inventory: [],
    log: [],
    dungeonLevel: 1,
    status: GameStatus.Playing,
    phase: TurnPhase.AwaitingPlayerInput,
    fovRecompute: false,
  };
}

/** Push a monster into the store and return its index. */
export function addMonster(state: GameState, kind: MonsterKind, pos: Position): number {
  state.entities.push(createMonster(kind, pos));
  return state.entities.length - 1;
}

export function addOrc(state: GameState, pos: Position): number {
  return addMonster(state, MonsterKind.Orc, pos);
}

export function add(state: GameState, entity: Entity): number {
  state.entities.push(entity);
  return state.entities.length - 1;
}

export function messages(state: GameState): string[] {
  return state.log.map(m => m.text);
}

/** Visibility answered by a predicate; records every recompute request. */
export class StubVisibility implements Visibility {
  readonly recomputes: { x: number; y: number; radius: number; lightWalls: boolean }[] = [];

  constructor(private readonly visible: (x: number, y: number) => boolean = () => true) {}

  isVisible(x: number, y: number): boolean {
    return this.visible(x, y);
  }

  recompute(originX: number, originY: number, radius: number, lightWalls: boolean): void {
    this.recomputes.push({ x: originX, y: originY, radius, lightWalls });
  }
}

/** Answers prompts from queues; running past the end of a queue fails the test. */
export class ScriptedPrompter implements Prompter {
  readonly menus: Menu[] = [];
  tilePrompts = 0;

  constructor(
    private readonly tiles: (Position | null)[] = [],
    private readonly choices: (number | null)[] = [],
  ) {}

  pickTile(): Position | null {
    this.tilePrompts += 1;
    const next = this.tiles.shift();
    if (next === undefined) throw new Error("ScriptedPrompter ran out of tiles");
    return next;
  }

  choose(menu: Menu): number | null {
    this.menus.push(menu);
    const next = this.choices.shift();
    if (next === undefined) throw new Error("ScriptedPrompter ran out of choices");
    return next;
  }
}
