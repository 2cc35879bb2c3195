// ── Coordinates ──────────────────────────────────────────────
export interface Position {
  x: number;
  y: number;
}

export enum Direction {
  North = "north",
  South = "south",
  East = "east",
  West = "west",
  NorthEast = "northeast",
  NorthWest = "northwest",
  SouthEast = "southeast",
  SouthWest = "southwest",
}

// ── Tiles ────────────────────────────────────────────────────
export interface Tile {
  blocked: boolean;
  blockSight: boolean;
  explored: boolean; // true once the tile has been visible; never reverts
}

/** Indexed as map[y][x]. */
export type TileGrid = Tile[][];

/** Axis-aligned room rectangle. x2/y2 are the far walls, not the last floor tile. */
export interface Rect {
  x1: number;
  y1: number;
  x2: number;
  y2: number;
}

// ── Capabilities ─────────────────────────────────────────────
export enum DeathKind {
  PlayerDeath = "player_death",
  MonsterDeath = "monster_death",
}

export interface Fighter {
  maxHp: number;
  hp: number;
  defense: number;
  power: number;
  xp: number; // accumulated experience (player only)
  xpReward: number; // experience yielded to the killer
  onDeath: DeathKind;
}

export enum AiType {
  Basic = "basic",
  Confused = "confused",
}

export type Ai =
  | { type: AiType.Basic }
  | { type: AiType.Confused; previousAi?: Ai; turnsRemaining: number };

export enum ItemKind {
  Heal = "heal",
  Lightning = "lightning",
  Fireball = "fireball",
  Confuse = "confuse",
}

export enum MonsterKind {
  Orc = "orc",
  Troll = "troll",
}

// ── Entities ─────────────────────────────────────────────────
export interface Entity {
  pos: Position;
  glyph: string;
  color: string;
  name: string;
  blocks: boolean;
  alive: boolean;
  alwaysVisible: boolean; // landmarks stay drawn on explored tiles
  level: number;
  fighter?: Fighter;
  ai?: Ai;
  item?: ItemKind;
}

// ── Messages ─────────────────────────────────────────────────
export interface Message {
  text: string;
  color: string;
}

// ── Content tables ───────────────────────────────────────────
/** One step of a level → value step function. Tables are sorted ascending by level. */
export interface Transition {
  level: number;
  value: number;
}

export interface Weighted<T> {
  weight: number;
  value: T;
}

// ── Player intents ───────────────────────────────────────────
export enum IntentType {
  Move = "move",
  Wait = "wait",
  Pickup = "pickup",
  OpenInventory = "openInventory",
  UseItem = "useItem",
  DropItem = "dropItem",
  DescendStairs = "descendStairs",
  ShowCharacterInfo = "showCharacterInfo",
  None = "none",
}

export type Intent =
  | { type: IntentType.Move; direction: Direction }
  | { type: IntentType.UseItem; slot: number }
  | { type: IntentType.DropItem; slot: number }
  | {
      type:
        | IntentType.Wait
        | IntentType.Pickup
        | IntentType.OpenInventory
        | IntentType.DescendStairs
        | IntentType.ShowCharacterInfo
        | IntentType.None;
    };

export enum PlayerAction {
  TookTurn = "tookTurn",
  DidntTakeTurn = "didntTakeTurn",
}

export enum UseResult {
  Used = "used",
  Cancelled = "cancelled",
}

// ── Game state ───────────────────────────────────────────────
export enum GameStatus {
  Playing = "playing",
  Dead = "dead",
}

export enum TurnPhase {
  AwaitingPlayerInput = "awaitingPlayerInput",
  ResolvingPlayerAction = "resolvingPlayerAction",
  RunningMonsterTurns = "runningMonsterTurns",
  Descending = "descending",
  GameOver = "gameOver",
}

export interface GameState {
  seed: number;
  turn: number;
  width: number;
  height: number;
  map: TileGrid;
  /** Index-addressed store; the player is always entities[PLAYER]. */
  entities: Entity[];
  inventory: Entity[];
  log: Message[];
  dungeonLevel: number;
  status: GameStatus;
  phase: TurnPhase;
  fovRecompute: boolean;
}

// ── Menus ────────────────────────────────────────────────────
export interface MenuOption {
  key: string;
  text: string;
}

export interface Menu {
  header: string;
  options: MenuOption[];
}

export interface CharacterInfo {
  level: number;
  xp: number;
  xpToLevel: number;
  maxHp: number;
  power: number;
  defense: number;
}

export interface StatusLine {
  hp: number;
  maxHp: number;
  level: number;
  xp: number;
  dungeonLevel: number;
}
