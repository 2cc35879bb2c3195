/**
 * Save/Load: serialize GameState to a versioned JSON snapshot and
 * validate it on the way back in. A snapshot that fails to decode never
 * touches the state the caller already holds.
 */

import { readFileSync, writeFileSync } from "node:fs";
import { z } from "zod";
import type { Ai, GameState } from "../shared/types.js";
import { AiType, DeathKind, GameStatus, ItemKind, TurnPhase } from "../shared/types.js";
import { MENU_LETTERS } from "../shared/constants.js";
import { SnapshotError } from "../shared/errors.js";

const SNAPSHOT_VERSION = 1;

export type SnapshotResult =
  | { ok: true; state: GameState }
  | { ok: false; error: SnapshotError };

export type SaveResult = { ok: true } | { ok: false; error: SnapshotError };

// ── Schemas ──────────────────────────────────────────────────

const PositionSchema = z.object({ x: z.number().int(), y: z.number().int() });

const TileSchema = z.object({
  blocked: z.boolean(),
  blockSight: z.boolean(),
  explored: z.boolean(),
});

const FighterSchema = z.object({
  maxHp: z.number().int(),
  hp: z.number().int(),
  defense: z.number().int(),
  power: z.number().int(),
  xp: z.number().int().min(0),
  xpReward: z.number().int().min(0),
  onDeath: z.nativeEnum(DeathKind),
});

const AiSchema: z.ZodType<Ai> = z.lazy(() =>
  z.union([
    z.object({ type: z.literal(AiType.Basic) }),
    z.object({
      type: z.literal(AiType.Confused),
      previousAi: AiSchema.optional(),
      turnsRemaining: z.number().int().min(0),
    }),
  ]),
);

const EntitySchema = z.object({
  pos: PositionSchema,
  glyph: z.string().length(1),
  color: z.string(),
  name: z.string(),
  blocks: z.boolean(),
  alive: z.boolean(),
  alwaysVisible: z.boolean(),
  level: z.number().int().min(0),
  fighter: FighterSchema.optional(),
  ai: AiSchema.optional(),
  item: z.nativeEnum(ItemKind).optional(),
});

const GameStateSchema = z
  .object({
    seed: z.number().int(),
    turn: z.number().int().min(0),
    width: z.number().int().min(1),
    height: z.number().int().min(1),
    map: z.array(z.array(TileSchema)),
    entities: z.array(EntitySchema).min(1, "The player slot is missing"),
    inventory: z.array(EntitySchema).max(MENU_LETTERS.length),
    log: z.array(z.object({ text: z.string(), color: z.string() })),
    dungeonLevel: z.number().int().min(1),
    status: z.nativeEnum(GameStatus),
    phase: z.nativeEnum(TurnPhase),
    fovRecompute: z.boolean(),
  })
  .superRefine((data, ctx) => {
    if (data.map.length !== data.height || data.map.some(row => row.length !== data.width)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "Map dimensions do not match width and height",
        path: ["map"],
      });
    }
    if (data.entities[0]?.fighter === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "The first entity must be the player",
        path: ["entities", 0],
      });
    }
  });

const SnapshotSchema = z.object({
  _version: z.literal(SNAPSHOT_VERSION),
  state: GameStateSchema,
});

// ── Encoding ─────────────────────────────────────────────────

export function saveSnapshot(state: GameState): string {
  return JSON.stringify({ _version: SNAPSHOT_VERSION, state });
}

function versionOf(data: unknown): unknown {
  if (typeof data !== "object" || data === null || !("_version" in data)) return undefined;
  return data._version;
}

/** Decode a snapshot. The loaded game recomputes its field of view on the next step. */
export function loadSnapshot(blob: string): SnapshotResult {
  let data: unknown;
  try {
    data = JSON.parse(blob);
  } catch (err) {
    return {
      ok: false,
      error: new SnapshotError("PARSE_FAILED", "Snapshot is not valid JSON", { cause: err }),
    };
  }

  const version = versionOf(data);
  if (version !== SNAPSHOT_VERSION) {
    return {
      ok: false,
      error: new SnapshotError(
        "VERSION_MISMATCH",
        `Unsupported snapshot version ${String(version)}; expected ${SNAPSHOT_VERSION}`,
      ),
    };
  }

  const parsed = SnapshotSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? issue.path.join(".") : "";
    return {
      ok: false,
      error: new SnapshotError("INVALID", `Snapshot failed validation at "${where}": ${issue?.message ?? "unknown"}`, {
        cause: parsed.error,
      }),
    };
  }

  const state: GameState = parsed.data.state;
  state.fovRecompute = true;
  return { ok: true, state };
}

// ── File store ───────────────────────────────────────────────

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export function saveGame(path: string, state: GameState): SaveResult {
  try {
    writeFileSync(path, saveSnapshot(state), "utf8");
    return { ok: true };
  } catch (err) {
    console.warn("[saveLoad] Failed to write save:", err);
    return { ok: false, error: new SnapshotError("WRITE_FAILED", `Could not write ${path}`, { cause: err }) };
  }
}

export function loadGame(path: string): SnapshotResult {
  let blob: string;
  try {
    blob = readFileSync(path, "utf8");
  } catch (err) {
    if (isNotFound(err)) {
      return { ok: false, error: new SnapshotError("NOT_FOUND", `No saved game at ${path}`, { cause: err }) };
    }
    console.warn("[saveLoad] Failed to read save:", err);
    return { ok: false, error: new SnapshotError("READ_FAILED", `Could not read ${path}`, { cause: err }) };
  }

  const result = loadSnapshot(blob);
  if (!result.ok) {
    console.warn(`[saveLoad] Corrupt save detected: ${result.error.message}`);
  }
  return result;
}
