import type { Transition, Weighted } from "../shared/types.js";
import { assertContract } from "../shared/errors.js";
import type { Rng } from "./rng.js";

/**
 * Value of the last transition whose level is at or below `level`, or 0 when
 * the level is below every entry.
 */
export function fromDungeonLevel(table: readonly Transition[], level: number): number {
  let value = 0;
  for (const t of table) {
    if (t.level > level) break;
    value = t.value;
  }
  return value;
}

/**
 * Pick one candidate with probability weight / total. Zero-weight candidates
 * are never returned.
 */
export function weightedChoice<T>(candidates: readonly Weighted<T>[], rng: Rng): T {
  assertContract(candidates.length > 0, "weightedChoice needs at least one candidate");
  let total = 0;
  for (const c of candidates) {
    assertContract(c.weight >= 0, "weightedChoice weight must be non-negative", { weight: c.weight });
    total += c.weight;
  }
  assertContract(total > 0, "weightedChoice total weight must be positive");

  let roll = rng.getUniform() * total;
  for (const c of candidates) {
    if (c.weight === 0) continue;
    if (roll < c.weight) return c.value;
    roll -= c.weight;
  }
  // Float rounding can leave roll just past the last bucket.
  const last = [...candidates].reverse().find(c => c.weight > 0);
  assertContract(last !== undefined, "weightedChoice found no positive weight");
  return last.value;
}
