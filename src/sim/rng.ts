import * as ROT from "rot-js";

/**
 * A private rot-js RNG instance. Simulation code never touches the shared
 * ROT.RNG singleton so that separately seeded games cannot disturb each other.
 */
export type Rng = typeof ROT.RNG;

export function createRng(seed: number): Rng {
  return ROT.RNG.clone().setSeed(seed);
}

/** Inclusive on both ends. */
export function range(rng: Rng, min: number, max: number): number {
  return rng.getUniformInt(min, max);
}

export function coinFlip(rng: Rng): boolean {
  return rng.getUniform() < 0.5;
}
