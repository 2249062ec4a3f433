import { randomInt } from "node:crypto";
import { ConfigError } from "./errors.js";

export type RandomSource = () => number;

export type RandomScope = "per-file" | "shared";

const FNV_OFFSET_BASIS = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

export const MAX_SEED = 0xffffffff;

/** Seeds are unsigned 32-bit integers; other values are rejected. */
export function normalizeSeed(value: number): number {
  if (!Number.isInteger(value) || value < 0 || value > MAX_SEED) {
    throw new ConfigError(`seed must be an integer in [0, ${MAX_SEED}], got: ${value}`);
  }
  return value >>> 0;
}

/**
 * 32-bit linear congruential generator. Returns floats in [0, 1).
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = normalizeSeed(seed);

  return () => {
    state = (state * 1664525 + 1013904223) >>> 0;
    return state / 4294967296;
  };
}

export function drawEntropySeed(): number {
  return randomInt(1, 0xffffffff);
}

export function deriveFileSeed(seed: number, fileName: string): number {
  let hash = FNV_OFFSET_BASIS;
  for (const char of fileName) {
    hash ^= char.codePointAt(0) ?? 0;
    hash = Math.imul(hash, FNV_PRIME) >>> 0;
  }
  return (hash ^ normalizeSeed(seed)) >>> 0;
}

export function randomIndexBelow(random: RandomSource, bound: number): number {
  const index = Math.floor(random() * bound);
  return Math.min(index, bound - 1);
}
