import { PreconditionError } from "../core/errors.js";

/** Anything with its own RNG state that `setSeed` should reach. */
export interface RandomSource {
  readonly name: string;
  seed(value: number): void;
}

export interface SeededRandom extends RandomSource {
  /** Uniform in [0, 1). */
  next(): number;
}

const LCG_MODULUS = 0x80000000;
const STATE_SPACE = 0x100000000;

/** Fold a safe integer into 32 bits of LCG state, mixing in the high word. */
export function seedState(seed: number): number {
  const high = Math.floor(seed / STATE_SPACE);
  return (seed ^ Math.imul(high, 0x9e3779b1)) >>> 0;
}

// Deterministic LCG PRNG
export function createSeededRandom(seed: number, name = "lcg"): SeededRandom {
  let state = seedState(seed);
  return {
    name,
    seed(value) {
      state = seedState(value);
    },
    next() {
      state = (state * 1664525 + 1013904223) % STATE_SPACE;
      return (state & 0x7fffffff) / LCG_MODULUS;
    },
  };
}

const defaultRandom = createSeededRandom(Date.now(), "default");
const sources = new Map<string, RandomSource>([[defaultRandom.name, defaultRandom]]);

/** Next value from the process-wide default source. */
export function random(): number {
  return defaultRandom.next();
}

export function registerRandomSource(source: RandomSource): void {
  sources.set(source.name, source);
}

export function unregisterRandomSource(name: string): boolean {
  if (name === defaultRandom.name) return false;
  return sources.delete(name);
}

export function randomSourceNames(): string[] {
  return [...sources.keys()];
}

/**
 * Seed every registered randomness source, for reproducible runs.
 */
export function setSeed(seed: number): void {
  if (!Number.isSafeInteger(seed)) {
    throw new PreconditionError([`seed: Expected an integer, received ${seed}`]);
  }
  for (const source of sources.values()) {
    source.seed(seed);
  }
}

export function seededShuffle<T>(arr: readonly T[], rng: () => number = random): T[] {
  const copy = [...arr];
  // Fisher-Yates
  for (let i = copy.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    [copy[i], copy[j]] = [copy[j], copy[i]];
  }
  return copy;
}
