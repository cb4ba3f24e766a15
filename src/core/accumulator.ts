import { AccumulationError } from "./errors.js";
import type { AppendMode } from "./schema.js";

/**
 * Strategy for merging one value into the output collection.
 * Implementations mutate `output` in place.
 */
export interface Accumulator<V = unknown> {
  accumulate(value: V, output: unknown[]): void;
}

export type AccumulateFn<V = unknown> = (value: V, output: unknown[]) => void;

export function isSequence(value: unknown): value is Iterable<unknown> {
  return typeof value === "object"
    && value !== null
    && Symbol.iterator in value
    && typeof value[Symbol.iterator] === "function";
}

export const appendAccumulator: Accumulator = {
  accumulate(value, output) {
    output.push(value);
  },
};

// Strings are rejected: extending with one would scatter its characters.
export const extendAccumulator: Accumulator = {
  accumulate(value, output) {
    if (!isSequence(value)) {
      const kind = value === null ? "null" : typeof value;
      throw new AccumulationError(`Cannot extend output with a non-sequence value (${kind})`, value);
    }
    // Drain first so a throwing iterator leaves the output untouched.
    const items = Array.from(value);
    for (const item of items) output.push(item);
  },
};

export function resolveAccumulator<V>(
  mode: AppendMode,
  custom?: Accumulator<V> | AccumulateFn<V>,
): Accumulator<V> {
  if (typeof custom === "function") return { accumulate: custom };
  if (custom) return custom;
  return mode === "extend" ? extendAccumulator : appendAccumulator;
}
