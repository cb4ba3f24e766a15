import { AccumulationError } from "./errors.js";
import type { Outcome } from "./outcome.js";
import type { Accumulator } from "./accumulator.js";
import type { ErrorPolicy } from "./schema.js";

export interface CollectorOptions<R> {
  accumulator: Accumulator<R | Error>;
  /** Used for failures recorded under "collect"; defaults to `accumulator`. */
  errorAccumulator?: Accumulator<R | Error>;
  onError: ErrorPolicy;
  returnOutput: boolean;
  /** An array is filled in place and returned; other iterables are copied. */
  initialResult?: Iterable<unknown>;
}

/**
 * The single routine both dispatch paths feed outcomes into, so serial and
 * pooled runs apply identical accumulation and error handling.
 */
export interface Collector<R> {
  /** `policy` overrides the configured one (warm-up always raises). */
  collect(outcome: Outcome<R>, policy?: ErrorPolicy): void;
  result(): unknown[] | undefined;
}

function accumulationFailure(value: unknown, err: unknown): AccumulationError {
  if (err instanceof AccumulationError) return err;
  const msg = err instanceof Error ? err.message : String(err);
  return new AccumulationError(`Accumulator failed: ${msg}`, value, { cause: err });
}

function startingOutput(initial: Iterable<unknown> | undefined): unknown[] {
  if (initial === undefined) return [];
  return Array.isArray(initial) ? initial : Array.from(initial);
}

export function createCollector<R>(options: CollectorOptions<R>): Collector<R> {
  const { accumulator, onError, returnOutput } = options;
  const errorAccumulator = options.errorAccumulator ?? accumulator;
  const output = returnOutput ? startingOutput(options.initialResult) : [];

  const applyFailure = (error: Error, policy: ErrorPolicy) => {
    if (policy === "raise") throw error;
    if (policy === "suppress" || !returnOutput) return;
    try {
      errorAccumulator.accumulate(error, output);
    } catch (err) {
      // Nowhere left to route it.
      throw accumulationFailure(error, err);
    }
  };

  return {
    collect(outcome, policy = onError) {
      if (outcome.kind === "failure") {
        applyFailure(outcome.error, policy);
        return;
      }
      if (!returnOutput) return;
      try {
        accumulator.accumulate(outcome.value, output);
      } catch (err) {
        applyFailure(accumulationFailure(outcome.value, err), policy);
      }
    },
    result() {
      return returnOutput ? output : undefined;
    },
  };
}
