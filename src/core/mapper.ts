import { appendAccumulator, resolveAccumulator, type Accumulator, type AccumulateFn } from "./accumulator.js";
import { createCollector } from "./collector.js";
import { PreconditionError } from "./errors.js";
import { createInvoker, type Work } from "./invocation.js";
import { settle } from "./outcome.js";
import { runPool } from "./pool.js";
import { mapSettingsSchema, type AppendMode, type ErrorPolicy, type MapSettings } from "./schema.js";
import { resolveProgress, type ProgressSink } from "../utils/progress.js";

export interface MapOptions<R> {
  workerCount?: number;
  useNamedArguments?: boolean;
  warmupCount?: number;
  /** Defaults to true when `progress` is given. */
  showProgress?: boolean;
  initialResult?: Iterable<unknown>;
  onError?: ErrorPolicy;
  appendMode?: AppendMode;
  returnOutput?: boolean;
  accumulator?: Accumulator<R | Error> | AccumulateFn<R | Error>;
  progress?: ProgressSink;
}

export function resolveSettings<R>(options: MapOptions<R>): MapSettings {
  const parsed = mapSettingsSchema.safeParse({
    workerCount: options.workerCount,
    useNamedArguments: options.useNamedArguments,
    warmupCount: options.warmupCount,
    showProgress: options.showProgress ?? options.progress !== undefined,
    onError: options.onError,
    appendMode: options.appendMode,
    returnOutput: options.returnOutput,
  });
  if (!parsed.success) {
    throw new PreconditionError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }
  return parsed.data;
}

function isRandomAccess<T>(inputs: Iterable<T>): inputs is readonly T[] {
  return Array.isArray(inputs);
}

/**
 * Split off the first `count` inputs. Arrays are sliced; any other iterable
 * is advanced, and the rest of the same iterator becomes the remainder.
 */
export function splitWarmup<T>(inputs: Iterable<T>, count: number): { warmup: T[]; remaining: Iterable<T> } {
  if (isRandomAccess(inputs)) {
    return { warmup: inputs.slice(0, count), remaining: inputs.slice(count) };
  }

  const iterator = inputs[Symbol.iterator]();
  const warmup: T[] = [];
  while (warmup.length < count) {
    const next = iterator.next();
    if (next.done) break;
    warmup.push(next.value);
  }
  return { warmup, remaining: { [Symbol.iterator]: () => iterator } };
}

/**
 * Apply `work` to every input with at most `workerCount` invocations in
 * flight, and build one output in input order.
 *
 * The first `warmupCount` inputs run one at a time before anything is
 * dispatched; their failures always throw. Later failures follow `onError`:
 * "raise" rejects with the first failure in input order, "collect" records
 * the error as an entry, "suppress" drops it.
 *
 * @example
 * ```typescript
 * const squares = await parallelMap([1, 2, 3, 4, 5], (x) => x * x, {
 *   workerCount: 2,
 *   warmupCount: 1,
 *   onError: "raise",
 * })
 * // [1, 4, 9, 16, 25]
 * ```
 */
export function parallelMap<T, R>(
  inputs: Iterable<T>,
  work: Work<T, R>,
  options: MapOptions<R> & { returnOutput: false },
): Promise<undefined>;
export function parallelMap<T, R>(
  inputs: Iterable<T>,
  work: Work<T, R>,
  options: MapOptions<R> & { appendMode?: "append"; onError: "raise" | "suppress"; accumulator?: undefined },
): Promise<R[]>;
export function parallelMap<T, R>(
  inputs: Iterable<T>,
  work: Work<T, R>,
  options?: MapOptions<R> & { appendMode?: "append"; accumulator?: undefined },
): Promise<Array<R | Error>>;
export function parallelMap<T, R>(
  inputs: Iterable<T>,
  work: Work<T, R>,
  options?: MapOptions<R>,
): Promise<unknown[] | undefined>;
export async function parallelMap<T, R>(
  inputs: Iterable<T>,
  work: Work<T, R>,
  options: MapOptions<R> = {},
): Promise<unknown[] | undefined> {
  const settings = resolveSettings(options);
  if (typeof work !== "function") {
    throw new PreconditionError(["work: Expected a function"]);
  }

  const invoker = createInvoker(work, settings.useNamedArguments);
  const collector = createCollector<R>({
    accumulator: resolveAccumulator(settings.appendMode, options.accumulator),
    // A failure recorded under "extend" is still one entry.
    errorAccumulator: options.accumulator ? undefined : appendAccumulator,
    onError: settings.onError,
    returnOutput: settings.returnOutput,
    initialResult: options.initialResult,
  });

  const { warmup, remaining } = splitWarmup(inputs, settings.warmupCount);
  for (const input of warmup) {
    collector.collect(await settle(() => invoker.invoke(input)), "raise");
  }

  const progress = resolveProgress(settings.showProgress, options.progress);
  try {
    if (settings.workerCount === 1) {
      const total = isRandomAccess(remaining) ? remaining.length : undefined;
      let completed = 0;
      for (const input of remaining) {
        collector.collect(await settle(() => invoker.invoke(input)));
        completed++;
        progress.onProgress(completed, total);
      }
    } else {
      const tasks = Array.from(remaining);
      const outcomes = await runPool(tasks, (input) => invoker.invoke(input), {
        concurrency: settings.workerCount,
        onSettled: progress.onProgress,
      });
      for (const outcome of outcomes) {
        collector.collect(outcome);
      }
    }
  } finally {
    progress.done();
  }

  return collector.result();
}
