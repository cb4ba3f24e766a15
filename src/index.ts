export { parallelMap, resolveSettings, splitWarmup, type MapOptions } from "./core/mapper.js";
export { runPool, type PoolOptions } from "./core/pool.js";
export { createCollector, type Collector, type CollectorOptions } from "./core/collector.js";
export { settle, success, failure, type Outcome, type Success, type Failure } from "./core/outcome.js";
export {
  appendAccumulator,
  extendAccumulator,
  resolveAccumulator,
  isSequence,
  type Accumulator,
  type AccumulateFn,
} from "./core/accumulator.js";
export {
  createInvoker,
  positionalInvoker,
  namedInvoker,
  isNamedArguments,
  type Invoker,
  type InvocationStyle,
  type Work,
} from "./core/invocation.js";
export { PreconditionError, AccumulationError, toError } from "./core/errors.js";
export type { ErrorPolicy, AppendMode, MapSettings } from "./core/schema.js";
export {
  silentProgress,
  createTerminalProgress,
  guardProgress,
  type ProgressSink,
  type ProgressStream,
} from "./utils/progress.js";
export {
  setSeed,
  random,
  createSeededRandom,
  registerRandomSource,
  unregisterRandomSource,
  randomSourceNames,
  seededShuffle,
  seedState,
  type RandomSource,
  type SeededRandom,
} from "./utils/seed.js";
