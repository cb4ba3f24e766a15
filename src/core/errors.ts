/**
 * Thrown before any work runs when the options bundle is invalid.
 */
export class PreconditionError extends Error {
  constructor(public issues: string[]) {
    super(`Invalid parallelMap options: ${issues.join("; ")}`);
    this.name = "PreconditionError";
  }
}

/**
 * Thrown when a value cannot be merged into the output collection,
 * e.g. a non-iterable result under "extend" or a custom accumulator that throws.
 */
export class AccumulationError extends Error {
  constructor(message: string, public value: unknown, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AccumulationError";
  }
}

export function toError(err: unknown): Error {
  if (err instanceof Error) return err;
  return new Error(String(err), { cause: err });
}
