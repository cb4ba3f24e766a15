export type Work<T, R> = (input: T) => R | Promise<R>;

export type InvocationStyle = "positional" | "named";

/**
 * How one input is handed to the work function. Chosen once per call
 * so the hot path never re-checks the style.
 */
export interface Invoker<T, R> {
  readonly style: InvocationStyle;
  invoke(input: T): R | Promise<R>;
}

export function isNamedArguments<T>(input: T): input is T & Record<string, unknown> {
  return typeof input === "object" && input !== null && !Array.isArray(input);
}

function describeInput(input: unknown): string {
  if (input === null) return "null";
  if (Array.isArray(input)) return "array";
  return typeof input;
}

export function positionalInvoker<T, R>(work: Work<T, R>): Invoker<T, R> {
  return {
    style: "positional",
    invoke: (input) => work(input),
  };
}

/**
 * Each input must be a mapping of argument names to values. The work
 * function receives a shallow copy, so it cannot reassign the caller's keys.
 */
export function namedInvoker<T, R>(work: Work<T, R>): Invoker<T, R> {
  return {
    style: "named",
    invoke: (input) => {
      if (!isNamedArguments(input)) {
        throw new TypeError(`Expected a mapping of named arguments, received ${describeInput(input)}`);
      }
      return work({ ...input });
    },
  };
}

export function createInvoker<T, R>(work: Work<T, R>, useNamedArguments: boolean): Invoker<T, R> {
  return useNamedArguments ? namedInvoker(work) : positionalInvoker(work);
}
