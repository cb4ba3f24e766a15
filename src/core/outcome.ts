import { toError } from "./errors.js";

export interface Success<R> {
  kind: "success";
  value: R;
}

export interface Failure {
  kind: "failure";
  error: Error;
}

/** Terminal state of one task. */
export type Outcome<R> = Success<R> | Failure;

export function success<R>(value: R): Success<R> {
  return { kind: "success", value };
}

export function failure(err: unknown): Failure {
  return { kind: "failure", error: toError(err) };
}

/**
 * Run `fn` and capture its result or thrown error as an Outcome.
 * Never rejects.
 */
export function settle<R>(fn: () => R | Promise<R>): Promise<Outcome<R>> {
  // The executor turns a synchronous throw into a rejection.
  return new Promise<R>((resolve) => resolve(fn())).then(
    (value): Outcome<R> => success(value),
    (err: unknown): Outcome<R> => failure(err),
  );
}
