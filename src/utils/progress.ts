import { progressBar, warnMsg } from "./display.js";

/**
 * Observer for dispatch progress. `total` is undefined when the remaining
 * inputs come from a forward-only iterable run serially.
 */
export interface ProgressSink {
  onProgress(completed: number, total: number | undefined): void;
  done?(): void;
}

export interface ProgressStream {
  write(chunk: string): unknown;
}

export const silentProgress: ProgressSink = {
  onProgress() {},
};

/**
 * Redraws a single progress line on `stream` (stderr by default).
 */
export function createTerminalProgress(stream: ProgressStream = process.stderr): ProgressSink {
  let drawn = false;
  return {
    onProgress(completed, total) {
      stream.write(`\r${progressBar(completed, total)}`);
      drawn = true;
    },
    done() {
      if (drawn) stream.write("\n");
      drawn = false;
    },
  };
}

/**
 * Wraps a sink so a failing observer cannot change the mapper's result:
 * the first error is reported as a warning and the sink is switched off.
 */
export function guardProgress(sink: ProgressSink): Required<ProgressSink> {
  let broken = false;

  const call = (fn: () => void) => {
    if (broken) return;
    try {
      fn();
    } catch (err) {
      broken = true;
      const msg = err instanceof Error ? err.message : String(err);
      console.error(warnMsg(`Progress reporting disabled: ${msg}`));
    }
  };

  return {
    onProgress: (completed, total) => call(() => sink.onProgress(completed, total)),
    done: () => call(() => sink.done?.()),
  };
}

export function resolveProgress(showProgress: boolean, sink?: ProgressSink): Required<ProgressSink> {
  if (!showProgress) return guardProgress(silentProgress);
  return guardProgress(sink ?? createTerminalProgress());
}
