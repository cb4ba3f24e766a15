import { resolve } from "node:path";
import { loadConfig, saveConfig, resolveRunDefaults } from "../utils/config.js";
import { heading, errorMsg, successMsg, dim } from "../utils/display.js";
import { APPEND_MODES, ERROR_POLICIES, CONFIG_FILENAME, type ConfigFile } from "../core/schema.js";

export async function configCommand(
  options: {
    path?: string;
    workers?: string;
    warmup?: string;
    onError?: string;
    appendMode?: string;
    progress?: boolean;
  },
): Promise<void> {
  const rootPath = resolve(options.path ?? ".");
  const existing = await loadConfig(rootPath);

  // If no flags, show effective settings
  if (!options.workers && !options.warmup && !options.onError && !options.appendMode && options.progress === undefined) {
    const effective = resolveRunDefaults(existing);
    console.log(heading("\nCurrent configuration:\n"));
    console.log(`  workers: ${effective.workerCount}`);
    console.log(`  warmup: ${effective.warmupCount}`);
    console.log(`  on_error: ${effective.onError}`);
    console.log(`  append_mode: ${effective.appendMode}`);
    console.log(`  show_progress: ${effective.showProgress}`);
    if (!existing) console.log(dim(`\n  No ${CONFIG_FILENAME} found; showing defaults.`));
    console.log("");
    return;
  }

  const updated: ConfigFile = existing ?? {};

  if (options.workers) {
    const workers = Number(options.workers);
    if (!Number.isInteger(workers) || workers < 1) {
      console.log(errorMsg("workers must be a positive integer"));
      return;
    }
    updated.workers = workers;
  }

  if (options.warmup) {
    const warmup = Number(options.warmup);
    if (!Number.isInteger(warmup) || warmup < 0) {
      console.log(errorMsg("warmup must be a non-negative integer"));
      return;
    }
    updated.warmup = warmup;
  }

  if (options.onError) {
    const policy = ERROR_POLICIES.find((p) => p === options.onError);
    if (!policy) {
      console.log(errorMsg(`Invalid error policy: ${options.onError}. Must be one of: ${ERROR_POLICIES.join(", ")}`));
      return;
    }
    updated.on_error = policy;
  }

  if (options.appendMode) {
    const mode = APPEND_MODES.find((m) => m === options.appendMode);
    if (!mode) {
      console.log(errorMsg(`Invalid append mode: ${options.appendMode}. Must be one of: ${APPEND_MODES.join(", ")}`));
      return;
    }
    updated.append_mode = mode;
  }

  if (options.progress !== undefined) {
    updated.show_progress = options.progress;
  }

  await saveConfig(rootPath, updated);
  console.log(successMsg("Configuration updated."));
}
