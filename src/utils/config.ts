import { readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { parse, stringify } from "yaml";
import { appendModeSchema, configSchema, errorPolicySchema, mapSettingsSchema, CONFIG_FILENAME } from "../core/schema.js";
import type { AppendMode, ConfigFile, ErrorPolicy } from "../core/schema.js";

export interface RunDefaults {
  workerCount: number;
  warmupCount: number;
  onError: ErrorPolicy;
  appendMode: AppendMode;
  showProgress: boolean;
}

const builtin = mapSettingsSchema.parse({});

export const BUILTIN_DEFAULTS: RunDefaults = {
  workerCount: builtin.workerCount,
  warmupCount: builtin.warmupCount,
  onError: builtin.onError,
  appendMode: builtin.appendMode,
  showProgress: builtin.showProgress,
};

/**
 * Read .parmap.yaml, returning null if it is missing or invalid.
 */
export async function loadConfig(rootPath: string): Promise<ConfigFile | null> {
  try {
    const content = await readFile(join(rootPath, CONFIG_FILENAME), "utf-8");
    return configSchema.parse(parse(content));
  } catch {
    return null;
  }
}

/**
 * Save project config. Validates before writing.
 */
export async function saveConfig(rootPath: string, config: ConfigFile): Promise<void> {
  configSchema.parse(config);

  const yamlContent = stringify(config, {
    lineWidth: 120,
    defaultStringType: "PLAIN",
    defaultKeyType: "PLAIN",
  });

  await writeFile(join(rootPath, CONFIG_FILENAME), yamlContent, "utf-8");
}

function envInt(value: string | undefined, min: number): number | undefined {
  if (!value) return undefined;
  const n = Number(value.trim());
  return Number.isInteger(n) && n >= min ? n : undefined;
}

function envPolicy(value: string | undefined): ErrorPolicy | undefined {
  const parsed = errorPolicySchema.safeParse(value?.trim());
  return parsed.success ? parsed.data : undefined;
}

function envAppendMode(value: string | undefined): AppendMode | undefined {
  const parsed = appendModeSchema.safeParse(value?.trim());
  return parsed.success ? parsed.data : undefined;
}

/**
 * Merge built-in defaults, the project file, and PARMAP_* environment
 * variables. Invalid environment values are ignored.
 */
export function resolveRunDefaults(
  config: ConfigFile | null,
  env: NodeJS.ProcessEnv = process.env,
): RunDefaults {
  return {
    workerCount: envInt(env.PARMAP_WORKERS, 1) ?? config?.workers ?? BUILTIN_DEFAULTS.workerCount,
    warmupCount: envInt(env.PARMAP_WARMUP, 0) ?? config?.warmup ?? BUILTIN_DEFAULTS.warmupCount,
    onError: envPolicy(env.PARMAP_ON_ERROR) ?? config?.on_error ?? BUILTIN_DEFAULTS.onError,
    appendMode: envAppendMode(env.PARMAP_APPEND_MODE) ?? config?.append_mode ?? BUILTIN_DEFAULTS.appendMode,
    showProgress: config?.show_progress ?? BUILTIN_DEFAULTS.showProgress,
  };
}
