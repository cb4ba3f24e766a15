import { z } from "zod";

// --- Per-call settings (scalar part of MapOptions) ---

export const errorPolicySchema = z.enum(["raise", "collect", "suppress"])
  .describe("What happens to a task failure during collection");

export const appendModeSchema = z.enum(["append", "extend"])
  .describe("How a successful value is merged into the output");

export const mapSettingsSchema = z.object({
  workerCount: z.number().int().min(1).default(16)
    .describe("Maximum number of tasks in flight; 1 runs everything serially"),
  useNamedArguments: z.boolean().default(false)
    .describe("Pass each input as a named-argument object"),
  warmupCount: z.number().int().min(0).default(3)
    .describe("Leading inputs run one at a time before dispatch"),
  showProgress: z.boolean().default(false),
  onError: errorPolicySchema.default("collect"),
  appendMode: appendModeSchema.default("append"),
  returnOutput: z.boolean().default(true),
});

// --- Project file schema (.parmap.yaml) ---

export const configSchema = z.object({
  workers: z.number().int().min(1).optional().describe("Default worker count"),
  warmup: z.number().int().min(0).optional().describe("Default warm-up count"),
  on_error: errorPolicySchema.optional(),
  append_mode: appendModeSchema.optional(),
  show_progress: z.boolean().optional(),
});

// --- Types ---

export type ErrorPolicy = z.infer<typeof errorPolicySchema>;
export type AppendMode = z.infer<typeof appendModeSchema>;
export type MapSettings = z.infer<typeof mapSettingsSchema>;
export type ConfigFile = z.infer<typeof configSchema>;

// --- Constants ---

export const CONFIG_FILENAME = ".parmap.yaml";
export const ERROR_POLICIES = errorPolicySchema.options;
export const APPEND_MODES = appendModeSchema.options;
