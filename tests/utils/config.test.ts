import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { loadConfig, saveConfig, resolveRunDefaults, BUILTIN_DEFAULTS } from "../../src/utils/config.js";
import { createTmpDir, cleanupTmpDir, createFile } from "../helpers.js";

let tmpDir: string;

beforeEach(async () => {
  tmpDir = await createTmpDir();
});

afterEach(async () => {
  await cleanupTmpDir(tmpDir);
});

describe("loadConfig / saveConfig", () => {
  it("returns null when no config exists", async () => {
    expect(await loadConfig(tmpDir)).toBeNull();
  });

  it("round-trips a config file", async () => {
    await saveConfig(tmpDir, { workers: 4, on_error: "suppress" });
    expect(await loadConfig(tmpDir)).toEqual({ workers: 4, on_error: "suppress" });
  });

  it("reads append_mode from the file", async () => {
    await createFile(tmpDir, ".parmap.yaml", "workers: 2\nappend_mode: extend\n");
    expect(await loadConfig(tmpDir)).toEqual({ workers: 2, append_mode: "extend" });
  });

  it("returns null for an unknown append mode", async () => {
    await createFile(tmpDir, ".parmap.yaml", "append_mode: merge\n");
    expect(await loadConfig(tmpDir)).toBeNull();
  });

  it("returns null for an invalid file", async () => {
    await createFile(tmpDir, ".parmap.yaml", "workers: zero\n");
    expect(await loadConfig(tmpDir)).toBeNull();
  });

  it("refuses to save an invalid config", async () => {
    await expect(saveConfig(tmpDir, { workers: 0 })).rejects.toThrow();
    expect(await loadConfig(tmpDir)).toBeNull();
  });
});

describe("resolveRunDefaults", () => {
  it("falls back to built-in defaults", () => {
    expect(resolveRunDefaults(null, {})).toEqual({
      workerCount: 16,
      warmupCount: 3,
      onError: "collect",
      appendMode: "append",
      showProgress: false,
    });
    expect(BUILTIN_DEFAULTS.workerCount).toBe(16);
  });

  it("uses the project file over built-ins", () => {
    expect(resolveRunDefaults(
      { workers: 2, warmup: 0, on_error: "raise", append_mode: "extend", show_progress: true },
      {},
    )).toEqual({
      workerCount: 2,
      warmupCount: 0,
      onError: "raise",
      appendMode: "extend",
      showProgress: true,
    });
  });

  it("lets environment variables override the file", () => {
    const defaults = resolveRunDefaults(
      { workers: 2, warmup: 1, on_error: "raise", append_mode: "append" },
      { PARMAP_WORKERS: "8", PARMAP_WARMUP: "0", PARMAP_ON_ERROR: "suppress", PARMAP_APPEND_MODE: "extend" },
    );
    expect(defaults.workerCount).toBe(8);
    expect(defaults.warmupCount).toBe(0);
    expect(defaults.onError).toBe("suppress");
    expect(defaults.appendMode).toBe("extend");
  });

  it("ignores invalid environment values", () => {
    const defaults = resolveRunDefaults(
      { workers: 2 },
      { PARMAP_WORKERS: "0", PARMAP_WARMUP: "-1", PARMAP_ON_ERROR: "explode", PARMAP_APPEND_MODE: "merge" },
    );
    expect(defaults.appendMode).toBe("append");
    expect(defaults.workerCount).toBe(2);
    expect(defaults.warmupCount).toBe(3);
    expect(defaults.onError).toBe("collect");
  });
});
