import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { text } from "node:stream/consumers";
import { parallelMap } from "../core/mapper.js";
import { APPEND_MODES, ERROR_POLICIES, type AppendMode, type ErrorPolicy } from "../core/schema.js";
import { loadConfig, resolveRunDefaults } from "../utils/config.js";
import { errorMsg, successMsg, warnMsg, dim } from "../utils/display.js";
import { execCommand, expandArgs, expandNamedArgs, parseNamedLine, type CommandExecutor } from "../utils/exec.js";

export interface RunOptions {
  path?: string;
  input?: string;
  jobs?: number;
  warmup?: number;
  onError?: string;
  appendMode?: string;
  progress?: boolean;
  named?: boolean;
  exec?: CommandExecutor;
}

function isErrorPolicy(value: string): value is ErrorPolicy {
  return ERROR_POLICIES.some((policy) => policy === value);
}

function isAppendMode(value: string): value is AppendMode {
  return APPEND_MODES.some((mode) => mode === value);
}

export function splitLines(content: string): string[] {
  return content.split(/\r?\n/u).filter((line) => line.trim().length > 0);
}

/**
 * Parse every line as a JSON object up front. Returns null after printing
 * each bad line, so nothing runs on malformed input.
 */
function parseNamedInputs(lines: string[]): Array<Record<string, unknown>> | null {
  const records: Array<Record<string, unknown>> = [];
  const problems: string[] = [];
  for (const line of lines) {
    try {
      records.push(parseNamedLine(line));
    } catch (err) {
      problems.push(err instanceof Error ? err.message : String(err));
    }
  }
  for (const problem of problems) {
    console.log(errorMsg(problem));
  }
  return problems.length === 0 ? records : null;
}

async function readInputLines(inputPath: string | undefined, rootPath: string): Promise<string[]> {
  const content = inputPath
    ? await readFile(resolve(rootPath, inputPath), "utf-8")
    : await text(process.stdin);
  return splitLines(content);
}

export async function runCommand(command: string[], options: RunOptions): Promise<void> {
  const rootPath = resolve(options.path ?? ".");
  const [file, ...template] = command;
  if (!file) {
    console.log(errorMsg("No command given"));
    process.exitCode = 1;
    return;
  }

  let onError: ErrorPolicy | undefined;
  if (options.onError !== undefined) {
    if (!isErrorPolicy(options.onError)) {
      console.log(errorMsg(`Invalid error policy: ${options.onError}. Must be one of: ${ERROR_POLICIES.join(", ")}`));
      process.exitCode = 1;
      return;
    }
    onError = options.onError;
  }

  let appendMode: AppendMode | undefined;
  if (options.appendMode !== undefined) {
    if (!isAppendMode(options.appendMode)) {
      console.log(errorMsg(`Invalid append mode: ${options.appendMode}. Must be one of: ${APPEND_MODES.join(", ")}`));
      process.exitCode = 1;
      return;
    }
    appendMode = options.appendMode;
  }

  const defaults = resolveRunDefaults(await loadConfig(rootPath));
  const exec = options.exec ?? execCommand;
  const lines = await readInputLines(options.input, rootPath);

  if (lines.length === 0) {
    console.log(warnMsg("No inputs to process."));
    return;
  }

  const policy = onError ?? defaults.onError;
  const mode = appendMode ?? defaults.appendMode;
  const settings = {
    workerCount: options.jobs ?? defaults.workerCount,
    warmupCount: options.warmup ?? defaults.warmupCount,
    showProgress: options.progress ?? defaults.showProgress,
    onError: policy,
    appendMode: mode,
  };

  let succeeded = 0;
  // Under "extend" every stdout line becomes its own entry.
  const toEntry = (stdout: string): string | string[] => {
    succeeded++;
    return mode === "extend" ? splitLines(stdout) : stdout;
  };

  let output: unknown[] | undefined;
  if (options.named) {
    const records = parseNamedInputs(lines);
    if (!records) {
      process.exitCode = 1;
      return;
    }
    output = await parallelMap(
      records,
      async (fields: Record<string, unknown>) => toEntry(await exec(file, expandNamedArgs(template, fields))),
      { ...settings, useNamedArguments: true },
    );
  } else {
    output = await parallelMap(
      lines,
      async (line: string) => toEntry(await exec(file, expandArgs(template, line))),
      settings,
    );
  }

  for (const entry of output ?? []) {
    if (entry instanceof Error) {
      console.log(errorMsg(entry.message));
      continue;
    }
    const trimmed = String(entry).trimEnd();
    if (trimmed) console.log(trimmed);
  }

  const failed = lines.length - succeeded;
  console.log(dim(`\n  ${lines.length} inputs, policy: ${policy}`));
  console.log(successMsg(`${succeeded} succeeded`));
  if (failed > 0) {
    console.log(errorMsg(`${failed} failed`));
    process.exitCode = 1;
  }
}
