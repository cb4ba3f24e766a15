#!/usr/bin/env node

import { realpathSync } from "node:fs";
import { fileURLToPath, pathToFileURL } from "node:url";
import { Command } from "commander";
import { runCommand } from "./commands/run.js";
import { configCommand } from "./commands/config.js";
import { errorMsg } from "./utils/display.js";

export interface CommandHandlers {
  runCommand: typeof runCommand;
  configCommand: typeof configCommand;
}

const defaultHandlers: CommandHandlers = {
  runCommand,
  configCommand,
};

function isInvokedDirectly(argv1: string | undefined): boolean {
  if (typeof argv1 !== "string") return false;

  // npm often invokes package bins through symlinks in node_modules/.bin.
  // Compare real paths so symlinked execution still triggers the CLI entrypoint.
  try {
    const invokedPath = realpathSync(argv1);
    const thisModulePath = realpathSync(fileURLToPath(import.meta.url));
    if (invokedPath === thisModulePath) return true;
  } catch {
    // Fall through to URL equality check below.
  }

  try {
    return import.meta.url === pathToFileURL(argv1).href;
  } catch {
    return false;
  }
}

// Number() rather than parseInt so "4abc" is rejected, not read as 4.
function parseCount(value: string): number {
  return value.trim() ? Number(value) : Number.NaN;
}

function isCount(value: number | undefined, min: number): boolean {
  return value === undefined || (Number.isInteger(value) && value >= min);
}

export function createProgram(handlers: CommandHandlers = defaultHandlers): Command {
  const program = new Command();

  program
    .name("parmap")
    .description("Run a command once per input line with bounded concurrency, output in input order")
    .version("0.1.0")
    .enablePositionalOptions();

  program
    .command("run <command...>")
    .description("Run <command> for every input line ({} is replaced by the line)")
    .option("-i, --input <file>", "Read inputs from a file instead of stdin")
    .option("-j, --jobs <n>", "Maximum concurrent commands", parseCount)
    .option("-w, --warmup <n>", "Inputs to run one at a time before going parallel", parseCount)
    .option("--on-error <policy>", "raise, collect, or suppress")
    .option("--append-mode <mode>", "append (one entry per input) or extend (one entry per stdout line)")
    .option("--progress", "Show a progress bar on stderr")
    .option("--named", "Treat each line as a JSON object; {key} placeholders take its fields")
    .option("-p, --path <path>", "Project root path")
    // Flags after the command name belong to the command.
    .passThroughOptions()
    .action(async (command: string[], opts) => {
      if (!isCount(opts.jobs, 1)) {
        console.error(errorMsg("--jobs must be a positive integer"));
        process.exitCode = 1;
        return;
      }
      if (!isCount(opts.warmup, 0)) {
        console.error(errorMsg("--warmup must be a non-negative integer"));
        process.exitCode = 1;
        return;
      }
      await handlers.runCommand(command, {
        path: opts.path,
        input: opts.input,
        jobs: opts.jobs,
        warmup: opts.warmup,
        onError: opts.onError,
        appendMode: opts.appendMode,
        progress: opts.progress,
        named: opts.named,
      });
    });

  program
    .command("config")
    .description("View or edit .parmap.yaml defaults")
    .option("--workers <n>", "Set default worker count")
    .option("--warmup <n>", "Set default warm-up count")
    .option("--on-error <policy>", "Set default error policy (raise, collect, suppress)")
    .option("--append-mode <mode>", "Set default append mode (append, extend)")
    .option("--progress", "Show progress by default")
    .option("--no-progress", "Hide progress by default")
    .option("-p, --path <path>", "Project root path")
    .action(async (opts) => {
      await handlers.configCommand({
        path: opts.path,
        workers: opts.workers,
        warmup: opts.warmup,
        onError: opts.onError,
        appendMode: opts.appendMode,
        progress: opts.progress,
      });
    });

  return program;
}

export async function runCli(
  argv: string[] = process.argv,
  handlers: CommandHandlers = defaultHandlers,
): Promise<void> {
  const program = createProgram(handlers);
  await program.parseAsync(argv);
}

const invokedDirectly = isInvokedDirectly(process.argv[1]);

if (invokedDirectly) {
  runCli().catch((err) => {
    const msg = err instanceof Error ? err.message : String(err);
    console.error(errorMsg(msg));
    process.exit(1);
  });
}
