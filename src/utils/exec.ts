import { execFile } from "node:child_process";
import { promisify } from "node:util";

const execFileAsync = promisify(execFile);

/** Runs one command and resolves with its stdout. */
export type CommandExecutor = (file: string, args: string[]) => Promise<string>;

export const execCommand: CommandExecutor = async (file, args) => {
  const { stdout } = await execFileAsync(file, args, {
    encoding: "utf-8",
    maxBuffer: 16 * 1024 * 1024,
  });
  return stdout;
};

const PLACEHOLDER = "{}";
const NAMED_PLACEHOLDER = /\{([A-Za-z_][A-Za-z0-9_]*)\}/gu;

/**
 * Substitute `{}` with the input line, or append the line as the last
 * argument when the template has no placeholder.
 */
export function expandArgs(template: string[], line: string): string[] {
  if (!template.some((arg) => arg.includes(PLACEHOLDER))) {
    return [...template, line];
  }
  return template.map((arg) => arg.split(PLACEHOLDER).join(line));
}

/**
 * Substitute `{name}` placeholders from a mapping of named arguments.
 */
export function expandNamedArgs(template: string[], fields: Record<string, unknown>): string[] {
  return template.map((arg) =>
    arg.replace(NAMED_PLACEHOLDER, (_match, key: string) => {
      if (!Object.hasOwn(fields, key)) {
        throw new Error(`No value for placeholder {${key}}`);
      }
      const value = fields[key];
      return typeof value === "string" ? value : JSON.stringify(value);
    }),
  );
}

/**
 * Parse one input line as a JSON object of named arguments.
 */
export function parseNamedLine(line: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new Error(`Invalid JSON input "${line}": ${msg}`, { cause: err });
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new TypeError(`Expected a JSON object of named arguments, received: ${line}`);
  }
  return Object.fromEntries(Object.entries(parsed));
}
