import chalk from "chalk";

export function successMsg(msg: string): string {
  return chalk.green(`  ✓ ${msg}`);
}

export function warnMsg(msg: string): string {
  return chalk.yellow(`  ⚠ ${msg}`);
}

export function errorMsg(msg: string): string {
  return chalk.red(`  ✗ ${msg}`);
}

export function heading(msg: string): string {
  return chalk.bold(msg);
}

export function dim(msg: string): string {
  return chalk.dim(msg);
}

export function progressBar(current: number, total: number | undefined): string {
  if (total === undefined) return `  [${current} done]`;
  const width = 20;
  const ratio = total > 0 ? Math.min(current / total, 1) : 1;
  const filled = Math.round(ratio * width);
  const bar = "=".repeat(filled) + " ".repeat(width - filled);
  return `  [${bar}] ${current}/${total}`;
}
