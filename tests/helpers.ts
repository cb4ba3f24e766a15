import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import type { ProgressSink } from "../src/utils/progress.js";

export async function createTmpDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), "parmap-test-"));
}

export async function cleanupTmpDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export async function createFile(dirPath: string, name: string, content = ""): Promise<void> {
  await writeFile(join(dirPath, name), content);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

export class RecordingProgress implements ProgressSink {
  calls: Array<[number, number | undefined]> = [];
  doneCount = 0;

  onProgress(completed: number, total: number | undefined): void {
    this.calls.push([completed, total]);
  }

  done(): void {
    this.doneCount++;
  }
}
