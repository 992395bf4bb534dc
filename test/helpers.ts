/**
 * Shared test helpers.
 *
 * @module
 */

import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import type { LogEntry, LogSink } from "../src/core/logging/ContextualLogger.js";
import type { TraceClock } from "../src/core/observability/BuildTrace.js";

/**
 * In-memory log sink.
 */
export class InMemoryLogSink implements LogSink {
  readonly entries: LogEntry[] = [];

  write(entry: LogEntry): void {
    this.entries.push(entry);
  }

  byLevel(level: LogEntry["level"]): LogEntry[] {
    return this.entries.filter((entry) => entry.level === level);
  }

  clear(): void {
    this.entries.length = 0;
  }
}

/**
 * Clock advancing by fixed steps: every `now()` adds `stepMs`, every
 * `heapUsed()` adds `stepBytes`.
 */
export class FakeClock implements TraceClock {
  private time = 0;
  private heap = 0;

  constructor(
    private readonly stepMs = 250,
    private readonly stepBytes = 1024
  ) {}

  now(): number {
    this.time += this.stepMs;
    return this.time;
  }

  heapUsed(): number {
    this.heap += this.stepBytes;
    return this.heap;
  }
}

export async function createTestDir(prefix: string): Promise<string> {
  return await fs.mkdtemp(path.join(os.tmpdir(), `quire-${prefix}-`));
}

export async function cleanupTestDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

/**
 * Writes `files` (relative path -> content) under `root`.
 */
export async function writeFiles(root: string, files: Record<string, string>): Promise<void> {
  for (const [relativePath, content] of Object.entries(files)) {
    const filePath = path.join(root, relativePath);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content);
  }
}
