/**
 * Build Trace Module.
 *
 * Collects one trace entry per executed build step: wall time, heap delta
 * and outcome. The Builder keeps the trace of its last run; the CLI prints it
 * in verbose mode.
 *
 * ## Usage
 *
 * ```typescript
 * const trace = new BuildTrace();
 *
 * trace.start("Loading pages");
 * await step.process();
 * trace.end("Loading pages");
 *
 * console.log(trace.toHumanString());
 * ```
 *
 * @module
 */

import { formatBytes, formatDuration } from "../utils/format.js";

// =============================================================================
// Types
// =============================================================================

export type TraceStatus = "running" | "completed" | "failed";

/**
 * A single trace entry representing one step's execution.
 */
export interface TraceEntry {
  readonly name: string;
  readonly status: TraceStatus;
  readonly start: Date;
  readonly end?: Date;
  readonly durationMs?: number;

  /** Heap growth in bytes while the step ran (may be negative) */
  readonly memoryDelta?: number;
}

export interface TraceEntryJson {
  name: string;
  status: TraceStatus;
  start: string;
  end?: string;
  durationMs?: number;
  memoryDelta?: number;
}

export interface TraceJson {
  trace: TraceEntryJson[];
  totalDurationMs: number;
}

/**
 * Source of time and heap readings; injectable for deterministic tests.
 */
export interface TraceClock {
  now(): number;
  heapUsed(): number;
}

/**
 * Wall clock (`performance.now()`) and V8 heap usage.
 */
export const SYSTEM_CLOCK: TraceClock = {
  now: () => performance.now(),
  heapUsed: () => process.memoryUsage().heapUsed,
};

interface MutableTraceEntry {
  name: string;
  status: TraceStatus;
  start: Date;
  startMark: number;
  startHeap: number;
  end?: Date;
  durationMs?: number;
  memoryDelta?: number;
}

// =============================================================================
// BuildTrace Class
// =============================================================================

export class BuildTrace {
  private readonly entries: MutableTraceEntry[] = [];
  private readonly clock: TraceClock;

  constructor(clock: TraceClock = SYSTEM_CLOCK) {
    this.clock = clock;
  }

  /**
   * Starts tracing a step.
   */
  start(name: string): void {
    this.entries.push({
      name,
      status: "running",
      start: new Date(),
      startMark: this.clock.now(),
      startHeap: this.clock.heapUsed(),
    });
  }

  /**
   * Marks the latest running entry with this name as completed.
   */
  end(name: string): void {
    this.finish(name, "completed");
  }

  /**
   * Marks the latest running entry with this name as failed.
   */
  fail(name: string): void {
    this.finish(name, "failed");
  }

  private finish(name: string, status: TraceStatus): void {
    const entry = this.findRunning(name);
    if (!entry) {
      return;
    }
    entry.status = status;
    entry.end = new Date();
    entry.durationMs = this.clock.now() - entry.startMark;
    entry.memoryDelta = this.clock.heapUsed() - entry.startHeap;
  }

  private findRunning(name: string): MutableTraceEntry | undefined {
    for (let i = this.entries.length - 1; i >= 0; i--) {
      const entry = this.entries[i];
      if (entry.name === name && entry.status === "running") {
        return entry;
      }
    }
    return undefined;
  }

  /**
   * Returns all trace entries in execution order.
   */
  toArray(): TraceEntry[] {
    return this.entries.map((e) => ({
      name: e.name,
      status: e.status,
      start: e.start,
      end: e.end,
      durationMs: e.durationMs,
      memoryDelta: e.memoryDelta,
    }));
  }

  /**
   * Total duration of all finished steps.
   */
  totalDurationMs(): number {
    return this.entries.reduce((sum, e) => sum + (e.durationMs ?? 0), 0);
  }

  toJSON(): TraceJson {
    return {
      trace: this.toArray().map((entry) => ({
        name: entry.name,
        status: entry.status,
        start: entry.start.toISOString(),
        end: entry.end?.toISOString(),
        durationMs: entry.durationMs,
        memoryDelta: entry.memoryDelta,
      })),
      totalDurationMs: this.totalDurationMs(),
    };
  }

  /**
   * Human-readable table of step names, durations and heap deltas.
   */
  toHumanString(): string {
    const entries = this.toArray();
    if (entries.length === 0) {
      return "";
    }

    const lines: string[] = [];
    const maxNameLen = Math.max(...entries.map((e) => e.name.length));

    for (const entry of entries) {
      const name = entry.name.padEnd(maxNameLen);
      if (entry.durationMs === undefined) {
        lines.push(`  ${name}  (in progress)`);
        continue;
      }
      const duration = formatDuration(entry.durationMs);
      const memory = formatBytes(entry.memoryDelta ?? 0);
      const suffix = entry.status === "failed" ? "  FAILED" : "";
      lines.push(`  ${name}  ${duration}  ${memory}${suffix}`);
    }

    lines.push(`  ${"─".repeat(maxNameLen + 12)}`);
    lines.push(`  Total ${formatDuration(this.totalDurationMs())}`);

    return lines.join("\n");
  }
}
