/**
 * Execution context for a single build run.
 *
 * A long-lived Builder (watch scripts, repeated builds from a host program)
 * runs many builds; each gets its own correlation id so their log entries
 * can be told apart.
 *
 * @module
 */

import { randomUUID } from "node:crypto";

// =============================================================================
// Types
// =============================================================================

/**
 * Identifiers bound into every log entry of one `build()` call.
 */
export interface ExecutionContext {
  /** Unique identifier for this build run */
  readonly correlationId: string;

  /** 1-based count of builds performed by the owning Builder */
  readonly buildNumber: number;

  /** Wall-clock start of the run */
  readonly startedAt: Date;
}

/**
 * Options for creating an execution context.
 */
export interface CreateExecutionContextOptions {
  /** Custom correlation ID (default: random UUID) */
  correlationId?: string;

  /** Build counter value (default: 1) */
  buildNumber?: number;
}

// =============================================================================
// Factory Functions
// =============================================================================

/**
 * Creates a new execution context.
 *
 * @example
 * ```typescript
 * const run = createExecutionContext({ buildNumber: 3 });
 * logger.withContext({ correlationId: run.correlationId });
 * ```
 */
export function createExecutionContext(
  options: CreateExecutionContextOptions = {}
): ExecutionContext {
  return {
    correlationId: options.correlationId ?? randomUUID(),
    buildNumber: options.buildNumber ?? 1,
    startedAt: new Date(),
  };
}
