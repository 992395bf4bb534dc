export class BuildError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
    public readonly hint?: string,
    public readonly cause?: Error,
    public readonly isOperational: boolean = true,
    public readonly timestamp: Date = new Date(),
  ) {
    super(message);
    this.name = "BuildError";
  }
}

/**
 * Wraps a thrown value as an Error so it can be carried as a `cause`.
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * Returns the most specific code in a BuildError chain: a pipeline error
 * wrapping a step's own BuildError reports the step's code.
 */
export function innermostCode(err: unknown): string | undefined {
  if (!(err instanceof BuildError)) {
    return undefined;
  }
  return innermostCode(err.cause) ?? err.code;
}
