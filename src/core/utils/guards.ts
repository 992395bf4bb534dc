/**
 * Narrowing helpers for values of unknown shape (parsed YAML/JSON, front matter).
 *
 * @module
 */

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Normalizes a front matter value that may be one string or a list of them.
 * Non-string items are dropped.
 */
export function toStringList(value: unknown): string[] {
  if (typeof value === "string") {
    return value.trim().length > 0 ? [value.trim()] : [];
  }
  if (Array.isArray(value)) {
    return value
      .filter((item): item is string | number => typeof item === "string" || typeof item === "number")
      .map((item) => String(item).trim())
      .filter((item) => item.length > 0);
  }
  return [];
}
