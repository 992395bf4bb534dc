/**
 * Formatting helpers for build reports.
 *
 * @module
 */

const BYTE_UNITS = ["B", "KB", "MB", "GB", "TB"] as const;

/**
 * Rounds to at most two decimals without trailing zeros (1.5, not 1.50).
 */
export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Formats a byte count with a binary unit, e.g. `1536` -> `"1.5 KB"`.
 * Negative values (memory released during a build) keep their sign.
 */
export function formatBytes(bytes: number): string {
  if (bytes === 0 || !Number.isFinite(bytes)) {
    return "0 B";
  }

  const sign = bytes < 0 ? "-" : "";
  const size = Math.abs(bytes);
  const exponent = Math.min(
    Math.floor(Math.log(size) / Math.log(1024)),
    BYTE_UNITS.length - 1
  );
  const unitIndex = Math.max(exponent, 0);

  return `${sign}${round2(size / 1024 ** unitIndex)} ${BYTE_UNITS[unitIndex]}`;
}

/**
 * Formats a duration in milliseconds for display.
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }
  return `${(ms / 1000).toFixed(2)}s`;
}
