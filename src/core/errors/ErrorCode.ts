/**
 * Standardized error codes for Quire.
 *
 * Error codes are stable public API contracts. They should be:
 * - SCREAMING_SNAKE_CASE
 * - Grouped by domain
 *
 * @module
 */

// =============================================================================
// Error Code Enum
// =============================================================================

/**
 * All official Quire error codes.
 *
 * Codes are grouped by domain:
 * - CONFIG_* : Site configuration loading and validation
 * - THEME_* : Theme resolution
 * - CONTENT_*, DATA_*, GENERATOR_* : Loading and creating pages and data
 * - TEMPLATE_*, RENDERER_* : Template rendering
 * - OUTPUT_* : Writing and optimizing the built site
 * - STEP_*, BUILD_* : Pipeline orchestration
 * - FS_* : Filesystem operations
 * - INTERNAL_* : Internal errors
 */
export const ErrorCode = {
  // Configuration errors (10-19)
  CONFIG_NOT_FOUND: "CONFIG_NOT_FOUND",
  CONFIG_PARSE_FAILED: "CONFIG_PARSE_FAILED",
  CONFIG_INVALID: "CONFIG_INVALID",
  CONFIG_LOCKED: "CONFIG_LOCKED",

  // Theme errors (20-29)
  THEME_NOT_FOUND: "THEME_NOT_FOUND",

  // Content errors (30-39)
  CONTENT_NOT_FOUND: "CONTENT_NOT_FOUND",
  CONTENT_PARSE_FAILED: "CONTENT_PARSE_FAILED",
  CONTENT_DUPLICATE_ID: "CONTENT_DUPLICATE_ID",
  CONTENT_CONVERT_FAILED: "CONTENT_CONVERT_FAILED",
  DATA_PARSE_FAILED: "DATA_PARSE_FAILED",
  GENERATOR_FAILED: "GENERATOR_FAILED",

  // Render errors (40-49)
  TEMPLATE_NOT_FOUND: "TEMPLATE_NOT_FOUND",
  TEMPLATE_RENDER_FAILED: "TEMPLATE_RENDER_FAILED",
  RENDERER_NOT_SET: "RENDERER_NOT_SET",

  // Output errors (50-59)
  OUTPUT_WRITE_FAILED: "OUTPUT_WRITE_FAILED",
  OUTPUT_OPTIMIZE_FAILED: "OUTPUT_OPTIMIZE_FAILED",

  // Pipeline errors (60-69)
  STEP_INIT_FAILED: "STEP_INIT_FAILED",
  STEP_FAILED: "STEP_FAILED",
  BUILD_IN_PROGRESS: "BUILD_IN_PROGRESS",

  // Filesystem errors (70-79)
  FS_PERMISSION_DENIED: "FS_PERMISSION_DENIED",
  FS_NOT_FOUND: "FS_NOT_FOUND",

  // Internal errors (1)
  INTERNAL_ERROR: "INTERNAL_ERROR",
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

// =============================================================================
// Error Categories
// =============================================================================

/**
 * Error category for grouping related errors.
 */
export type ErrorCategory =
  | "config"
  | "theme"
  | "content"
  | "render"
  | "output"
  | "pipeline"
  | "fs"
  | "internal";

/**
 * Gets the category for an error code.
 */
export function getErrorCategory(code: ErrorCode): ErrorCategory {
  if (code.startsWith("CONFIG_")) return "config";
  if (code.startsWith("THEME_")) return "theme";
  if (
    code.startsWith("CONTENT_") ||
    code.startsWith("DATA_") ||
    code.startsWith("GENERATOR_")
  )
    return "content";
  if (code.startsWith("TEMPLATE_") || code.startsWith("RENDERER_")) return "render";
  if (code.startsWith("OUTPUT_")) return "output";
  if (code.startsWith("STEP_") || code.startsWith("BUILD_")) return "pipeline";
  if (code.startsWith("FS_")) return "fs";
  return "internal";
}

// =============================================================================
// Exit Codes
// =============================================================================

/**
 * Exit code ranges by category:
 * - 1: Internal/generic error
 * - 10-19: Configuration errors
 * - 20-29: Theme errors
 * - 30-39: Content/data/generator errors
 * - 40-49: Render errors
 * - 50-59: Output errors
 * - 60-69: Pipeline errors
 * - 70-79: Filesystem errors
 */
const EXIT_CODE_MAP: Record<ErrorCode, number> = {
  [ErrorCode.CONFIG_NOT_FOUND]: 10,
  [ErrorCode.CONFIG_PARSE_FAILED]: 11,
  [ErrorCode.CONFIG_INVALID]: 12,
  [ErrorCode.CONFIG_LOCKED]: 13,

  [ErrorCode.THEME_NOT_FOUND]: 20,

  [ErrorCode.CONTENT_NOT_FOUND]: 30,
  [ErrorCode.CONTENT_PARSE_FAILED]: 31,
  [ErrorCode.CONTENT_DUPLICATE_ID]: 32,
  [ErrorCode.CONTENT_CONVERT_FAILED]: 33,
  [ErrorCode.DATA_PARSE_FAILED]: 34,
  [ErrorCode.GENERATOR_FAILED]: 35,

  [ErrorCode.TEMPLATE_NOT_FOUND]: 40,
  [ErrorCode.TEMPLATE_RENDER_FAILED]: 41,
  [ErrorCode.RENDERER_NOT_SET]: 42,

  [ErrorCode.OUTPUT_WRITE_FAILED]: 50,
  [ErrorCode.OUTPUT_OPTIMIZE_FAILED]: 51,

  [ErrorCode.STEP_INIT_FAILED]: 60,
  [ErrorCode.STEP_FAILED]: 61,
  [ErrorCode.BUILD_IN_PROGRESS]: 62,

  [ErrorCode.FS_PERMISSION_DENIED]: 70,
  [ErrorCode.FS_NOT_FOUND]: 71,

  [ErrorCode.INTERNAL_ERROR]: 1,
};

/**
 * Type guard for known error codes.
 */
export function isErrorCode(code: string): code is ErrorCode {
  return Object.prototype.hasOwnProperty.call(EXIT_CODE_MAP, code);
}

/**
 * Gets the exit code for an error code. Unknown codes map to 1.
 */
export function getExitCode(code: string): number {
  return isErrorCode(code) ? EXIT_CODE_MAP[code] : 1;
}
