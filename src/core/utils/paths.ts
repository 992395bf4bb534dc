/**
 * Filesystem path helpers shared by the build steps.
 *
 * Steps address pages, static files and outputs by *site-relative* paths.
 * Those always use forward slashes, whatever the platform, so they can be
 * used as collection keys and URLs; only the filesystem calls convert back.
 *
 * @module
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { BuildError, toError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";

/**
 * Converts a platform path to forward slashes.
 */
export function toPosixPath(p: string): string {
  return p.split(path.sep).join("/");
}

export async function pathExists(p: string): Promise<boolean> {
  try {
    await fs.access(p);
    return true;
  } catch {
    return false;
  }
}

export async function isDirectory(p: string): Promise<boolean> {
  try {
    const stat = await fs.stat(p);
    return stat.isDirectory();
  } catch {
    return false;
  }
}

/**
 * Resolves a site-relative path under `root`, refusing paths that would
 * leave it (`../`, absolute paths).
 *
 * @throws BuildError OUTPUT_WRITE_FAILED on path traversal
 */
export function resolveInside(root: string, relativePath: string): string {
  const resolvedRoot = path.resolve(root);
  const target = path.resolve(resolvedRoot, relativePath);

  if (target !== resolvedRoot && !target.startsWith(resolvedRoot + path.sep)) {
    throw new BuildError(
      "Path traversal detected",
      ErrorCode.OUTPUT_WRITE_FAILED,
      { root: resolvedRoot, relativePath },
      `"${relativePath}" would be written outside ${resolvedRoot}.`
    );
  }
  return target;
}

/**
 * Writes a file, creating parent directories.
 *
 * @throws BuildError OUTPUT_WRITE_FAILED or FS_PERMISSION_DENIED
 */
export async function writeFileEnsuringDir(filePath: string, content: string | Buffer): Promise<void> {
  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content);
  } catch (error) {
    const cause = toError(error);
    const denied = "code" in cause && (cause.code === "EACCES" || cause.code === "EPERM");
    throw new BuildError(
      `Failed to write ${filePath}`,
      denied ? ErrorCode.FS_PERMISSION_DENIED : ErrorCode.OUTPUT_WRITE_FAILED,
      { filePath, reason: cause.message },
      denied ? "Check write permissions on the destination directory." : undefined,
      cause
    );
  }
}
