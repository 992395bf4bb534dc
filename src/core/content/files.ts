/**
 * File descriptors collected by the loading steps.
 *
 * @module
 */

/**
 * A content file discovered under the pages directory.
 */
export interface SourceFile {
  /** Absolute filesystem path */
  readonly absolutePath: string;

  /** Path relative to the pages directory, forward slashes */
  readonly relativePath: string;
}

/**
 * A static file to copy verbatim into the built site.
 */
export interface StaticFile {
  /** Absolute filesystem path of the source */
  readonly sourcePath: string;

  /** Path relative to the destination directory, forward slashes */
  readonly outputPath: string;

  /** Size in bytes */
  readonly size: number;

  /** Theme the file comes from; undefined for the site's own files */
  readonly theme?: string;
}
