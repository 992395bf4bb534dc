/**
 * Turns a title or path segment into a URL-safe slug. Letters and digits of
 * any script are kept; accents on Latin letters are dropped.
 *
 * @example
 * ```typescript
 * slugify("Hello, World!"); // "hello-world"
 * slugify("Éclair au café"); // "eclair-au-cafe"
 * slugify("日本 語"); // "日本-語"
 * ```
 */
export function slugify(value: string): string {
  return value
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .normalize("NFC")
    .toLowerCase()
    .replace(/[^\p{L}\p{M}\p{N}_\s-]/gu, "")
    .trim()
    .replace(/[\s-]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

/**
 * Slugifies each segment of a slash-separated path.
 */
export function slugifyPath(value: string): string {
  return value
    .split("/")
    .map((segment) => slugify(segment))
    .filter((segment) => segment.length > 0)
    .join("/");
}
