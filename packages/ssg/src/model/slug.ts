function foldAccents(text: string): string {
  return text.normalize("NFKD").replace(/[\u0300-\u036f]/g, "");
}

/**
 * URL-safe form of a tag name.
 *
 * - "Hello World" -> "hello-world"
 * - "Café_notes" -> "cafe-notes"
 */
export function slugSegment(text: string): string {
  return foldAccents(text)
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

/**
 * URL-safe form of one file or directory name. Case and underscores are kept so
 * existing permalinks do not move: "My_Post" stays "My_Post".
 */
export function pageSegment(text: string): string {
  return foldAccents(text)
    .replace(/[^A-Za-z0-9_-]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

/** Slug each `/`-separated segment of an identifier; empty segments drop out. */
export function slugify(identifier: string): string {
  return identifier
    .split("/")
    .map(pageSegment)
    .filter((segment) => segment.length > 0)
    .join("/");
}
