import matter from "gray-matter";
import type { z } from "zod";

/**
 * Location of the `---` delimited header, as 1-based line numbers
 */
export interface FrontmatterBlock {
  openLine: number;
  /** null when the header is never closed */
  closeLine: number | null;
}

const DELIMITER = "---";

/**
 * Find the front-matter header at the top of a document.
 * Returns null when the document does not start with a delimiter line.
 */
export function findFrontmatterBlock(source: string): FrontmatterBlock | null {
  const lines = source.replace(/^\uFEFF/, "").split(/\r?\n/);
  if (lines[0]?.trimEnd() !== DELIMITER) {
    return null;
  }

  for (let index = 1; index < lines.length; index++) {
    if (lines[index]?.trimEnd() === DELIMITER) {
      return { openLine: 1, closeLine: index + 1 };
    }
  }

  return { openLine: 1, closeLine: null };
}

/**
 * Parse markdown with frontmatter into content and validated metadata.
 * Throws the YAML error for a malformed header and a ZodError for
 * metadata that does not match the schema.
 */
export function parseMarkdownWithFrontmatter<T>(
  markdown: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): {
  content: string;
  metadata: T;
} {
  // An options object keeps gray-matter from caching the parse by input
  const { content, data } = matter(markdown, {});

  return {
    content: content.trim(),
    metadata: schema.parse(data),
  };
}

/**
 * Check if a value should be included in frontmatter
 * Filters out undefined, null, empty arrays, and empty objects
 */
export function shouldIncludeInFrontmatter(value: unknown): boolean {
  if (value === undefined || value === null) {
    return false;
  }

  if (Array.isArray(value) && value.length === 0) {
    return false;
  }

  if (
    typeof value === "object" &&
    !Array.isArray(value) &&
    !(value instanceof Date) &&
    Object.keys(value).length === 0
  ) {
    return false;
  }

  return true;
}

/**
 * Generate markdown with a frontmatter header. Empty values are dropped;
 * with nothing left the content is returned unchanged.
 */
export function generateMarkdownWithFrontmatter(
  content: string,
  metadata: Record<string, unknown>,
): string {
  const included = Object.fromEntries(
    Object.entries(metadata).filter(([, value]) =>
      shouldIncludeInFrontmatter(value),
    ),
  );

  if (Object.keys(included).length === 0) {
    return content;
  }

  return matter.stringify(content, included);
}
