/**
 * String utility functions
 */

/**
 * Convert a string to a URL-safe slug
 */
export function slugify(text: string): string {
  return text
    .toLowerCase()
    .trim()
    .replace(/[^\w\s-]/g, "") // Remove non-word chars
    .replace(/[\s_-]+/g, "-") // Replace spaces, underscores, hyphens with single hyphen
    .replace(/^-+|-+$/g, ""); // Remove leading/trailing hyphens
}

/**
 * Slugger that keeps ids unique within one document by appending
 * `-1`, `-2`, ... to repeats
 */
export class Slugger {
  private readonly used = new Set<string>();
  private readonly suffixes = new Map<string, number>();

  public slug(text: string): string {
    const base = slugify(text) || "section";
    let id = base;
    if (this.used.has(id)) {
      let suffix = this.suffixes.get(base) ?? 0;
      do {
        suffix++;
        id = `${base}-${suffix}`;
      } while (this.used.has(id));
      this.suffixes.set(base, suffix);
    }
    this.used.add(id);
    return id;
  }
}

/**
 * Simple English pluralization for common cases
 * Handles: -y → -ies, -s/-x/-ch → -es, default → -s
 */
export function pluralize(word: string, count?: number): string {
  if (count === 1) {
    return word;
  }
  if (word.endsWith("y")) {
    return word.slice(0, -1) + "ies";
  }
  if (word.endsWith("s") || word.endsWith("x") || word.endsWith("ch")) {
    return word + "es";
  }
  return word + "s";
}

/**
 * Calculate estimated reading time in minutes
 * Based on average reading speed of 200 words per minute
 */
export function calculateReadingTime(content: string): number {
  const wordsPerMinute = 200;
  const wordCount = content
    .split(/\s+/)
    .filter((word) => word.length > 0).length;
  return Math.max(1, Math.ceil(wordCount / wordsPerMinute));
}

/**
 * Truncate text to a maximum length, ending at a word boundary
 */
export function truncateText(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  const truncated = text.slice(0, maxLength);
  const lastSpace = truncated.lastIndexOf(" ");
  return lastSpace > 0
    ? truncated.slice(0, lastSpace) + "..."
    : truncated + "...";
}
