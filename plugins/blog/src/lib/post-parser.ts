import {
  ZodError,
  calculateReadingTime,
  extractPlainText,
  generateMarkdownWithFrontmatter,
  parseMarkdownWithFrontmatter,
} from "@inkpost/utils";
import { FrontmatterParseError, PostValidationError } from "../errors";
import {
  postFrontmatterSchema,
  type Post,
  type PostFrontmatter,
  type PostFrontmatterInput,
} from "../schemas/post";

export interface ParsePostOptions {
  slug: string;
  filePath: string;
  defaultLayout: string;
}

/**
 * Parse a post file into front-matter and body.
 * Throws FrontmatterParseError for broken YAML and PostValidationError
 * when the header does not match the schema.
 */
export function parsePost(source: string, options: ParsePostOptions): Post {
  let parsed: { content: string; metadata: PostFrontmatter };
  try {
    parsed = parseMarkdownWithFrontmatter(source, postFrontmatterSchema);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new PostValidationError(options.filePath, error.issues);
    }
    throw new FrontmatterParseError(options.filePath, error);
  }

  const frontmatter = parsed.metadata;
  return {
    slug: options.slug,
    filePath: options.filePath,
    frontmatter,
    layout: frontmatter.layout ?? options.defaultLayout,
    body: parsed.content,
    readingTime: calculateReadingTime(extractPlainText(parsed.content)),
  };
}

/**
 * Write a post back to markdown with a YAML header
 */
export function serializePost(
  frontmatter: PostFrontmatterInput,
  body: string,
): string {
  const validated = postFrontmatterSchema.parse(frontmatter);
  return generateMarkdownWithFrontmatter(body, { ...validated });
}
