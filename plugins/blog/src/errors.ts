import { InkpostError, type ErrorCause, type z } from "@inkpost/utils";

/**
 * The YAML header of a post could not be parsed
 */
export class FrontmatterParseError extends InkpostError {
  constructor(filePath: string, cause: ErrorCause) {
    super(
      `Failed to parse front-matter in ${filePath}`,
      "FRONTMATTER_PARSE",
      cause,
      { filePath },
    );
  }
}

/**
 * Post metadata did not match the front-matter schema, or the post set
 * is inconsistent (duplicate slugs)
 */
export class PostValidationError extends InkpostError {
  public readonly issues: z.ZodIssue[];

  constructor(
    filePath: string,
    issues: z.ZodIssue[],
    message = `Invalid front-matter in ${filePath}`,
  ) {
    super(message, "POST_VALIDATION", undefined, { filePath, issues });
    this.issues = issues;
  }
}

export class PostNotFoundError extends InkpostError {
  constructor(slug: string) {
    super(`Post "${slug}" not found`, "POST_NOT_FOUND", undefined, { slug });
  }
}

/**
 * Content directory or post file could not be read
 */
export class ContentLoadError extends InkpostError {
  constructor(path: string, cause: ErrorCause) {
    super(`Failed to read content at ${path}`, "CONTENT_LOAD", cause, {
      path,
    });
  }
}
