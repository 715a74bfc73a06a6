/**
 * inkpost utils package
 *
 * Shared helpers used by the blog content package and the CLI.
 */

// Logger
export {
  Logger,
  LogLevel,
  parseLogLevel,
  type LogLevelName,
  type LoggerOptions,
} from "./logger";
export { default as defaultLogger } from "./logger";

// Test utilities
export { createSilentLogger, createTestLogger } from "./test-utils";

// Errors
export {
  InkpostError,
  ConfigurationError,
  normalizeError,
  getErrorMessage,
  notFoundError,
  validationError,
  type ErrorCause,
} from "./errors";

// Markdown utilities
export {
  parseMarkdown,
  extractHeadings,
  extractPlainText,
  markdownToHtml,
  type MarkdownHeading,
  type MarkdownToHtmlOptions,
} from "./markdown";

// Frontmatter utilities
export {
  findFrontmatterBlock,
  parseMarkdownWithFrontmatter,
  generateMarkdownWithFrontmatter,
  shouldIncludeInFrontmatter,
  type FrontmatterBlock,
} from "./frontmatter";

// YAML utilities
export { fromYaml, toYaml } from "./yaml";

// String utilities
export {
  slugify,
  Slugger,
  pluralize,
  calculateReadingTime,
  truncateText,
} from "./string-utils";

// Date utilities
export { toISODateString, normalizeDate, formatRFC822Date } from "./date";

// Pagination
export {
  paginateItems,
  paginationInfoSchema,
  type PaginationInfo,
  type PaginateResult,
} from "./pagination";

// Zod re-export so packages share one instance
export { z, ZodError } from "zod";
