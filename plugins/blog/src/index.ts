export {
  blogConfigSchema,
  DEFAULT_LAYOUTS,
  type BlogConfig,
  type BlogConfigInput,
} from "./config";
export {
  FrontmatterParseError,
  PostValidationError,
  PostNotFoundError,
  ContentLoadError,
} from "./errors";
export {
  postFrontmatterSchema,
  type Post,
  type PostFrontmatter,
  type PostFrontmatterInput,
} from "./schemas/post";
export { parsePost, serializePost, type ParsePostOptions } from "./lib/post-parser";
export {
  PostLoader,
  POST_EXTENSIONS,
  type PostLoaderOptions,
  type PostLoadFailure,
  type PostLoadResult,
} from "./loader/post-loader";
export {
  PostCollection,
  comparePostsByDate,
  type PostCollectionOptions,
  type TagCount,
  type AdjacentPosts,
} from "./collection/post-collection";
export { ContentLinter, type LintRun } from "./lint/content-linter";
export { lintSource } from "./lint/lint-source";
export {
  summarize,
  formatDiagnostic,
  formatSummary,
  type LintSummary,
} from "./lint/report";
export type {
  LintDiagnostic,
  LintOptions,
  LintRuleId,
  LintSeverity,
} from "./lint/types";
export {
  renderPost,
  type RenderedPost,
  type TocEntry,
} from "./render/post-renderer";
export {
  generateRSSFeed,
  postUrl,
  type RSSFeedConfig,
} from "./rss/feed-generator";
