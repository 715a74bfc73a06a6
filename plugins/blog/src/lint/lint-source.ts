import { lintCodeFences } from "./code-fence-rules";
import { lintFrontmatter } from "./frontmatter-rules";
import type { LintDiagnostic, LintOptions } from "./types";

/**
 * Lint one post's source text. Diagnostics come back ordered by line.
 */
export function lintSource(
  source: string,
  filePath: string,
  options: LintOptions,
): LintDiagnostic[] {
  return [
    ...lintFrontmatter(source, filePath, options),
    ...lintCodeFences(source, filePath, options),
  ].sort((a, b) => (a.line ?? 0) - (b.line ?? 0));
}
