import { pluralize } from "@inkpost/utils";
import type { LintDiagnostic } from "./types";

export interface LintSummary {
  errors: number;
  warnings: number;
}

export function summarize(diagnostics: LintDiagnostic[]): LintSummary {
  let errors = 0;
  let warnings = 0;
  for (const diagnostic of diagnostics) {
    if (diagnostic.severity === "error") {
      errors++;
    } else {
      warnings++;
    }
  }
  return { errors, warnings };
}

/**
 * `path:line  severity  message  rule`
 */
export function formatDiagnostic(diagnostic: LintDiagnostic): string {
  const location =
    diagnostic.line === undefined
      ? diagnostic.filePath
      : `${diagnostic.filePath}:${diagnostic.line}`;
  return `${location}  ${diagnostic.severity}  ${diagnostic.message}  ${diagnostic.rule}`;
}

/**
 * e.g. `2 errors, 1 warning in 3 files`
 */
export function formatSummary(summary: LintSummary, fileCount: number): string {
  return `${summary.errors} ${pluralize("error", summary.errors)}, ${summary.warnings} ${pluralize("warning", summary.warnings)} in ${fileCount} ${pluralize("file", fileCount)}`;
}
