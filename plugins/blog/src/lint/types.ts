export type LintSeverity = "error" | "warning";

export type LintRuleId =
  | "frontmatter-missing"
  | "frontmatter-unclosed"
  | "frontmatter-yaml"
  | "frontmatter-schema"
  | "unknown-layout"
  | "duplicate-tags"
  | "code-fence-unclosed"
  | "code-fence-language"
  | "duplicate-slug";

/**
 * One lint finding. Line numbers are 1-based and refer to the whole file.
 */
export interface LintDiagnostic {
  filePath: string;
  rule: LintRuleId;
  severity: LintSeverity;
  message: string;
  line?: number | undefined;
}

export interface LintOptions {
  /** Allowed values for the `layout` field */
  layouts: string[];
  /** Warn on fenced code blocks without a language */
  requireCodeLanguage: boolean;
}
