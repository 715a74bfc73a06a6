import { remark } from "remark";
import remarkFrontmatter from "remark-frontmatter";
import { visit } from "unist-util-visit";
import type { LintDiagnostic, LintOptions } from "./types";

const OPENING_FENCE = /^(`{3,}|~{3,})(.*)$/;
const CLOSING_FENCE = /^(`{3,}|~{3,})[ \t]*$/;

/**
 * Strip container prefixes (blockquote markers, indentation) before a
 * closing fence
 */
function stripContainerPrefix(line: string): string {
  return line.replace(/^[ \t>]*/, "");
}

/**
 * Fenced code block checks. A fence that is never closed runs to the end
 * of its container, so its last line is not a matching closing fence.
 */
export function lintCodeFences(
  source: string,
  filePath: string,
  options: LintOptions,
): LintDiagnostic[] {
  const lines = source.split(/\r?\n/);
  const tree = remark().use(remarkFrontmatter, ["yaml"]).parse(source);
  const diagnostics: LintDiagnostic[] = [];

  visit(tree, "code", (node) => {
    const start = node.position?.start;
    const end = node.position?.end;
    if (!start || !end) return;

    const openingLine = lines[start.line - 1]?.slice(start.column - 1) ?? "";
    const opening = OPENING_FENCE.exec(openingLine);
    // Indented code blocks have no fence
    if (!opening?.[1]) return;

    const fence = opening[1];
    const info = (opening[2] ?? "").trim();

    if (!info && options.requireCodeLanguage) {
      diagnostics.push({
        filePath,
        rule: "code-fence-language",
        severity: "warning",
        message: "Fenced code block has no language",
        line: start.line,
      });
    }

    const closing =
      end.line > start.line
        ? CLOSING_FENCE.exec(stripContainerPrefix(lines[end.line - 1] ?? ""))
        : null;
    const closed =
      closing?.[1] !== undefined &&
      closing[1][0] === fence[0] &&
      closing[1].length >= fence.length;

    if (!closed) {
      diagnostics.push({
        filePath,
        rule: "code-fence-unclosed",
        severity: "error",
        message: `Code block opened with ${fence} is never closed`,
        line: start.line,
      });
    }
  });

  return diagnostics;
}
