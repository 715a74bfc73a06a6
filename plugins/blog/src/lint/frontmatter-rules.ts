import {
  findFrontmatterBlock,
  getErrorMessage,
  parseMarkdown,
  slugify,
} from "@inkpost/utils";
import { postFrontmatterSchema } from "../schemas/post";
import type { LintDiagnostic, LintOptions } from "./types";

/**
 * Line of a top-level key inside the header, or the opening delimiter
 * line when the key is absent
 */
function keyLine(lines: string[], closeLine: number, key: unknown): number {
  if (typeof key === "string") {
    for (let index = 1; index < closeLine - 1; index++) {
      if (lines[index]?.startsWith(`${key}:`)) {
        return index + 1;
      }
    }
  }
  return 1;
}

/**
 * Line reported by a YAML exception, relative to the whole file
 */
function yamlErrorLine(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null || !("mark" in error)) {
    return undefined;
  }
  const mark = error.mark;
  if (
    typeof mark === "object" &&
    mark !== null &&
    "line" in mark &&
    typeof mark.line === "number"
  ) {
    // mark.line is 0-based and counted from the opening delimiter line
    return mark.line + 1;
  }
  return undefined;
}

function yamlErrorReason(error: unknown): string {
  if (
    typeof error === "object" &&
    error !== null &&
    "reason" in error &&
    typeof error.reason === "string"
  ) {
    return error.reason;
  }
  return getErrorMessage(error).split("\n")[0] ?? "invalid YAML";
}

/**
 * Header checks: presence, delimiters, YAML syntax, schema, layout, tags
 */
export function lintFrontmatter(
  source: string,
  filePath: string,
  options: LintOptions,
): LintDiagnostic[] {
  const block = findFrontmatterBlock(source);
  if (!block) {
    return [
      {
        filePath,
        rule: "frontmatter-missing",
        severity: "error",
        message: "File does not start with a front-matter block (---)",
        line: 1,
      },
    ];
  }
  if (block.closeLine === null) {
    return [
      {
        filePath,
        rule: "frontmatter-unclosed",
        severity: "error",
        message: "Front-matter block is not closed with ---",
        line: block.openLine,
      },
    ];
  }
  const closeLine = block.closeLine;

  let data: Record<string, unknown>;
  try {
    data = parseMarkdown(source).frontmatter;
  } catch (error) {
    return [
      {
        filePath,
        rule: "frontmatter-yaml",
        severity: "error",
        message: `Front-matter is not valid YAML: ${yamlErrorReason(error)}`,
        line: yamlErrorLine(error) ?? block.openLine,
      },
    ];
  }

  const lines = source.replace(/^\uFEFF/, "").split(/\r?\n/);
  const result = postFrontmatterSchema.safeParse(data);
  if (!result.success) {
    return result.error.issues.map((issue): LintDiagnostic => ({
      filePath,
      rule: "frontmatter-schema",
      severity: "error",
      message: `${issue.path.length > 0 ? issue.path.join(".") : "front-matter"}: ${issue.message}`,
      line: keyLine(lines, closeLine, issue.path[0]),
    }));
  }

  const diagnostics: LintDiagnostic[] = [];
  const frontmatter = result.data;

  if (
    frontmatter.layout !== undefined &&
    !options.layouts.includes(frontmatter.layout)
  ) {
    diagnostics.push({
      filePath,
      rule: "unknown-layout",
      severity: "warning",
      message: `Unknown layout "${frontmatter.layout}" (expected one of: ${options.layouts.join(", ")})`,
      line: keyLine(lines, closeLine, "layout"),
    });
  }

  const seenTags = new Map<string, string>();
  for (const tag of frontmatter.tags) {
    const tagSlug = slugify(tag);
    const first = seenTags.get(tagSlug);
    if (first !== undefined) {
      diagnostics.push({
        filePath,
        rule: "duplicate-tags",
        severity: "warning",
        message: `Tag "${tag}" duplicates "${first}"`,
        line: keyLine(lines, closeLine, "tags"),
      });
    } else {
      seenTags.set(tagSlug, tag);
    }
  }

  return diagnostics;
}
