import matter from "gray-matter";
import { Marked } from "marked";
import { remark } from "remark";
import { toString } from "mdast-util-to-string";
import { visit } from "unist-util-visit";
import { slugify } from "./string-utils";

/**
 * Parse frontmatter and content from markdown.
 * Throws when the YAML header is malformed.
 */
export function parseMarkdown(markdown: string): {
  frontmatter: Record<string, unknown>;
  content: string;
} {
  const { data, content } = matter(markdown, {});
  return {
    frontmatter: data,
    content: content.trim(),
  };
}

export interface MarkdownHeading {
  depth: number;
  text: string;
}

/**
 * List every heading in document order with its plain text
 */
export function extractHeadings(markdown: string): MarkdownHeading[] {
  const tree = remark().parse(markdown);
  const headings: MarkdownHeading[] = [];

  visit(tree, "heading", (node) => {
    headings.push({ depth: node.depth, text: toString(node).trim() });
  });

  return headings;
}

/**
 * Plain text of a markdown document: prose, inline code and code blocks
 * joined by single spaces
 */
export function extractPlainText(markdown: string): string {
  const tree = remark().parse(markdown);
  const parts: string[] = [];

  visit(tree, (node) => {
    if (
      (node.type === "text" ||
        node.type === "inlineCode" ||
        node.type === "code") &&
      "value" in node &&
      typeof node.value === "string"
    ) {
      parts.push(node.value);
    }
  });

  return parts.join(" ").replace(/\s+/g, " ").trim();
}

export interface MarkdownToHtmlOptions {
  /**
   * Ids assigned to headings in document order. Headings beyond the list
   * fall back to a slug of their text.
   */
  headingIds?: string[] | undefined;
}

/**
 * Convert markdown to HTML (GitHub Flavored Markdown)
 */
export function markdownToHtml(
  markdown: string,
  options: MarkdownToHtmlOptions = {},
): string {
  const headingIds = options.headingIds ?? [];
  let headingIndex = 0;

  const instance = new Marked({ gfm: true, breaks: false });
  instance.use({
    renderer: {
      heading(text: string, level: number, raw: string): string {
        const id = headingIds[headingIndex] ?? slugify(raw);
        headingIndex++;
        return `<h${level} id="${id}">${text}</h${level}>\n`;
      },
    },
  });

  const html = instance.parse(markdown);
  if (typeof html !== "string") {
    throw new Error("Markdown renderer returned a promise; async extensions are not supported");
  }
  return html;
}
