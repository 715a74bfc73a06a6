import {
  extractPlainText,
  formatRFC822Date,
  truncateText,
} from "@inkpost/utils";
import { comparePostsByDate } from "../collection/post-collection";
import { renderPost } from "../render/post-renderer";
import type { Post } from "../schemas/post";

/**
 * RSS feed configuration
 */
export interface RSSFeedConfig {
  title: string;
  description: string;
  /** Site root, without trailing slash */
  link: string;
  language?: string | undefined;
  copyright?: string | undefined;
  managingEditor?: string | undefined;
  includeDrafts?: boolean | undefined; // Preview feeds only
}

const DESCRIPTION_LENGTH = 200;

/**
 * Escape XML special characters
 */
function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

/**
 * Wrap text in CDATA, splitting any `]]>` it contains
 */
function cdata(text: string): string {
  return `<![CDATA[${text.replace(/]]>/g, "]]]]><![CDATA[>")}]]>`;
}

export function postUrl(link: string, post: Post): string {
  return `${link.replace(/\/+$/, "")}/blog/${post.slug}`;
}

/**
 * Generate RSS 2.0 feed XML from posts
 */
export function generateRSSFeed(posts: Post[], config: RSSFeedConfig): string {
  const link = config.link.replace(/\/+$/, "");
  const feedPosts = posts
    .filter((post) => config.includeDrafts === true || !post.frontmatter.draft)
    .sort(comparePostsByDate);

  const latestDate = feedPosts[0]?.frontmatter.date ?? new Date().toISOString();

  const items = feedPosts
    .map((post) => {
      const url = postUrl(link, post);
      const description =
        post.frontmatter.summary ??
        truncateText(extractPlainText(post.body), DESCRIPTION_LENGTH);
      const authors = post.frontmatter.authors ?? [];
      const authorTag =
        authors.length > 0
          ? `\n      <author>${escapeXml(authors.join(", "))}</author>`
          : "";
      const categoryTags = post.frontmatter.tags
        .map((tag) => `\n      <category>${escapeXml(tag)}</category>`)
        .join("");

      return `    <item>
      <title>${escapeXml(post.frontmatter.title)}</title>
      <link>${escapeXml(url)}</link>
      <guid isPermaLink="true">${escapeXml(url)}</guid>
      <description>${escapeXml(description)}</description>
      <content:encoded>${cdata(renderPost(post).html)}</content:encoded>
      <pubDate>${formatRFC822Date(post.frontmatter.date)}</pubDate>${authorTag}${categoryTags}
    </item>`;
    })
    .join("\n");

  const copyrightTag = config.copyright
    ? `\n    <copyright>${escapeXml(config.copyright)}</copyright>`
    : "";
  const managingEditorTag = config.managingEditor
    ? `\n    <managingEditor>${escapeXml(config.managingEditor)}</managingEditor>`
    : "";

  return `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0" xmlns:atom="http://www.w3.org/2005/Atom" xmlns:content="http://purl.org/rss/1.0/modules/content/">
  <channel>
    <title>${escapeXml(config.title)}</title>
    <link>${escapeXml(link)}</link>
    <description>${escapeXml(config.description)}</description>
    <language>${escapeXml(config.language ?? "en-us")}</language>
    <lastBuildDate>${formatRFC822Date(latestDate)}</lastBuildDate>
    <atom:link href="${escapeXml(link)}/feed.xml" rel="self" type="application/rss+xml"/>${copyrightTag}${managingEditorTag}
${items}
  </channel>
</rss>`;
}
