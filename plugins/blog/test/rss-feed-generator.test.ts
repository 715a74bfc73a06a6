import { describe, expect, it } from "vitest";
import { generateRSSFeed, postUrl } from "../src/rss/feed-generator";
import { makePost } from "./fixtures/posts";

describe("RSS Feed Generator", () => {
  const posts = [
    {
      ...makePost("older", "2023-01-15", {
        title: "Binding <empty> strings",
        tags: ["ASP.NET Core", "C#"],
        authors: ["Sam Doe"],
        summary: "Nulls & empties",
      }),
      body: "Body of older.",
    },
    makePost("newest", "2023-06-01", { title: "Newest" }),
    makePost("hidden", "2024-01-01", { title: "Hidden draft", draft: true }),
  ];

  const config = {
    title: "My Blog",
    description: "Notes on web frameworks",
    link: "https://example.com/",
  };

  it("should generate valid RSS 2.0 XML", () => {
    const xml = generateRSSFeed(posts, config);

    expect(xml.startsWith('<?xml version="1.0" encoding="UTF-8"?>')).toBe(true);
    expect(xml).toContain('<rss version="2.0"');
    expect(xml.endsWith("</rss>")).toBe(true);
  });

  it("should include channel metadata", () => {
    const xml = generateRSSFeed(posts, { ...config, language: "en-gb" });

    expect(xml).toContain("<title>My Blog</title>");
    expect(xml).toContain("<link>https://example.com</link>");
    expect(xml).toContain("<description>Notes on web frameworks</description>");
    expect(xml).toContain("<language>en-gb</language>");
    expect(xml).toContain(
      '<atom:link href="https://example.com/feed.xml" rel="self" type="application/rss+xml"/>',
    );
  });

  it("should use the newest post date as lastBuildDate", () => {
    const xml = generateRSSFeed(posts, config);

    expect(xml).toContain(
      "<lastBuildDate>Thu, 01 Jun 2023 00:00:00 GMT</lastBuildDate>",
    );
  });

  it("should list published posts newest first", () => {
    const xml = generateRSSFeed(posts, config);

    expect(xml).not.toContain("Hidden draft");
    expect(xml.indexOf("<title>Newest</title>")).toBeLessThan(
      xml.indexOf("<title>Binding &lt;empty&gt; strings</title>"),
    );
  });

  it("should include drafts in preview feeds", () => {
    const xml = generateRSSFeed(posts, { ...config, includeDrafts: true });

    expect(xml).toContain("<title>Hidden draft</title>");
  });

  it("should describe items with escaped fields", () => {
    const xml = generateRSSFeed(posts, config);

    expect(xml).toContain("<link>https://example.com/blog/older</link>");
    expect(xml).toContain(
      '<guid isPermaLink="true">https://example.com/blog/older</guid>',
    );
    expect(xml).toContain("<description>Nulls &amp; empties</description>");
    expect(xml).toContain("<pubDate>Sun, 15 Jan 2023 00:00:00 GMT</pubDate>");
    expect(xml).toContain("<author>Sam Doe</author>");
    expect(xml).toContain("<category>ASP.NET Core</category>");
    expect(xml).toContain("<category>C#</category>");
    expect(xml).toContain(
      "<content:encoded><![CDATA[<p>Body of older.</p>\n]]></content:encoded>",
    );
  });

  it("should fall back to body text when there is no summary", () => {
    const xml = generateRSSFeed(posts, config);

    expect(xml).toContain("<description>Body of newest.</description>");
  });

  it("should build post URLs below /blog", () => {
    expect(postUrl("https://example.com//", makePost("a/b", "2024-01-01"))).toBe(
      "https://example.com/blog/a/b",
    );
  });
});
