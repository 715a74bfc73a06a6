import { Slugger, extractHeadings, markdownToHtml } from "@inkpost/utils";
import type { Post } from "../schemas/post";

export interface TocEntry {
  depth: number;
  text: string;
  id: string;
}

export interface RenderedPost {
  html: string;
  /** Level 2 and 3 headings */
  toc: TocEntry[];
  readingTime: number;
}

const TOC_MIN_DEPTH = 2;
const TOC_MAX_DEPTH = 3;

/**
 * Render a post body to HTML. Every heading gets an id; the same ids
 * link the table of contents.
 */
export function renderPost(post: Post): RenderedPost {
  const slugger = new Slugger();
  const headings = extractHeadings(post.body).map((heading) => ({
    ...heading,
    id: slugger.slug(heading.text),
  }));

  const html = markdownToHtml(post.body, {
    headingIds: headings.map((heading) => heading.id),
  });

  return {
    html,
    toc: headings.filter(
      (heading) =>
        heading.depth >= TOC_MIN_DEPTH && heading.depth <= TOC_MAX_DEPTH,
    ),
    readingTime: post.readingTime,
  };
}
