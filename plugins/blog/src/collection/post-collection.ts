import { paginateItems, slugify, type PaginateResult } from "@inkpost/utils";
import { PostNotFoundError, PostValidationError } from "../errors";
import type { Post } from "../schemas/post";

export interface PostCollectionOptions {
  /** Keep drafts visible (local preview) */
  includeDrafts?: boolean | undefined;
}

export interface TagCount {
  /** Slugified tag, used for comparisons and URLs */
  slug: string;
  /** Tag as first written in a post */
  label: string;
  count: number;
}

export interface AdjacentPosts {
  /** Older post */
  prev: Post | null;
  /** Newer post */
  next: Post | null;
}

/**
 * Sort posts by date (newest first), then by slug
 */
export function comparePostsByDate(a: Post, b: Post): number {
  const diff =
    new Date(b.frontmatter.date).getTime() -
    new Date(a.frontmatter.date).getTime();
  if (diff !== 0) {
    return diff;
  }
  return a.slug.localeCompare(b.slug);
}

/**
 * In-memory view over a set of loaded posts
 */
export class PostCollection {
  private readonly bySlug = new Map<string, Post>();
  private readonly visible: Post[];

  constructor(posts: Post[], options: PostCollectionOptions = {}) {
    for (const post of posts) {
      const existing = this.bySlug.get(post.slug);
      if (existing) {
        throw new PostValidationError(
          post.filePath,
          [],
          `Duplicate slug "${post.slug}" (${existing.filePath} and ${post.filePath})`,
        );
      }
      this.bySlug.set(post.slug, post);
    }

    this.visible = posts
      .filter((post) => options.includeDrafts === true || !post.frontmatter.draft)
      .sort(comparePostsByDate);
  }

  /**
   * Visible posts, newest first
   */
  public list(): Post[] {
    return [...this.visible];
  }

  public get size(): number {
    return this.visible.length;
  }

  /**
   * Look up a visible post by slug
   */
  public get(slug: string): Post | undefined {
    return this.visible.find((post) => post.slug === slug);
  }

  public require(slug: string): Post {
    const post = this.get(slug);
    if (!post) {
      throw new PostNotFoundError(slug);
    }
    return post;
  }

  public adjacent(slug: string): AdjacentPosts {
    const index = this.visible.findIndex((post) => post.slug === slug);
    if (index === -1) {
      throw new PostNotFoundError(slug);
    }
    return {
      prev: this.visible[index + 1] ?? null,
      next: this.visible[index - 1] ?? null,
    };
  }

  /**
   * Tag usage over visible posts, most used first
   */
  public tagCounts(): TagCount[] {
    const counts = new Map<string, TagCount>();

    for (const post of this.visible) {
      const seen = new Set<string>();
      for (const tag of post.frontmatter.tags) {
        const tagSlug = slugify(tag);
        if (!tagSlug || seen.has(tagSlug)) continue;
        seen.add(tagSlug);

        const entry = counts.get(tagSlug);
        if (entry) {
          entry.count++;
        } else {
          counts.set(tagSlug, { slug: tagSlug, label: tag, count: 1 });
        }
      }
    }

    return [...counts.values()].sort(
      (a, b) => b.count - a.count || a.slug.localeCompare(b.slug),
    );
  }

  /**
   * Visible posts carrying a tag; `tag` may be a label or its slug
   */
  public byTag(tag: string): Post[] {
    const tagSlug = slugify(tag);
    return this.visible.filter((post) =>
      post.frontmatter.tags.some((postTag) => slugify(postTag) === tagSlug),
    );
  }

  public page(page: number, pageSize: number, posts?: Post[]): PaginateResult<Post> {
    return paginateItems(posts ?? this.visible, page, pageSize);
  }
}
