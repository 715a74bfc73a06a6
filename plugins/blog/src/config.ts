import { z } from "@inkpost/utils";

export const DEFAULT_LAYOUTS = ["PostLayout", "PostSimple", "PostBanner"];

/**
 * Blog content configuration schema
 */
export const blogConfigSchema = z.object({
  /** Directory holding the .md/.mdx posts */
  contentDir: z.string().min(1).default("data/blog"),
  siteUrl: z.string().url().default("https://example.com"),
  title: z.string().default("Blog"),
  description: z.string().default(""),
  language: z.string().default("en-us"),
  author: z.string().optional(),
  /** Number of posts per list page */
  pageSize: z.number().int().positive().default(10),
  /** Show drafts in lists and feeds (local preview) */
  includeDrafts: z.boolean().default(false),
  /** Template identifiers a post may name in its `layout` field */
  layouts: z.array(z.string().min(1)).min(1).default(() => [...DEFAULT_LAYOUTS]),
  defaultLayout: z.string().min(1).default("PostLayout"),
  lint: z
    .object({
      requireCodeLanguage: z.boolean().default(true),
    })
    .default({}),
});

/**
 * Blog configuration type (output, with all defaults applied)
 */
export type BlogConfig = z.infer<typeof blogConfigSchema>;

/**
 * Blog configuration input type (allows optional fields with defaults)
 */
export type BlogConfigInput = z.input<typeof blogConfigSchema>;
