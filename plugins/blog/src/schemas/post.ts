import { normalizeDate, z } from "@inkpost/utils";

/**
 * Front-matter date: YAML timestamps and date strings are both accepted
 * and normalized by `normalizeDate`
 */
const frontmatterDateSchema = z
  .union([z.string(), z.date()], {
    errorMap: (_issue, ctx) => ({
      message: ctx.data === undefined ? "Required" : "Expected a date",
    }),
  })
  .transform((value, ctx) => {
    const normalized = normalizeDate(value);
    if (normalized === null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "Invalid date",
      });
      return z.NEVER;
    }
    return normalized;
  });

/**
 * Post front-matter schema (the YAML header of a .md/.mdx file)
 */
export const postFrontmatterSchema = z.object({
  title: z.string().trim().min(1, "Title must not be empty"),
  date: frontmatterDateSchema,
  tags: z.array(z.string().trim().min(1, "Tags must not be empty")).default([]),
  draft: z.boolean().default(false),
  layout: z.string().trim().min(1).optional(),
  summary: z.string().optional(),
  lastmod: frontmatterDateSchema.optional(),
  authors: z.array(z.string().min(1)).optional(),
  canonicalUrl: z.string().url().optional(),
});

export type PostFrontmatter = z.infer<typeof postFrontmatterSchema>;

/**
 * Fields accepted when writing a post back out
 */
export type PostFrontmatterInput = z.input<typeof postFrontmatterSchema>;

/**
 * A parsed post
 */
export interface Post {
  /** URL path below the blog root, e.g. `aspnet/empty-strings` */
  slug: string;
  filePath: string;
  frontmatter: PostFrontmatter;
  /** Layout from front-matter, or the configured default */
  layout: string;
  /** Markdown body without the front-matter header */
  body: string;
  /** Estimated minutes */
  readingTime: number;
}
