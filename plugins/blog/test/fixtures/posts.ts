import { mkdir, mkdtemp, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { dirname, join } from "path";
import type { Post } from "../../src/schemas/post";

export const modelBindingPost = `---
title: Empty strings in ASP.NET Core model binding
date: 2021-03-05
tags: ['asp.net core', 'C#']
draft: false
layout: PostSimple
summary: Why empty form fields arrive as null and how to keep them.
---

## The problem

Posting an empty field binds \`null\` instead of an empty string.

\`\`\`csharp
public class Form { public string Name { get; set; } }
\`\`\`

## The fix

Register a custom model binder provider.
`;

export const draftPost = `---
title: Draft post
date: 2022-01-10
tags: [dotnet]
draft: true
---

Not ready yet.
`;

export const newerPost = `---
title: Newer post
date: 2023-06-01
tags: ['C#', testing]
---

Plain words only.
`;

export const guidesIndex = `---
title: Guides
date: 2020-01-01
---

# Guides

Start here.
`;

export const brokenPost = `---
date: 2020-05-05
---

No title here.
`;

/**
 * Write files into a fresh temporary content directory
 */
export async function createContentDir(
  files: Record<string, string>,
): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), "inkpost-blog-"));
  for (const [name, content] of Object.entries(files)) {
    const filePath = join(dir, name);
    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(filePath, content, "utf-8");
  }
  return dir;
}

/**
 * Build a post without touching the filesystem
 */
export function makePost(
  slug: string,
  date: string,
  overrides: Partial<Post["frontmatter"]> = {},
): Post {
  return {
    slug,
    filePath: `/content/${slug}.md`,
    frontmatter: {
      title: `Post ${slug}`,
      date,
      tags: [],
      draft: false,
      ...overrides,
    },
    layout: "PostLayout",
    body: `Body of ${slug}.`,
    readingTime: 1,
  };
}
