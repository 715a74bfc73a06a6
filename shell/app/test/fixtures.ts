import { mkdir, mkdtemp, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { dirname, join } from "path";
import type { CLIIO } from "../src/types";

export const samplePosts: Record<string, string> = {
  "data/blog/model-binding.mdx": `---
title: Empty strings in ASP.NET Core model binding
date: 2021-03-05
tags: ['asp.net core', 'C#']
layout: PostSimple
summary: Why empty form fields arrive as null.
---

## The problem

Posting an empty field binds \`null\`.

\`\`\`csharp
public string Name { get; set; }
\`\`\`

## The fix

Register a custom binder.
`,
  "data/blog/newer.mdx": `---
title: Newer post
date: 2023-06-01
tags: ['C#', testing]
---

Plain words only.
`,
  "data/blog/draft-post.md": `---
title: Draft post
date: 2022-01-10
tags: [dotnet]
draft: true
---

Not ready yet.
`,
  "data/blog/guides/index.mdx": `---
title: Guides
date: 2020-01-01
---

# Guides

Start here.
`,
};

/**
 * Write files below a fresh temporary project directory
 */
export async function createProject(
  files: Record<string, string>,
): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), "inkpost-app-"));
  for (const [name, content] of Object.entries(files)) {
    const filePath = join(dir, name);
    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(filePath, content, "utf-8");
  }
  return dir;
}

export interface CapturedIO extends CLIIO {
  out: string[];
  err: string[];
}

/**
 * CLI sinks that collect lines instead of printing them
 */
export function captureIO(
  cwd: string,
  env: Record<string, string | undefined> = {},
): CapturedIO {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    stdout: (line) => out.push(line),
    stderr: (line) => err.push(line),
    cwd,
    env,
  };
}
