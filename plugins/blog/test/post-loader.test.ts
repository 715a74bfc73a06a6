import { afterEach, describe, expect, it } from "vitest";
import { rm } from "fs/promises";
import { join } from "path";
import { createSilentLogger } from "@inkpost/utils";
import { PostLoader } from "../src/loader/post-loader";
import { ContentLoadError, PostValidationError } from "../src/errors";
import {
  brokenPost,
  createContentDir,
  draftPost,
  guidesIndex,
  modelBindingPost,
  newerPost,
} from "./fixtures/posts";

describe("PostLoader", () => {
  const logger = createSilentLogger("loader-test");
  const dirs: string[] = [];

  async function setup(files: Record<string, string>): Promise<PostLoader> {
    const dir = await createContentDir(files);
    dirs.push(dir);
    return new PostLoader(dir, logger, { defaultLayout: "PostLayout" });
  }

  afterEach(async () => {
    await Promise.all(
      dirs.splice(0).map((dir) => rm(dir, { recursive: true, force: true })),
    );
  });

  it("should discover .md and .mdx files recursively, sorted", async () => {
    const loader = await setup({
      "newer.mdx": newerPost,
      "model-binding.mdx": modelBindingPost,
      "guides/index.mdx": guidesIndex,
      "draft-post.md": draftPost,
      "notes.txt": "not a post",
    });
    const dir = loader.getContentDir();

    expect(await loader.discover()).toEqual([
      join(dir, "draft-post.md"),
      join(dir, "guides", "index.mdx"),
      join(dir, "model-binding.mdx"),
      join(dir, "newer.mdx"),
    ]);
  });

  it("should derive slugs from relative paths", async () => {
    const loader = await setup({});
    const dir = loader.getContentDir();

    expect(loader.slugFor(join(dir, "model-binding.mdx"))).toBe("model-binding");
    expect(loader.slugFor(join(dir, "guides", "index.mdx"))).toBe("guides");
    expect(loader.slugFor(join(dir, "index.md"))).toBe("index");
    expect(loader.slugFor(join(dir, "My Post_Name.md"))).toBe("my-post-name");
    expect(loader.slugFor(join(dir, "2021", "Binding Tips.mdx"))).toBe(
      "2021/binding-tips",
    );
  });

  it("should load posts and collect failures", async () => {
    const loader = await setup({
      "model-binding.mdx": modelBindingPost,
      "broken.md": brokenPost,
      "newer.mdx": newerPost,
    });

    const { posts, failures } = await loader.loadAll();

    expect(posts.map((post) => post.slug)).toEqual(["model-binding", "newer"]);
    expect(failures).toHaveLength(1);
    expect(failures[0]?.filePath).toBe(
      join(loader.getContentDir(), "broken.md"),
    );
    expect(failures[0]?.error).toBeInstanceOf(PostValidationError);
  });

  it("should load a single file", async () => {
    const loader = await setup({ "guides/index.mdx": guidesIndex });

    const post = await loader.loadFile(
      join(loader.getContentDir(), "guides", "index.mdx"),
    );

    expect(post.slug).toBe("guides");
    expect(post.frontmatter.title).toBe("Guides");
    expect(post.body).toBe("# Guides\n\nStart here.");
  });

  it("should fail for a missing content directory", async () => {
    const loader = new PostLoader("/nonexistent/inkpost-content", logger, {
      defaultLayout: "PostLayout",
    });

    await expect(loader.discover()).rejects.toBeInstanceOf(ContentLoadError);
  });

  it("should fail for a missing file", async () => {
    const loader = await setup({});

    await expect(
      loader.loadFile(join(loader.getContentDir(), "missing.md")),
    ).rejects.toBeInstanceOf(ContentLoadError);
  });
});
