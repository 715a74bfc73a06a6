import { readFile, readdir, stat } from "fs/promises";
import { extname, join, relative, resolve, sep } from "path";
import {
  getErrorMessage,
  normalizeError,
  slugify,
  type Logger,
} from "@inkpost/utils";
import { ContentLoadError } from "../errors";
import { parsePost } from "../lib/post-parser";
import type { Post } from "../schemas/post";

export const POST_EXTENSIONS = [".md", ".mdx"];

export interface PostLoaderOptions {
  defaultLayout: string;
}

export interface PostLoadFailure {
  filePath: string;
  error: Error;
}

export interface PostLoadResult {
  posts: Post[];
  failures: PostLoadFailure[];
}

/**
 * Reads posts from a content directory
 */
export class PostLoader {
  private readonly contentDir: string;

  constructor(
    contentDir: string,
    private readonly logger: Logger,
    private readonly options: PostLoaderOptions,
  ) {
    this.contentDir = resolve(contentDir);
  }

  public getContentDir(): string {
    return this.contentDir;
  }

  /**
   * All .md/.mdx files below the content directory, sorted by path
   */
  public async discover(): Promise<string[]> {
    try {
      const info = await stat(this.contentDir);
      if (!info.isDirectory()) {
        throw new Error("not a directory");
      }
    } catch (error) {
      throw new ContentLoadError(this.contentDir, error);
    }

    const files = await this.walk(this.contentDir);
    return files.sort();
  }

  private async walk(dir: string): Promise<string[]> {
    const entries = await readdir(dir, { withFileTypes: true });
    const files: string[] = [];

    for (const entry of entries) {
      const fullPath = join(dir, entry.name);
      if (entry.isDirectory()) {
        files.push(...(await this.walk(fullPath)));
      } else if (
        entry.isFile() &&
        POST_EXTENSIONS.includes(extname(entry.name).toLowerCase())
      ) {
        files.push(fullPath);
      }
    }

    return files;
  }

  /**
   * Slug for a file: its path below the content directory without the
   * extension, each segment slugified. A trailing `index` segment is dropped
   * (`guides/index.mdx` → `guides`).
   */
  public slugFor(filePath: string): string {
    const relativePath = relative(this.contentDir, resolve(filePath));
    const withoutExtension = relativePath.slice(
      0,
      relativePath.length - extname(relativePath).length,
    );
    const segments = withoutExtension
      .split(sep)
      .flatMap((segment) => segment.split("/"))
      .map((segment) => slugify(segment))
      .filter((segment) => segment.length > 0);

    if (segments.length > 1 && segments[segments.length - 1] === "index") {
      segments.pop();
    }
    return segments.join("/");
  }

  /**
   * Read and parse one post file
   */
  public async loadFile(filePath: string): Promise<Post> {
    let source: string;
    try {
      source = await readFile(filePath, "utf-8");
    } catch (error) {
      throw new ContentLoadError(filePath, error);
    }

    return parsePost(source, {
      slug: this.slugFor(filePath),
      filePath,
      defaultLayout: this.options.defaultLayout,
    });
  }

  /**
   * Load every post. Files that fail to parse are reported as failures
   * and do not stop the others from loading.
   */
  public async loadAll(): Promise<PostLoadResult> {
    const files = await this.discover();
    this.logger.debug(`Found ${files.length} post files in ${this.contentDir}`);

    const posts: Post[] = [];
    const failures: PostLoadFailure[] = [];

    for (const filePath of files) {
      try {
        posts.push(await this.loadFile(filePath));
      } catch (error) {
        const failure = normalizeError(error);
        this.logger.warn(`Skipping ${filePath}: ${getErrorMessage(failure)}`);
        failures.push({ filePath, error: failure });
      }
    }

    this.logger.info(
      `Loaded ${posts.length} posts (${failures.length} failed)`,
    );
    return { posts, failures };
  }
}
