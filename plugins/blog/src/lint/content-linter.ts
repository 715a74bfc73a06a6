import { readFile } from "fs/promises";
import { resolve } from "path";
import type { Logger } from "@inkpost/utils";
import { ContentLoadError } from "../errors";
import type { PostLoader } from "../loader/post-loader";
import { lintSource } from "./lint-source";
import type { LintDiagnostic, LintOptions } from "./types";

export interface LintRun {
  files: string[];
  diagnostics: LintDiagnostic[];
}

/**
 * Lints post files on disk, adding checks that span files
 */
export class ContentLinter {
  constructor(
    private readonly loader: PostLoader,
    private readonly options: LintOptions,
    private readonly logger: Logger,
  ) {}

  /**
   * Lint every post in the content directory
   */
  public async lintAll(): Promise<LintRun> {
    const files = await this.loader.discover();
    return this.lintFiles(files);
  }

  /**
   * Lint the given files. Duplicate slugs are only detected among them.
   */
  public async lintFiles(paths: string[]): Promise<LintRun> {
    const files = [...new Set(paths.map((path) => resolve(path)))];
    const diagnostics: LintDiagnostic[] = [];

    for (const filePath of files) {
      let source: string;
      try {
        source = await readFile(filePath, "utf-8");
      } catch (error) {
        throw new ContentLoadError(filePath, error);
      }
      const found = lintSource(source, filePath, this.options);
      this.logger.debug(`${filePath}: ${found.length} findings`);
      diagnostics.push(...found);
    }

    diagnostics.push(...this.findDuplicateSlugs(files));
    return { files, diagnostics };
  }

  private findDuplicateSlugs(files: string[]): LintDiagnostic[] {
    const firstBySlug = new Map<string, string>();
    const diagnostics: LintDiagnostic[] = [];

    for (const filePath of files) {
      const slug = this.loader.slugFor(filePath);
      const first = firstBySlug.get(slug);
      if (first === undefined) {
        firstBySlug.set(slug, filePath);
        continue;
      }
      diagnostics.push({
        filePath,
        rule: "duplicate-slug",
        severity: "error",
        message: `Slug "${slug}" is already used by ${first}`,
      });
    }

    return diagnostics;
  }
}
