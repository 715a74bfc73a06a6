import { writeFile } from "fs/promises";
import { relative, resolve } from "path";
import {
  ContentLinter,
  ContentLoadError,
  PostCollection,
  PostLoader,
  PostNotFoundError,
  PostValidationError,
  formatDiagnostic,
  formatSummary,
  generateRSSFeed,
  renderPost,
  summarize,
  type Post,
} from "@inkpost/blog";
import {
  ConfigurationError,
  InkpostError,
  Logger,
  getErrorMessage,
  parseLogLevel,
  toYaml,
} from "@inkpost/utils";
import packageJson from "../package.json";
import { loadConfig } from "./config-loader";
import type { AppConfig, CLIIO } from "./types";

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;
export const EXIT_CONFIG_OR_IO = 3;

const COMMANDS = ["lint", "list", "tags", "show", "feed", "config"] as const;
type CommandName = (typeof COMMANDS)[number];

const VALUE_OPTIONS = ["config", "tag", "page", "out"] as const;
type ValueOption = (typeof VALUE_OPTIONS)[number];

const FLAG_OPTIONS = ["help", "version", "drafts", "toc"] as const;
type FlagOption = (typeof FLAG_OPTIONS)[number];

class CLIUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CLIUsageError";
  }
}

interface ParsedArgs {
  command: CommandName | null;
  positionals: string[];
  values: Partial<Record<ValueOption, string>>;
  flags: Set<FlagOption>;
}

function isValueOption(name: string): name is ValueOption {
  return VALUE_OPTIONS.some((option) => option === name);
}

function isFlagOption(name: string): name is FlagOption {
  return FLAG_OPTIONS.some((option) => option === name);
}

function isCommand(name: string): name is CommandName {
  return COMMANDS.some((command) => command === name);
}

/**
 * Parse `inkpost [options] <command> [args]`. Options may appear anywhere.
 */
export function parseArgs(args: string[]): ParsedArgs {
  const parsed: ParsedArgs = {
    command: null,
    positionals: [],
    values: {},
    flags: new Set(),
  };

  for (let index = 0; index < args.length; index++) {
    const arg = args[index] ?? "";

    if (arg === "-h") {
      parsed.flags.add("help");
      continue;
    }
    if (arg === "-v") {
      parsed.flags.add("version");
      continue;
    }

    if (arg.startsWith("--")) {
      const [name = "", inlineValue] = arg.slice(2).split("=", 2);
      if (isFlagOption(name)) {
        parsed.flags.add(name);
        continue;
      }
      if (isValueOption(name)) {
        const value = inlineValue ?? args[++index];
        if (value === undefined || value === "") {
          throw new CLIUsageError(`Option --${name} needs a value`);
        }
        parsed.values[name] = value;
        continue;
      }
      throw new CLIUsageError(`Unknown option: ${arg}`);
    }

    if (parsed.command === null && parsed.positionals.length === 0) {
      if (!isCommand(arg)) {
        throw new CLIUsageError(`Unknown command: ${arg}`);
      }
      parsed.command = arg;
      continue;
    }

    parsed.positionals.push(arg);
  }

  return parsed;
}

export function helpText(): string {
  return `inkpost v${packageJson.version} - markdown/MDX blog content toolkit

Usage:
  inkpost [--config <file>] <command> [options]

Commands:
  lint [files...]           Check front-matter and code fences
  list [--tag <tag>] [--drafts] [--page <n>]
                            List posts, newest first
  tags                      Tag usage counts
  show <slug> [--toc]       Render a post to HTML (or its table of contents)
  feed [--out <file>]       Generate the RSS feed
  config                    Print the resolved configuration

Options:
  --config <file>           Config file (default: ./inkpost.config.yaml)
  --help, -h                Show this help message
  --version, -v             Show version information`;
}

function parsePage(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const page = Number(value);
  if (!Number.isInteger(page) || page < 1) {
    throw new CLIUsageError(`--page must be a positive integer, got "${value}"`);
  }
  return page;
}

/**
 * Shared state for one command run
 */
interface CommandContext {
  args: ParsedArgs;
  config: AppConfig;
  io: CLIIO;
  logger: Logger;
  loader: PostLoader;
}

async function loadCollection(
  context: CommandContext,
  includeDrafts: boolean,
): Promise<PostCollection> {
  const { posts } = await context.loader.loadAll();
  return new PostCollection(posts, { includeDrafts });
}

function formatPostLine(post: Post): string {
  const date = post.frontmatter.date.slice(0, 10);
  const draft = post.frontmatter.draft ? "  (draft)" : "";
  return `${date}  ${post.slug}  ${post.frontmatter.title}${draft}`;
}

async function runLint(context: CommandContext): Promise<number> {
  const { config, io, loader, logger, args } = context;
  const linter = new ContentLinter(
    loader,
    {
      layouts: config.layouts,
      requireCodeLanguage: config.lint.requireCodeLanguage,
    },
    logger,
  );

  const run =
    args.positionals.length > 0
      ? await linter.lintFiles(
          args.positionals.map((file) => resolve(io.cwd, file)),
        )
      : await linter.lintAll();

  for (const diagnostic of run.diagnostics) {
    io.stdout(
      formatDiagnostic({
        ...diagnostic,
        filePath: relative(io.cwd, diagnostic.filePath),
      }),
    );
  }

  const summary = summarize(run.diagnostics);
  io.stdout(formatSummary(summary, run.files.length));
  return summary.errors > 0 ? EXIT_FAILURE : EXIT_SUCCESS;
}

async function runList(context: CommandContext): Promise<number> {
  const { args, config, io } = context;
  const page = parsePage(args.values.page);
  const collection = await loadCollection(
    context,
    config.includeDrafts || args.flags.has("drafts"),
  );

  const tag = args.values.tag;
  const posts = tag === undefined ? collection.list() : collection.byTag(tag);

  if (page === undefined) {
    posts.forEach((post) => io.stdout(formatPostLine(post)));
    return EXIT_SUCCESS;
  }

  const { items, pagination } = collection.page(page, config.pageSize, posts);
  items.forEach((post) => io.stdout(formatPostLine(post)));
  io.stdout(`Page ${pagination.currentPage} of ${pagination.totalPages}`);
  return EXIT_SUCCESS;
}

async function runTags(context: CommandContext): Promise<number> {
  const collection = await loadCollection(context, context.config.includeDrafts);
  for (const tag of collection.tagCounts()) {
    context.io.stdout(`${tag.slug}\t${tag.count}`);
  }
  return EXIT_SUCCESS;
}

async function runShow(context: CommandContext): Promise<number> {
  const { args, io } = context;
  const slug = args.positionals[0];
  if (slug === undefined) {
    throw new CLIUsageError("show needs a post slug");
  }

  const collection = await loadCollection(
    context,
    context.config.includeDrafts || args.flags.has("drafts"),
  );
  const rendered = renderPost(collection.require(slug));

  if (args.flags.has("toc")) {
    for (const entry of rendered.toc) {
      io.stdout(`${"  ".repeat(entry.depth - 2)}- ${entry.text} (#${entry.id})`);
    }
    return EXIT_SUCCESS;
  }

  io.stdout(rendered.html.trimEnd());
  return EXIT_SUCCESS;
}

async function runFeed(context: CommandContext): Promise<number> {
  const { args, config, io, logger } = context;
  // Feeds are public: drafts stay out even in preview configs
  const collection = await loadCollection(context, false);
  const xml = generateRSSFeed(collection.list(), {
    title: config.title,
    description: config.description,
    link: config.siteUrl,
    language: config.language,
    managingEditor: config.author,
  });

  const out = args.values.out;
  if (out === undefined) {
    io.stdout(xml);
    return EXIT_SUCCESS;
  }

  const outPath = resolve(io.cwd, out);
  try {
    await writeFile(outPath, xml + "\n", "utf-8");
  } catch (error) {
    throw new ContentLoadError(outPath, error);
  }
  logger.info(`Wrote feed with ${collection.size} posts to ${outPath}`);
  io.stdout(`Wrote ${relative(io.cwd, outPath)}`);
  return EXIT_SUCCESS;
}

function runConfig(context: CommandContext): number {
  context.io.stdout(toYaml(context.config).trimEnd());
  return EXIT_SUCCESS;
}

function exitCodeFor(error: InkpostError): number {
  if (error instanceof PostNotFoundError || error instanceof PostValidationError) {
    return EXIT_FAILURE;
  }
  if (error instanceof ConfigurationError || error instanceof ContentLoadError) {
    return EXIT_CONFIG_OR_IO;
  }
  return EXIT_FAILURE;
}

export interface RunCLIOptions {
  /** Logger to use instead of the configured singleton */
  logger?: Logger | undefined;
}

/**
 * Run one CLI invocation and return its exit code.
 * Does not call process.exit, so it can run inside tests.
 */
export async function runCLI(
  argv: string[],
  io: CLIIO,
  options: RunCLIOptions = {},
): Promise<number> {
  let args: ParsedArgs;
  try {
    args = parseArgs(argv);
  } catch (error) {
    io.stderr(`Error: ${getErrorMessage(error)}`);
    io.stderr(helpText());
    return EXIT_USAGE;
  }

  if (args.flags.has("help")) {
    io.stdout(helpText());
    return EXIT_SUCCESS;
  }
  if (args.flags.has("version")) {
    io.stdout(`inkpost v${packageJson.version}`);
    return EXIT_SUCCESS;
  }
  if (args.command === null) {
    io.stderr(helpText());
    return EXIT_USAGE;
  }

  try {
    const { config } = loadConfig({
      configPath: args.values.config,
      cwd: io.cwd,
      env: io.env,
    });

    const logger =
      options.logger ??
      Logger.getInstance({
        level: parseLogLevel(config.logLevel),
        useStderr: true,
      }).child("inkpost");

    const context: CommandContext = {
      args,
      config,
      io,
      logger,
      loader: new PostLoader(config.contentDir, logger.child("loader"), {
        defaultLayout: config.defaultLayout,
      }),
    };

    switch (args.command) {
      case "lint":
        return await runLint(context);
      case "list":
        return await runList(context);
      case "tags":
        return await runTags(context);
      case "show":
        return await runShow(context);
      case "feed":
        return await runFeed(context);
      case "config":
        return runConfig(context);
    }
  } catch (error) {
    if (error instanceof CLIUsageError) {
      io.stderr(`Error: ${error.message}`);
      return EXIT_USAGE;
    }
    if (error instanceof InkpostError) {
      io.stderr(`Error: ${error.message}`);
      return exitCodeFor(error);
    }
    throw error;
  }
}
