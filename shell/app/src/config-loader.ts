import { existsSync, readFileSync } from "fs";
import { dirname, isAbsolute, join, resolve } from "path";
import { ConfigurationError, fromYaml } from "@inkpost/utils";
import { appConfigSchema, type AppConfig } from "./types";

export const CONFIG_FILE_NAME = "inkpost.config.yaml";

export interface LoadConfigOptions {
  /** Explicit config file; must exist when given */
  configPath?: string | undefined;
  cwd?: string | undefined;
  env?: Record<string, string | undefined> | undefined;
}

export interface LoadedConfig {
  config: AppConfig;
  /** File the settings came from, or null when defaults were used */
  configPath: string | null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readConfigFile(configFile: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = fromYaml(readFileSync(configFile, "utf-8"));
  } catch (error) {
    throw new ConfigurationError(configFile, error);
  }

  if (parsed === undefined || parsed === null) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new ConfigurationError(
      configFile,
      new Error("expected a mapping at the top level"),
    );
  }
  return parsed;
}

/**
 * Environment variables take precedence over the file. A relative
 * INKPOST_CONTENT_DIR is taken from the working directory.
 */
function applyEnvironment(
  raw: Record<string, unknown>,
  env: Record<string, string | undefined>,
  cwd: string,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...raw };

  const contentDir = env["INKPOST_CONTENT_DIR"];
  if (contentDir) {
    result["contentDir"] = resolve(cwd, contentDir);
  }

  const logLevel = env["INKPOST_LOG_LEVEL"];
  if (logLevel) {
    result["logLevel"] = logLevel;
  }

  const includeDrafts = env["INKPOST_INCLUDE_DRAFTS"];
  if (includeDrafts !== undefined && includeDrafts !== "") {
    if (includeDrafts !== "true" && includeDrafts !== "false") {
      throw new ConfigurationError(
        "INKPOST_INCLUDE_DRAFTS",
        new Error(`expected "true" or "false", got "${includeDrafts}"`),
      );
    }
    result["includeDrafts"] = includeDrafts === "true";
  }

  return result;
}

/**
 * Load configuration from inkpost.config.yaml and environment variables.
 * A missing default file means defaults; `contentDir` is resolved against
 * the config file's directory (or the working directory).
 */
export function loadConfig(options: LoadConfigOptions = {}): LoadedConfig {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;

  let configFile: string | null = null;
  if (options.configPath !== undefined) {
    configFile = resolve(cwd, options.configPath);
    if (!existsSync(configFile)) {
      throw new ConfigurationError(
        configFile,
        new Error("config file does not exist"),
      );
    }
  } else if (existsSync(join(cwd, CONFIG_FILE_NAME))) {
    configFile = join(cwd, CONFIG_FILE_NAME);
  }

  const raw = applyEnvironment(
    configFile ? readConfigFile(configFile) : {},
    env,
    cwd,
  );

  const result = appConfigSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const setting = issue && issue.path.length > 0 ? issue.path.join(".") : "config";
    throw new ConfigurationError(
      setting,
      new Error(issue?.message ?? "invalid value"),
      { configFile },
    );
  }

  const baseDir = configFile ? dirname(configFile) : cwd;
  const config: AppConfig = {
    ...result.data,
    contentDir: isAbsolute(result.data.contentDir)
      ? result.data.contentDir
      : resolve(baseDir, result.data.contentDir),
  };

  return { config, configPath: configFile };
}
