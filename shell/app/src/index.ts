export {
  runCLI,
  parseArgs,
  helpText,
  EXIT_SUCCESS,
  EXIT_FAILURE,
  EXIT_USAGE,
  EXIT_CONFIG_OR_IO,
  type RunCLIOptions,
} from "./cli";
export {
  loadConfig,
  CONFIG_FILE_NAME,
  type LoadConfigOptions,
  type LoadedConfig,
} from "./config-loader";
export {
  appConfigSchema,
  type AppConfig,
  type AppConfigInput,
  type CLIIO,
} from "./types";
