/**
 * Console logger shared by the loader, linter and CLI
 */

export enum LogLevel {
  SILLY = 0,
  VERBOSE = 1,
  DEBUG = 2,
  INFO = 3,
  WARN = 4,
  ERROR = 5,
  NONE = 6, // Silent mode - no output
}

export type LogLevelName =
  | "silly"
  | "verbose"
  | "debug"
  | "info"
  | "warn"
  | "error"
  | "none";

const LEVEL_BY_NAME: Record<LogLevelName, LogLevel> = {
  silly: LogLevel.SILLY,
  verbose: LogLevel.VERBOSE,
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  none: LogLevel.NONE,
};

/**
 * Map a configured level name to a LogLevel
 */
export function parseLogLevel(name: LogLevelName): LogLevel {
  return LEVEL_BY_NAME[name];
}

export interface LoggerOptions {
  level?: LogLevel | undefined;
  context?: string | undefined;
  useStderr?: boolean | undefined;
}

export class Logger {
  private static instance: Logger | null = null;

  private level: LogLevel;
  private readonly context: string | undefined;
  private useStderr: boolean;

  private constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? LogLevel.INFO;
    this.context = options.context;
    this.useStderr = options.useStderr ?? false;
  }

  /**
   * Get the process-wide logger, creating it on first use
   */
  public static getInstance(options?: LoggerOptions): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger(options);
    } else {
      if (options?.useStderr !== undefined) {
        Logger.instance.useStderr = options.useStderr;
      }
      if (options?.level !== undefined) {
        Logger.instance.level = options.level;
      }
    }
    return Logger.instance;
  }

  /**
   * Reset the singleton instance (primarily for testing)
   */
  public static resetInstance(): void {
    Logger.instance = null;
  }

  /**
   * Create a logger that is independent of the singleton
   */
  public static createFresh(options?: LoggerOptions): Logger {
    return new Logger(options);
  }

  private formatMessage(message: string): string {
    const timestamp = new Date().toISOString();
    return this.context
      ? `[${timestamp}] [${this.context}] ${message}`
      : `[${timestamp}] ${message}`;
  }

  public silly(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.SILLY) {
      console.debug(this.formatMessage(message), ...args);
    }
  }

  public verbose(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.VERBOSE) {
      console.debug(this.formatMessage(message), ...args);
    }
  }

  public debug(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.DEBUG) {
      console.debug(this.formatMessage(message), ...args);
    }
  }

  /**
   * Info goes to stderr when `useStderr` is set, so stdout only carries
   * command output
   */
  public info(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.INFO) {
      if (this.useStderr) {
        console.error(this.formatMessage(message), ...args);
      } else {
        console.info(this.formatMessage(message), ...args);
      }
    }
  }

  public warn(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.WARN) {
      console.warn(this.formatMessage(message), ...args);
    }
  }

  public error(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.ERROR) {
      console.error(this.formatMessage(message), ...args);
    }
  }

  /**
   * Create a child logger that shares level and output stream
   */
  public child(context: string): Logger {
    return Logger.createFresh({
      level: this.level,
      context: this.context ? `${this.context}:${context}` : context,
      useStderr: this.useStderr,
    });
  }

  public setLevel(level: LogLevel): void {
    this.level = level;
  }

  public getLevel(): LogLevel {
    return this.level;
  }

  public setUseStderr(useStderr: boolean): void {
    this.useStderr = useStderr;
  }
}

export default Logger.getInstance();
