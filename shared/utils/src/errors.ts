/**
 * Error classes and message helpers used across inkpost packages
 */

export type ErrorCause = unknown;

/**
 * Convert an unknown thrown value to an Error instance
 */
export function normalizeError(error: ErrorCause): Error {
  if (error instanceof Error) return error;
  return new Error(String(error));
}

/**
 * Extract a human-readable error message from an unknown error value.
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Base error for all inkpost failures
 */
export class InkpostError extends Error {
  public readonly code: string;
  public readonly context: Record<string, unknown>;
  public override readonly cause: Error | undefined;
  public readonly timestamp: Date;

  constructor(
    message: string,
    code: string,
    cause?: ErrorCause,
    context: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.context = context;
    this.cause = cause === undefined ? undefined : normalizeError(cause);
    this.timestamp = new Date();

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Convert error to structured object for logging/serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      cause: this.cause?.message,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

/**
 * Configuration file could not be read or did not validate
 */
export class ConfigurationError extends InkpostError {
  constructor(
    setting: string,
    cause?: ErrorCause,
    context: Record<string, unknown> = {},
  ) {
    super(
      `Invalid configuration: ${setting}${cause === undefined ? "" : ` (${getErrorMessage(cause)})`}`,
      "CONFIG_INVALID",
      cause,
      { setting, ...context },
    );
  }
}

/**
 * Creates a not found error message
 */
export const notFoundError = (item: string, type: string): string => {
  return `${type} "${item}" not found`;
};

/**
 * Creates a validation error message
 */
export const validationError = (field: string, reason: string): string => {
  return `Validation failed for ${field}: ${reason}`;
};
