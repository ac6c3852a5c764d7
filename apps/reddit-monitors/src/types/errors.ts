/**
 * Error types shared by the monitor
 */

/**
 * Base error for everything the monitor raises on purpose
 */
export class MonitorError extends Error {
  public readonly code: string;
  public readonly isRetryable: boolean;

  constructor(
    message: string,
    code: string,
    options: { isRetryable?: boolean; cause?: unknown } = {}
  ) {
    super(message);
    this.name = 'MonitorError';
    this.code = code;
    this.isRetryable = options.isRetryable ?? false;

    if (options.cause !== undefined) {
      this.cause = options.cause;
    }

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Missing credentials or an unusable configuration file
 */
export class ConfigError extends MonitorError {
  constructor(message: string, cause?: unknown) {
    super(message, 'CONFIG_ERROR', { cause });
    this.name = 'ConfigError';
  }
}

/**
 * Content retrieval failure. Permanent failures (subreddit missing, banned or
 * private) disable the subscription until restart; the rest are retried on the
 * next tick.
 */
export class SourceError extends MonitorError {
  public readonly permanent: boolean;
  public readonly statusCode?: number;

  constructor(
    message: string,
    options: { permanent?: boolean; statusCode?: number; cause?: unknown } = {}
  ) {
    const permanent = options.permanent ?? false;
    super(message, permanent ? 'SOURCE_PERMANENT' : 'SOURCE_TRANSIENT', {
      isRetryable: !permanent,
      cause: options.cause,
    });
    this.name = 'SourceError';
    this.permanent = permanent;
    this.statusCode = options.statusCode;
  }
}

export class TimeoutError extends SourceError {
  constructor(message: string) {
    super(message, { permanent: false });
    this.name = 'TimeoutError';
  }
}

/**
 * The state file could not be written; the previous watermark stays in effect
 */
export class WatermarkPersistError extends MonitorError {
  constructor(message: string, cause?: unknown) {
    super(message, 'WATERMARK_PERSIST_ERROR', { isRetryable: true, cause });
    this.name = 'WatermarkPersistError';
  }
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
