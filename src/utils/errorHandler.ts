import { logger } from './logger';

/**
 * Non-2xx response from an outbound request
 */
export class HttpError extends Error {
  statusCode: number;
  url: string;

  constructor(statusCode: number, url: string, message?: string) {
    super(message || `Request to ${url} failed with status ${statusCode}`);
    this.statusCode = statusCode;
    this.url = url;
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * HTTP 429 from the job board
 */
export class RateLimitError extends HttpError {
  constructor(url: string) {
    super(429, url, `Rate limited by ${new URL(url).hostname}`);
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Bad command line or interactive input
 */
export class InputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * A workflow step or one of its subprocesses failed
 */
export class StepError extends Error {
  step: string;

  constructor(step: string, message: string) {
    super(message);
    this.step = step;
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * The user stopped a run with Ctrl+C; the message carries the resume hint
 */
export class InterruptedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** readline rejects a pending question with an AbortError on Ctrl+C */
export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

export function isRateLimitError(error: unknown): error is RateLimitError {
  return error instanceof RateLimitError;
}

/**
 * Log a fatal CLI error and map it to a process exit code
 */
export function handleCliError(error: unknown): number {
  if (error instanceof ConfigError) {
    logger.error(`Configuration error: ${error.message}`);
    return 2;
  }

  if (error instanceof InputError) {
    logger.error(error.message);
    return 2;
  }

  if (error instanceof InterruptedError) {
    logger.info(error.message);
    return 1;
  }

  if (error instanceof StepError) {
    logger.error(`Step ${error.step} failed: ${error.message}`);
    return 1;
  }

  if (error instanceof Error) {
    logger.error(error);
    return 1;
  }

  logger.error(`Unexpected error: ${String(error)}`);
  return 1;
}
