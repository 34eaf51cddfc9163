/**
 * Runtime Error Types
 *
 * Typed error classes so retry logic and the supervisor can tell
 * transient failures from faults.
 */

export type RuntimeErrorCode =
  | 'LLM_FAILED'
  | 'TIMEOUT'
  | 'STORE_FAILED'
  | 'MOTOR_FAILED'
  | 'CONFIG_INVALID'
  | 'INTEGRITY';

/**
 * Base runtime error class.
 */
export class RuntimeError extends Error {
  readonly code: RuntimeErrorCode;

  constructor(message: string, code: RuntimeErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RuntimeError';
    this.code = code;
  }
}

/**
 * Language model call failed.
 * `retryable` is false for configuration problems (missing key, bad model).
 */
export class LLMError extends RuntimeError {
  readonly provider: string;
  readonly statusCode: number | undefined;
  readonly retryable: boolean;

  constructor(
    message: string,
    provider: string,
    options?: { statusCode?: number; retryable?: boolean; cause?: unknown }
  ) {
    super(message, 'LLM_FAILED', { cause: options?.cause });
    this.name = 'LLMError';
    this.provider = provider;
    this.statusCode = options?.statusCode;
    this.retryable = options?.retryable ?? true;
  }
}

/**
 * Operation exceeded its time budget. Counts as a failed attempt.
 */
export class TimeoutError extends RuntimeError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number, operation = 'Operation') {
    super(`${operation} timed out after ${String(timeoutMs)}ms`, 'TIMEOUT');
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Memory store write or read failed.
 */
export class StoreError extends RuntimeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'STORE_FAILED', options);
    this.name = 'StoreError';
  }
}

/**
 * An entity would break a relationship invariant (e.g. impression without sources).
 */
export class IntegrityError extends RuntimeError {
  constructor(message: string) {
    super(message, 'INTEGRITY');
    this.name = 'IntegrityError';
  }
}

/**
 * Motor refused or failed an intention.
 */
export class MotorError extends RuntimeError {
  readonly action: string;

  constructor(action: string, message: string, options?: { cause?: unknown }) {
    super(`Motor ${action}: ${message}`, 'MOTOR_FAILED', options);
    this.name = 'MotorError';
    this.action = action;
  }
}

/**
 * Configuration file is present but invalid.
 */
export class ConfigError extends RuntimeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'CONFIG_INVALID', options);
    this.name = 'ConfigError';
  }
}

/**
 * Error message for logging, whatever was thrown.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Whether an abort signal caused this error.
 */
export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}
