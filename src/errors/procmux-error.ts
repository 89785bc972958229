/**
 * procmux error classes
 */

import { constants } from 'os';
import { ErrorCategory, ErrorCode, getErrorCategory, getErrorMessage } from './error-codes';

/**
 * Base error class for procmux
 */
export class ProcmuxError extends Error {
  public readonly code: ErrorCode;
  public readonly category: ErrorCategory;
  public readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, context?: string, details?: Record<string, unknown>) {
    const baseMessage = getErrorMessage(code);
    const fullMessage = context
      ? `[${code}] ${baseMessage}: ${context}`
      : `[${code}] ${baseMessage}`;

    super(fullMessage);
    this.name = 'ProcmuxError';
    this.code = code;
    this.category = getErrorCategory(code);
    this.details = details;

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Missing or malformed Procfile / settings. Fatal, surfaced with usage text.
 */
export class ConfigurationError extends ProcmuxError {
  constructor(code: ErrorCode, context?: string, details?: Record<string, unknown>) {
    super(code, context, details);
    this.name = 'ConfigurationError';
  }
}

/**
 * Caller misuse: a log multiplexer without a prefix, or a bad CLI invocation.
 */
export class UsageError extends ProcmuxError {
  constructor(code: ErrorCode, context?: string) {
    super(code, context);
    this.name = 'UsageError';
  }
}

/**
 * A supervised process exited non-zero or never started.
 * Recorded by the supervisor, siblings keep running.
 */
export class ChildFailure extends ProcmuxError {
  public readonly processName: string;
  public readonly exitCode: number | null;
  public readonly signal: NodeJS.Signals | null;

  constructor(
    processName: string,
    exitCode: number | null,
    signal: NodeJS.Signals | null,
    cause?: Error
  ) {
    const code = cause ? ErrorCode.E302_CHILD_SPAWN_FAILED : ErrorCode.E301_CHILD_EXITED_NON_ZERO;
    const context = cause
      ? `${processName}: ${cause.message}`
      : `${processName} (code=${exitCode ?? 'none'}, signal=${signal ?? 'none'})`;
    super(code, context, { processName, exitCode, signal });
    this.name = 'ChildFailure';
    this.processName = processName;
    this.exitCode = exitCode;
    this.signal = signal;
  }
}

/**
 * Used as the abort reason when a signal starts the group shutdown.
 */
export class SignalTermination extends ProcmuxError {
  public readonly signal: NodeJS.Signals;

  constructor(signal: NodeJS.Signals) {
    super(ErrorCode.E401_SIGNAL_RECEIVED, signal, { signal });
    this.name = 'SignalTermination';
    this.signal = signal;
  }

  /**
   * Shell convention: 128 + signal number
   */
  get exitCode(): number {
    return 128 + (constants.signals[this.signal] ?? 0);
  }
}

/**
 * Exit status for an error surfaced at the CLI boundary
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof ConfigurationError) {
    return 2;
  }
  if (error instanceof UsageError) {
    return error.code === ErrorCode.E202_INVALID_INVOCATION ? 2 : 1;
  }
  if (error instanceof SignalTermination) {
    return error.exitCode;
  }
  return 1;
}
