/**
 * Error taxonomy
 *
 * Every error carries a machine-readable `code`. Configuration and driver
 * errors abort a test before any page action runs; ActionError and its
 * subclasses are what page objects surface to the test runner.
 */

import type { ActionErrorKind, Platform } from './schema.js';

export class UiPomError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'UiPomError';
    this.code = code;
  }
}

export class ConfigurationError extends UiPomError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = [], options?: { cause?: unknown }) {
    super('CONFIGURATION_INVALID', issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, options);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

export class DriverInitializationError extends UiPomError {
  readonly platform: Platform;

  constructor(platform: Platform, message: string, options?: { cause?: unknown }) {
    super('DRIVER_INITIALIZATION_FAILED', message, options);
    this.name = 'DriverInitializationError';
    this.platform = platform;
  }
}

export interface ActionErrorOptions {
  attachment?: string;
  cause?: unknown;
}

export class ActionError extends UiPomError {
  readonly kind: ActionErrorKind;
  /** Name of the page-object action that failed, e.g. `find(#login)`. */
  readonly action: string;
  readonly attachment?: string;

  constructor(kind: ActionErrorKind, action: string, message: string, options: ActionErrorOptions = {}) {
    super(`ACTION_${kind.toUpperCase().replace(/-/g, '_')}`, message, { cause: options.cause });
    this.name = 'ActionError';
    this.kind = kind;
    this.action = action;
    this.attachment = options.attachment;
  }
}

export interface TimeoutErrorOptions extends ActionErrorOptions {
  timeoutMs: number;
  elapsedMs: number;
}

export class TimeoutError extends ActionError {
  readonly timeoutMs: number;
  readonly elapsedMs: number;

  constructor(action: string, message: string, options: TimeoutErrorOptions) {
    super('timeout', action, message, options);
    this.name = 'TimeoutError';
    this.timeoutMs = options.timeoutMs;
    this.elapsedMs = options.elapsedMs;
  }
}

export class AssertionFailedError extends ActionError {
  readonly expected?: string;
  readonly actual?: string;

  constructor(
    action: string,
    message: string,
    options: ActionErrorOptions & { expected?: string; actual?: string } = {}
  ) {
    super('assertion-failed', action, message, options);
    this.name = 'AssertionFailedError';
    this.expected = options.expected;
    this.actual = options.actual;
  }
}

/** Raised by a DriverHandle used after `release()`. */
export class DriverDisconnectedError extends ActionError {
  constructor(action: string, sessionId: string) {
    super('driver-disconnected', action, `Session ${sessionId} has been released`);
    this.name = 'DriverDisconnectedError';
  }
}

export class UnsupportedActionError extends ActionError {
  constructor(platform: Platform, action: string) {
    super('unsupported-action', action, `Action "${action}" is not supported on ${platform}`);
    this.name = 'UnsupportedActionError';
  }
}

/** Never thrown to callers: handed to the logger's fallback writer. */
export class LoggingFailure extends UiPomError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('LOGGING_FAILED', message, options);
    this.name = 'LoggingFailure';
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  return String(err);
}
