/**
 * Exception/Reporting Wrapper
 *
 * Runs a page-object action, and on failure captures a screenshot and page
 * source, logs the error with the attachment, then throws a normalized
 * ActionError. Capture happens before control returns to the caller, so it
 * always precedes session teardown.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { ActionError, AssertionFailedError, TimeoutError, errorMessage } from './errors.js';
import type { Logger } from './logger.js';
import type { ActionErrorKind, DriverHandle } from './schema.js';

export interface ActionContext {
  driver: DriverHandle;
  logger: Logger;
  artifactsDir: string;
}

export interface Diagnostics {
  screenshotPath?: string;
  pageSourcePath?: string;
}

const reported = new WeakSet<object>();

const KIND_PATTERNS: ReadonlyArray<[ActionErrorKind, RegExp]> = [
  [
    'driver-disconnected',
    /invalid session id|session (?:is )?deleted|no such session|has been closed|browser has disconnected|econnrefused|econnreset|socket hang up|session not created/i,
  ],
  ['timeout', /timed? ?out|timeout/i],
  [
    'locator-not-found',
    /no such element|unable to locate|element not found|could not be located|resolved to 0 elements|stale element/i,
  ],
  ['assertion-failed', /\bassert|\bexpected\b/i],
];

export function classifyFailure(err: unknown): ActionErrorKind {
  if (err instanceof ActionError) return err.kind;
  if (err instanceof Error && err.name === 'TimeoutError') return 'timeout';
  if (err instanceof Error && err.name === 'AssertionError') return 'assertion-failed';
  const message = errorMessage(err);
  for (const [kind, pattern] of KIND_PATTERNS) {
    if (pattern.test(message)) return kind;
  }
  return 'action-failed';
}

export function toActionError(err: unknown, action: string, attachment?: string): ActionError {
  const message = errorMessage(err);
  if (err instanceof TimeoutError) {
    return new TimeoutError(action, message, {
      timeoutMs: err.timeoutMs,
      elapsedMs: err.elapsedMs,
      attachment,
      cause: err.cause ?? err,
    });
  }
  if (err instanceof AssertionFailedError) {
    return new AssertionFailedError(action, message, {
      expected: err.expected,
      actual: err.actual,
      attachment,
      cause: err,
    });
  }
  return new ActionError(classifyFailure(err), action, message, { attachment, cause: err });
}

function fileStem(action: string): string {
  const safe = action.replace(/[^A-Za-z0-9_-]+/g, '_').replace(/^_+|_+$/g, '').slice(0, 60);
  return `${Date.now()}_${safe || 'action'}`;
}

/**
 * Writes whatever diagnostics the session can still produce. Each capture is
 * independent: a failed screenshot does not prevent the page source.
 */
export async function captureDiagnostics(ctx: ActionContext, action: string): Promise<Diagnostics> {
  const diagnostics: Diagnostics = {};
  if (ctx.driver.released) {
    ctx.logger.warn(`Skipping diagnostics for ${action}: session already released`);
    return diagnostics;
  }

  const dir = resolve(ctx.artifactsDir);
  const stem = fileStem(action);
  try {
    await mkdir(dir, { recursive: true });
  } catch (err) {
    ctx.logger.warn(`Cannot create artifacts directory ${dir}: ${errorMessage(err)}`);
    return diagnostics;
  }

  try {
    const png = await ctx.driver.screenshot();
    const path = join(dir, `${stem}.png`);
    await writeFile(path, png);
    diagnostics.screenshotPath = path;
  } catch (err) {
    ctx.logger.warn(`Screenshot capture failed for ${action}: ${errorMessage(err)}`);
  }

  try {
    const source = await ctx.driver.pageSource();
    const path = join(dir, `${stem}.${ctx.driver.platform === 'web' ? 'html' : 'xml'}`);
    await writeFile(path, source, 'utf-8');
    diagnostics.pageSourcePath = path;
  } catch (err) {
    ctx.logger.warn(`Page source capture failed for ${action}: ${errorMessage(err)}`);
  }

  return diagnostics;
}

export async function runAction<T>(ctx: ActionContext, action: string, fn: () => Promise<T>): Promise<T> {
  const startedAt = Date.now();
  ctx.logger.debug(`Action started: ${action}`);
  try {
    const result = await fn();
    ctx.logger.info(`Action succeeded: ${action} (${Date.now() - startedAt}ms)`);
    return result;
  } catch (err) {
    if (typeof err === 'object' && err !== null && reported.has(err)) throw err;

    const diagnostics = await captureDiagnostics(ctx, action);
    const attachment = diagnostics.screenshotPath ?? diagnostics.pageSourcePath;
    const failure = toActionError(err, action, attachment);
    reported.add(failure);

    ctx.logger.error(`Action failed: ${action} [${failure.kind}] ${failure.message}`, attachment, {
      kind: failure.kind,
      action,
      durationMs: Date.now() - startedAt,
      ...(diagnostics.pageSourcePath ? { pageSource: diagnostics.pageSourcePath } : {}),
    });
    throw failure;
  }
}

/** True when `err` has already been logged with diagnostics by a wrapper. */
export function isReported(err: unknown): boolean {
  return typeof err === 'object' && err !== null && reported.has(err);
}
