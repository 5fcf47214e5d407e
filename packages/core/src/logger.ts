/**
 * Logging Facility
 * Leveled, structured events fanned out to console, JSON Lines file or memory sinks.
 * A Logger never throws: sink failures go to a fallback console write.
 */

import { appendFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { LoggingFailure, errorMessage } from './errors.js';
import { LOG_LEVELS, type LogEvent, type LogLevel } from './schema.js';

export interface LogSink {
  readonly name: string;
  write(event: LogEvent): void | Promise<void>;
  close?(): Promise<void>;
}

const LEVEL_LABELS: Record<LogLevel, string> = {
  debug: 'DEBUG',
  info: 'INFO ',
  warn: 'WARN ',
  error: 'ERROR',
};

export function formatLogLine(event: LogEvent): string {
  const scope = event.scope ? ` [${event.scope}]` : '';
  const attachment = event.attachment ? ` (attachment: ${event.attachment})` : '';
  return `${event.timestamp} ${LEVEL_LABELS[event.level]}${scope} ${event.message}${attachment}`;
}

export class ConsoleSink implements LogSink {
  readonly name = 'console';

  write(event: LogEvent): void {
    const line = formatLogLine(event);
    if (event.level === 'error') console.error(line);
    else if (event.level === 'warn') console.warn(line);
    else console.log(line);
  }
}

export class FileSink implements LogSink {
  readonly name: string;
  private ready: Promise<void> | null = null;

  constructor(private readonly path: string) {
    this.name = `file:${path}`;
  }

  async write(event: LogEvent): Promise<void> {
    if (!this.ready) {
      this.ready = mkdir(dirname(this.path), { recursive: true }).then(() => undefined);
    }
    await this.ready;
    await appendFile(this.path, JSON.stringify(event) + '\n', 'utf-8');
  }
}

export class MemorySink implements LogSink {
  readonly name = 'memory';
  readonly events: LogEvent[] = [];

  write(event: LogEvent): void {
    this.events.push(event);
  }

  messages(level?: LogLevel): string[] {
    return this.events.filter((e) => !level || e.level === level).map((e) => e.message);
  }
}

export type FallbackWriter = (failure: LoggingFailure) => void;

const defaultFallback: FallbackWriter = (failure) => {
  try {
    console.error(`[uipom:logger] ${failure.message}`);
  } catch {
    // stderr itself is gone; nothing left to report to
  }
};

export interface LoggerOptions {
  level?: LogLevel;
  sinks?: LogSink[];
  scope?: string;
  fallback?: FallbackWriter;
}

/** Shared by a logger and its children so they write through one queue. */
interface LoggerCore {
  level: LogLevel;
  sinks: LogSink[];
  fallback: FallbackWriter;
  queue: Promise<void>;
  closed: boolean;
}

export class Logger {
  private readonly core: LoggerCore;
  readonly scope?: string;

  constructor(options: LoggerOptions = {}, core?: LoggerCore) {
    this.core = core ?? {
      level: options.level ?? 'info',
      sinks: options.sinks ?? [new ConsoleSink()],
      fallback: options.fallback ?? defaultFallback,
      queue: Promise.resolve(),
      closed: false,
    };
    this.scope = options.scope;
  }

  get level(): LogLevel {
    return this.core.level;
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.core.level);
  }

  child(scope: string): Logger {
    return new Logger({ scope: this.scope ? `${this.scope}:${scope}` : scope }, this.core);
  }

  log(level: LogLevel, message: string, attachment?: string, data?: Record<string, unknown>): void {
    if (this.core.closed || !this.isEnabled(level)) return;

    const event: LogEvent = { timestamp: new Date().toISOString(), level, message };
    if (this.scope) event.scope = this.scope;
    if (attachment) event.attachment = attachment;
    if (data) event.data = data;

    for (const sink of this.core.sinks) {
      this.core.queue = this.core.queue
        .then(() => sink.write(event))
        .catch((err: unknown) => this.report(`sink ${sink.name} failed to write: ${errorMessage(err)}`, err));
    }
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('debug', message, undefined, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', message, undefined, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', message, undefined, data);
  }

  error(message: string, attachment?: string, data?: Record<string, unknown>): void {
    this.log('error', message, attachment, data);
  }

  /** Resolves once every event logged so far has reached its sinks. */
  flush(): Promise<void> {
    return this.core.queue;
  }

  async close(): Promise<void> {
    if (this.core.closed) return;
    this.core.closed = true;
    await this.core.queue;
    for (const sink of this.core.sinks) {
      if (!sink.close) continue;
      try {
        await sink.close();
      } catch (err) {
        this.report(`sink ${sink.name} failed to close: ${errorMessage(err)}`, err);
      }
    }
  }

  private report(message: string, cause: unknown): void {
    try {
      this.core.fallback(new LoggingFailure(message, { cause }));
    } catch {
      defaultFallback(new LoggingFailure(message, { cause }));
    }
  }
}

export interface LoggingOptions {
  level: LogLevel;
  /** JSON Lines file; omitted means console only. */
  file?: string;
  console?: boolean;
  extraSinks?: LogSink[];
  fallback?: FallbackWriter;
}

let active: Logger | null = null;

/**
 * Starts the process-wide logger for a test run, closing any previous one.
 * Components still receive the returned instance by injection.
 */
export async function initLogging(options: LoggingOptions): Promise<Logger> {
  await shutdownLogging();
  const sinks: LogSink[] = [];
  if (options.console ?? true) sinks.push(new ConsoleSink());
  if (options.file) sinks.push(new FileSink(options.file));
  if (options.extraSinks) sinks.push(...options.extraSinks);
  active = new Logger({ level: options.level, sinks, fallback: options.fallback });
  return active;
}

export async function shutdownLogging(): Promise<void> {
  const current = active;
  active = null;
  if (current) await current.close();
}

export function activeLogger(): Logger | null {
  return active;
}
