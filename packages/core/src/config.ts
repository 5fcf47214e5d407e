/**
 * Configuration loader
 * Validates a JSON configuration document (plus UIPOM_* environment overrides)
 * into a frozen Configuration.
 */

import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { z } from 'zod';
import { ConfigurationError, errorMessage } from './errors.js';
import type { LogLevel, Platform } from './schema.js';

export type BrowserName = 'chrome' | 'firefox' | 'edge';

const WebSectionSchema = z
  .object({
    browser: z.enum(['chrome', 'firefox', 'edge']).default('chrome'),
    headless: z.boolean().default(true),
    viewport: z
      .object({
        width: z.number().int().positive(),
        height: z.number().int().positive(),
      })
      .strict()
      .optional(),
  })
  .strict();

const MobileSectionSchema = z
  .object({
    appiumServer: z.string().url().default('http://127.0.0.1:4723'),
    capabilities: z.record(z.unknown()).default({}),
  })
  .strict();

export const ConfigDocumentSchema = z
  .object({
    platform: z.enum(['web', 'mobile']),
    target: z.string().trim().min(1),
    timeout: z.number().positive().finite().default(10),
    pollInterval: z.number().positive().finite().default(0.25),
    credentials: z.record(z.string()).optional(),
    logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    logFile: z.string().min(1).optional(),
    artifactsDir: z.string().min(1).default('./artifacts'),
    web: WebSectionSchema.default({}),
    mobile: MobileSectionSchema.default({}),
  })
  .strict()
  .superRefine((doc, ctx) => {
    if (doc.platform !== 'web') return;
    let url: URL | null = null;
    try {
      url = new URL(doc.target);
    } catch {
      url = null;
    }
    if (!url || (url.protocol !== 'http:' && url.protocol !== 'https:')) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['target'],
        message: `web target must be an absolute http(s) URL, got "${doc.target}"`,
      });
    }
  });

export type ConfigDocument = z.input<typeof ConfigDocumentSchema>;

export interface Configuration {
  readonly platform: Platform;
  readonly target: string;
  /** Seconds. */
  readonly timeout: number;
  /** Seconds between polls in waitFor. */
  readonly pollInterval: number;
  readonly credentials?: Readonly<Record<string, string>>;
  readonly logLevel: LogLevel;
  readonly logFile?: string;
  readonly artifactsDir: string;
  readonly web: {
    readonly browser: BrowserName;
    readonly headless: boolean;
    readonly viewport?: { readonly width: number; readonly height: number };
  };
  readonly mobile: {
    readonly appiumServer: string;
    readonly capabilities: Readonly<Record<string, unknown>>;
  };
}

export type EnvOverrides = Readonly<Record<string, string | undefined>>;

export const ENV_PREFIX = 'UIPOM_';
const CREDENTIAL_PREFIX = `${ENV_PREFIX}CREDENTIAL_`;

function parseNumber(raw: string): number {
  return raw.trim() === '' ? Number.NaN : Number(raw);
}

function parseBoolean(raw: string): boolean | string {
  const value = raw.trim().toLowerCase();
  if (['true', '1', 'yes'].includes(value)) return true;
  if (['false', '0', 'no'].includes(value)) return false;
  // left as a string so validation reports it
  return raw;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(doc: Record<string, unknown>, key: string): Record<string, unknown> {
  const existing = doc[key];
  const copy = isRecord(existing) ? { ...existing } : {};
  doc[key] = copy;
  return copy;
}

/** Returns a copy of `document` with UIPOM_* environment values laid over it. */
export function applyEnvOverrides(document: Record<string, unknown>, env: EnvOverrides): Record<string, unknown> {
  const doc: Record<string, unknown> = { ...document };
  const get = (name: string): string | undefined => env[`${ENV_PREFIX}${name}`];

  const platform = get('PLATFORM');
  if (platform !== undefined) doc.platform = platform.trim().toLowerCase();
  const target = get('TARGET');
  if (target !== undefined) doc.target = target;
  const timeout = get('TIMEOUT');
  if (timeout !== undefined) doc.timeout = parseNumber(timeout);
  const pollInterval = get('POLL_INTERVAL');
  if (pollInterval !== undefined) doc.pollInterval = parseNumber(pollInterval);
  const logLevel = get('LOG_LEVEL');
  if (logLevel !== undefined) doc.logLevel = logLevel.trim().toLowerCase();
  const logFile = get('LOG_FILE');
  if (logFile !== undefined) doc.logFile = logFile;
  const artifactsDir = get('ARTIFACTS_DIR');
  if (artifactsDir !== undefined) doc.artifactsDir = artifactsDir;

  const browser = get('BROWSER');
  if (browser !== undefined) section(doc, 'web').browser = browser.trim().toLowerCase();
  const headless = get('HEADLESS');
  if (headless !== undefined) section(doc, 'web').headless = parseBoolean(headless);
  const appiumServer = get('APPIUM_SERVER');
  if (appiumServer !== undefined) section(doc, 'mobile').appiumServer = appiumServer;

  const credentialKeys = Object.keys(env).filter((k) => k.startsWith(CREDENTIAL_PREFIX)).sort();
  if (credentialKeys.length > 0) {
    const credentials = section(doc, 'credentials');
    for (const key of credentialKeys) {
      const name = key.slice(CREDENTIAL_PREFIX.length).toLowerCase();
      const value = env[key];
      if (name !== '' && value !== undefined) credentials[name] = value;
    }
  }

  return doc;
}

function formatIssues(error: z.ZodError): string[] {
  return error.errors.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

export function loadConfig(document: unknown, env: EnvOverrides = {}): Configuration {
  if (!isRecord(document)) {
    throw new ConfigurationError('Configuration document must be a JSON object');
  }

  const result = ConfigDocumentSchema.safeParse(applyEnvOverrides(document, env));
  if (!result.success) {
    throw new ConfigurationError('Invalid configuration', formatIssues(result.error));
  }

  const doc = result.data;
  const viewport = doc.web.viewport;
  return Object.freeze({
    platform: doc.platform,
    target: doc.target,
    timeout: doc.timeout,
    pollInterval: doc.pollInterval,
    credentials: doc.credentials ? Object.freeze({ ...doc.credentials }) : undefined,
    logLevel: doc.logLevel,
    logFile: doc.logFile,
    artifactsDir: doc.artifactsDir,
    web: Object.freeze({
      browser: doc.web.browser,
      headless: doc.web.headless,
      viewport: viewport ? Object.freeze({ width: viewport.width, height: viewport.height }) : undefined,
    }),
    mobile: Object.freeze({
      appiumServer: doc.mobile.appiumServer,
      capabilities: Object.freeze({ ...doc.mobile.capabilities }),
    }),
  });
}

export function loadConfigFile(configPath: string, env: EnvOverrides = {}): Configuration {
  const resolved = resolve(process.cwd(), configPath);
  if (!existsSync(resolved)) {
    throw new ConfigurationError(`Config file not found: ${resolved}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(resolved, 'utf-8'));
  } catch (err) {
    throw new ConfigurationError(`Config file is not valid JSON: ${resolved} (${errorMessage(err)})`, [], {
      cause: err,
    });
  }
  return loadConfig(parsed, env);
}

export const REDACTED = '***';

export function redactConfig(config: Configuration): Configuration {
  if (!config.credentials) return config;
  const masked: Record<string, string> = {};
  for (const key of Object.keys(config.credentials)) masked[key] = REDACTED;
  return Object.freeze({ ...config, credentials: Object.freeze(masked) });
}

/** Never below 1ms, so a sub-millisecond timeout still allows one check. */
export function timeoutMs(config: Configuration): number {
  return Math.max(1, Math.ceil(config.timeout * 1000));
}

export function pollIntervalMs(config: Configuration): number {
  return Math.max(1, Math.round(config.pollInterval * 1000));
}
