import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  applyEnvOverrides,
  loadConfig,
  loadConfigFile,
  pollIntervalMs,
  redactConfig,
  timeoutMs,
} from '../src/config.js';
import { ConfigurationError } from '../src/errors.js';

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

describe('loadConfig', () => {
  it('builds a configuration whose fields match the document', () => {
    const config = loadConfig({
      platform: 'web',
      target: 'http://example.com',
      timeout: 5,
      credentials: { username: 'tester', password: 'test-secret' },
      logLevel: 'debug',
    });

    expect(config.platform).toBe('web');
    expect(config.target).toBe('http://example.com');
    expect(config.timeout).toBe(5);
    expect(config.credentials).toEqual({ username: 'tester', password: 'test-secret' });
    expect(config.logLevel).toBe('debug');
  });

  it('applies defaults for optional keys', () => {
    const config = loadConfig({ platform: 'mobile', target: 'com.example.app' });

    expect(config.timeout).toBe(10);
    expect(config.pollInterval).toBe(0.25);
    expect(config.logLevel).toBe('info');
    expect(config.artifactsDir).toBe('./artifacts');
    expect(config.credentials).toBeUndefined();
    expect(config.web).toEqual({ browser: 'chrome', headless: true, viewport: undefined });
    expect(config.mobile).toEqual({ appiumServer: 'http://127.0.0.1:4723', capabilities: {} });
  });

  it('returns a frozen configuration', () => {
    const config = loadConfig({
      platform: 'mobile',
      target: 'app.apk',
      mobile: { capabilities: { platformName: 'Android' } },
    });

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.web)).toBe(true);
    expect(Object.isFrozen(config.mobile)).toBe(true);
    expect(Object.isFrozen(config.mobile.capabilities)).toBe(true);
  });

  it('fails with ConfigurationError when platform is missing', () => {
    const err = captureError(() => loadConfig({ target: 'http://example.com', timeout: 5 }));
    expect(err).toBeInstanceOf(ConfigurationError);
    expect(err instanceof ConfigurationError && err.issues).toEqual(['platform: Required']);
  });

  it('rejects an unrecognized platform', () => {
    const err = captureError(() => loadConfig({ platform: 'desktop', target: 'x' }));
    expect(err).toBeInstanceOf(ConfigurationError);
    const issues = err instanceof ConfigurationError ? err.issues : [];
    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatch(/^platform: /);
  });

  it('rejects a non-positive timeout', () => {
    expect(() => loadConfig({ platform: 'web', target: 'http://example.com', timeout: 0 })).toThrow(
      /timeout: Number must be greater than 0/
    );
  });

  it('rejects infinite timeout and poll interval', () => {
    expect(() =>
      loadConfig({ platform: 'web', target: 'http://example.com' }, { UIPOM_TIMEOUT: 'Infinity' })
    ).toThrow(/timeout: Number must be finite/);
    expect(() => loadConfig({ platform: 'web', target: 'http://example.com', pollInterval: Infinity })).toThrow(
      /pollInterval: Number must be finite/
    );
  });

  it('requires an http(s) URL as the web target', () => {
    expect(() => loadConfig({ platform: 'web', target: 'example.com' })).toThrow(
      'target: web target must be an absolute http(s) URL, got "example.com"'
    );
  });

  it('accepts any non-empty app identifier as the mobile target', () => {
    expect(loadConfig({ platform: 'mobile', target: 'com.example.app' }).target).toBe('com.example.app');
  });

  it('rejects unknown keys', () => {
    expect(() => loadConfig({ platform: 'web', target: 'http://example.com', browser: 'chrome' })).toThrow(
      ConfigurationError
    );
  });

  it('rejects a document that is not an object', () => {
    expect(() => loadConfig(['web'])).toThrow('Configuration document must be a JSON object');
    expect(() => loadConfig(null)).toThrow(ConfigurationError);
  });

  it('lets environment overrides win over the document', () => {
    const config = loadConfig(
      { platform: 'web', target: 'http://example.com', timeout: 5, web: { browser: 'chrome' } },
      {
        UIPOM_TIMEOUT: '12.5',
        UIPOM_BROWSER: 'Firefox',
        UIPOM_HEADLESS: 'false',
        UIPOM_CREDENTIAL_PASSWORD: 'test-secret',
        UNRELATED: 'ignored',
      }
    );

    expect(config.timeout).toBe(12.5);
    expect(config.web.browser).toBe('firefox');
    expect(config.web.headless).toBe(false);
    expect(config.credentials).toEqual({ password: 'test-secret' });
  });

  it('reports environment values that do not coerce', () => {
    expect(() =>
      loadConfig({ platform: 'web', target: 'http://example.com' }, { UIPOM_TIMEOUT: 'soon' })
    ).toThrow(/timeout: Expected number, received nan/);
  });

  it('can supply platform entirely from the environment', () => {
    const config = loadConfig({ target: 'com.example.app' }, { UIPOM_PLATFORM: 'MOBILE' });
    expect(config.platform).toBe('mobile');
  });
});

describe('applyEnvOverrides', () => {
  it('does not mutate the input document', () => {
    const doc = { platform: 'web', web: { browser: 'chrome' } };
    const result = applyEnvOverrides(doc, { UIPOM_BROWSER: 'edge', UIPOM_APPIUM_SERVER: 'http://grid:4723' });

    expect(doc).toEqual({ platform: 'web', web: { browser: 'chrome' } });
    expect(result).toEqual({
      platform: 'web',
      web: { browser: 'edge' },
      mobile: { appiumServer: 'http://grid:4723' },
    });
  });

  it('merges credential variables into existing credentials', () => {
    const result = applyEnvOverrides(
      { credentials: { username: 'tester' } },
      { UIPOM_CREDENTIAL_API_TOKEN: 'test-token' }
    );
    expect(result.credentials).toEqual({ username: 'tester', api_token: 'test-token' });
  });
});

describe('loadConfigFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'uipom-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads a JSON document from disk', async () => {
    const path = join(dir, 'config.json');
    await writeFile(path, JSON.stringify({ platform: 'web', target: 'http://example.com', timeout: 5 }));

    const config = loadConfigFile(path);
    expect(config.platform).toBe('web');
    expect(config.timeout).toBe(5);
  });

  it('fails with ConfigurationError for a missing file', () => {
    expect(() => loadConfigFile(join(dir, 'absent.json'))).toThrow(/Config file not found/);
  });

  it('fails with ConfigurationError for malformed JSON', async () => {
    const path = join(dir, 'broken.json');
    await writeFile(path, '{ "platform": ');
    expect(() => loadConfigFile(path)).toThrow(ConfigurationError);
  });
});

describe('helpers', () => {
  it('converts timeout and poll interval to milliseconds', () => {
    const config = loadConfig({ platform: 'web', target: 'http://example.com', timeout: 5, pollInterval: 0.1 });
    expect(timeoutMs(config)).toBe(5000);
    expect(pollIntervalMs(config)).toBe(100);
  });

  it('keeps sub-millisecond timeouts at 1ms or more', () => {
    const config = loadConfig({ platform: 'web', target: 'http://example.com', timeout: 0.0004 });
    expect(timeoutMs(config)).toBe(1);
    expect(timeoutMs(loadConfig({ platform: 'web', target: 'http://example.com', timeout: 1.0004 }))).toBe(1001);
  });

  it('masks credential values', () => {
    const config = loadConfig({
      platform: 'web',
      target: 'http://example.com',
      credentials: { username: 'tester', password: 'test-secret' },
    });
    const redacted = redactConfig(config);

    expect(redacted.credentials).toEqual({ username: '***', password: '***' });
    expect(redacted.target).toBe('http://example.com');
    expect(config.credentials?.password).toBe('test-secret');
  });
});
