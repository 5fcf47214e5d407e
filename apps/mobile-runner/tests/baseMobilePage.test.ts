import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { Logger, MemorySink, loadConfig } from '@uipom/core';
import { FakeDriver } from '@uipom/core/testing';
import { BaseMobilePage } from '../src/baseMobilePage.js';

class LoginScreen extends BaseMobilePage {
  static readonly USERNAME = '~username';
  static readonly PASSWORD = '~password';
  static readonly SUBMIT = '~login';

  async login(username: string, password: string): Promise<void> {
    await this.typeText(LoginScreen.USERNAME, username);
    await this.typeText(LoginScreen.PASSWORD, password);
    await this.tap(LoginScreen.SUBMIT);
  }
}

describe('BaseMobilePage', () => {
  let dir: string;
  let driver: FakeDriver;
  let memory: MemorySink;
  let logger: Logger;
  let screen: LoginScreen;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'uipom-mobile-'));
    driver = new FakeDriver({ platform: 'mobile', pageSource: '<hierarchy/>', unsupported: ['hover', 'contextClick'] });
    memory = new MemorySink();
    logger = new Logger({ sinks: [memory] });
    const config = loadConfig({
      platform: 'mobile',
      target: 'com.example.app',
      timeout: 0.2,
      pollInterval: 0.01,
      artifactsDir: dir,
    });
    screen = new LoginScreen({ driver, logger, config });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('clears fields before typing by default', async () => {
    driver.setElements('accessibilityId=username', [{}]);
    driver.setElements('accessibilityId=password', [{}]);
    driver.setElements('accessibilityId=login', [{}]);

    await screen.login('tester', 'test-secret');

    expect(driver.performed.map((p) => [p.locator, p.action])).toEqual([
      ['accessibilityId=username', { type: 'type', text: 'tester', clear: true }],
      ['accessibilityId=password', { type: 'type', text: 'test-secret', clear: true }],
      ['accessibilityId=login', { type: 'tap' }],
    ]);
  });

  it('maps touch helpers onto element actions', async () => {
    driver.setElements('accessibilityId=photo', [{}]);

    await screen.doubleTap('~photo');
    await screen.doubleTapGesture('~photo');
    await screen.longPress('~photo', 1500);
    await screen.typeText('~photo', 'caption', false);

    expect(driver.performed.map((p) => p.action)).toEqual([
      { type: 'doubleTap' },
      { type: 'doubleTapGesture' },
      { type: 'clickAndHold', holdMs: 1500 },
      { type: 'type', text: 'caption', clear: false },
    ]);
  });

  it('drags with W3C actions or the gesture command', async () => {
    const [card] = driver.setElements('accessibilityId=card', [{}]);
    const [slot] = driver.setElements('accessibilityId=slot', [{}]);

    await screen.dragAndDrop('~card', '~slot');
    await screen.dragGesture('~card', '~slot');

    expect(driver.performed).toEqual([
      { locator: 'accessibilityId=card', index: card.index, action: { type: 'dragTo', target: slot } },
      { locator: 'accessibilityId=card', index: card.index, action: { type: 'dragGesture', target: slot } },
    ]);
  });

  it('writes an xml page source next to the screenshot when a tap fails', async () => {
    const err = await screen.tap('~missing').catch((e: unknown) => e);
    await logger.flush();

    expect(err).toMatchObject({ kind: 'timeout', action: 'tap(accessibilityId=missing)' });
    const [event] = memory.events.filter((e) => e.level === 'error');
    expect(event.attachment).toMatch(/_tap_accessibilityId_missing\.png$/);
    expect(String(event.data?.pageSource)).toMatch(/_tap_accessibilityId_missing\.xml$/);
  });

  it('reports web-only gestures as unsupported', async () => {
    driver.setElements('accessibilityId=menu', [{}]);

    await expect(screen.act('~menu', { type: 'hover' })).rejects.toMatchObject({
      kind: 'unsupported-action',
      message: 'Action "hover" is not supported on mobile',
    });
  });
});
