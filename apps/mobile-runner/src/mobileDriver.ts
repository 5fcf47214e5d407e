/**
 * Mobile Driver
 * Appium (WebdriverIO) implementation of the DriverHandle contract
 */

import { remote } from 'webdriverio';
import {
  DriverDisconnectedError,
  DriverInitializationError,
  UnsupportedActionError,
  errorMessage,
  xpathString,
  type Configuration,
  type DriverHandle,
  type ElementAction,
  type ElementRef,
  type Locator,
  type Logger,
} from '@uipom/core';

export interface ElementRect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export type PointerAction =
  | { type: 'pointerMove'; duration: number; x: number; y: number }
  | { type: 'pointerDown'; button: number }
  | { type: 'pointerUp'; button: number }
  | { type: 'pause'; duration: number };

export interface PointerSequence {
  type: 'pointer';
  id: string;
  parameters: { pointerType: 'touch' };
  actions: PointerAction[];
}

/**
 * Element-id level commands against the Appium session. Implemented over a
 * WebdriverIO browser by `wdioClient`; tests supply their own.
 */
export interface AppiumClient {
  readonly sessionId: string;
  findElementIds(using: string, value: string): Promise<string[]>;
  isDisplayed(elementId: string): Promise<boolean>;
  isEnabled(elementId: string): Promise<boolean>;
  text(elementId: string): Promise<string>;
  attribute(elementId: string, name: string): Promise<string | null>;
  rect(elementId: string): Promise<ElementRect>;
  click(elementId: string): Promise<void>;
  clear(elementId: string): Promise<void>;
  sendKeys(elementId: string, text: string): Promise<void>;
  performActions(sequences: PointerSequence[]): Promise<void>;
  releaseActions(): Promise<void>;
  execute(script: string, args: Record<string, unknown>): Promise<unknown>;
  navigateTo(url: string): Promise<void>;
  getUrl(): Promise<string>;
  getTitle(): Promise<string>;
  takeScreenshot(): Promise<string>;
  getPageSource(): Promise<string>;
  deleteSession(): Promise<void>;
}

const W3C_ELEMENT_KEY = 'element-6066-11e4-a52e-4f7d8a7b1b6f';

function elementIdOf(reference: unknown): string {
  if (typeof reference === 'object' && reference !== null) {
    if (W3C_ELEMENT_KEY in reference && typeof reference[W3C_ELEMENT_KEY] === 'string') {
      return reference[W3C_ELEMENT_KEY];
    }
    if ('ELEMENT' in reference && typeof reference.ELEMENT === 'string') {
      return reference.ELEMENT;
    }
  }
  throw new Error(`Unexpected element reference from Appium: ${JSON.stringify(reference)}`);
}

export function wdioClient(browser: WebdriverIO.Browser): AppiumClient {
  return {
    sessionId: browser.sessionId,
    findElementIds: async (using, value) => {
      const references: unknown[] = await browser.findElements(using, value);
      return references.map(elementIdOf);
    },
    isDisplayed: (id) => browser.isElementDisplayed(id),
    isEnabled: (id) => browser.isElementEnabled(id),
    text: (id) => browser.getElementText(id),
    attribute: (id, name) => browser.getElementAttribute(id, name),
    rect: async (id) => {
      const { x, y, width, height } = await browser.getElementRect(id);
      return { x, y, width, height };
    },
    click: async (id) => {
      await browser.elementClick(id);
    },
    clear: async (id) => {
      await browser.elementClear(id);
    },
    sendKeys: async (id, text) => {
      await browser.elementSendKeys(id, text);
    },
    performActions: async (sequences) => {
      await browser.performActions(sequences);
    },
    releaseActions: async () => {
      await browser.releaseActions();
    },
    execute: (script, args) => browser.execute(script, args),
    navigateTo: async (url) => {
      await browser.navigateTo(url);
    },
    getUrl: () => browser.getUrl(),
    getTitle: () => browser.getTitle(),
    takeScreenshot: () => browser.takeScreenshot(),
    getPageSource: () => browser.getPageSource(),
    deleteSession: async () => {
      await browser.deleteSession();
    },
  };
}

export interface AppiumSelector {
  using: 'id' | 'accessibility id' | 'xpath' | 'css selector' | 'class name';
  value: string;
}

export function toAppiumSelector(locator: Locator): AppiumSelector {
  const { value } = locator;
  switch (locator.strategy) {
    case 'id':
      return { using: 'id', value };
    case 'accessibilityId':
    case 'testId':
      return { using: 'accessibility id', value };
    case 'xpath':
      return { using: 'xpath', value };
    case 'css':
      return { using: 'css selector', value };
    case 'className':
      return { using: 'class name', value };
    case 'text': {
      const literal = xpathString(value);
      return { using: 'xpath', value: `//*[@text=${literal} or @label=${literal} or @name=${literal}]` };
    }
    case 'name':
      return { using: 'xpath', value: `//*[@name=${xpathString(value)}]` };
  }
}

/** Capability names defined by W3C WebDriver; everything else needs a vendor prefix. */
const W3C_CAPABILITIES = new Set([
  'platformName',
  'browserName',
  'browserVersion',
  'acceptInsecureCerts',
  'pageLoadStrategy',
  'proxy',
  'setWindowRect',
  'timeouts',
  'strictFileInteractability',
  'unhandledPromptBehavior',
  'webSocketUrl',
]);

const APP_KEYS = ['appium:app', 'appium:appPackage', 'appium:bundleId', 'browserName'];

const APP_FILE = /\.(apk|aab|ipa|app|zip)$/i;

export function looksLikeAppPath(target: string): boolean {
  return APP_FILE.test(target) || /[\\/]/.test(target) || /^[a-z][a-z0-9+.-]*:\/\//i.test(target);
}

function withVendorPrefix(capabilities: Readonly<Record<string, unknown>>): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(capabilities).map(([key, value]) =>
      W3C_CAPABILITIES.has(key) || key.includes(':') ? [key, value] : [`appium:${key}`, value]
    )
  );
}

/**
 * Desired capabilities for the session. Configured capabilities win; the
 * platform defaults to Android/UiAutomator2, and `target` becomes the app
 * path or the package/bundle id unless an app capability is already set.
 */
export function buildCapabilities(config: Configuration): Record<string, unknown> {
  const given = withVendorPrefix(config.mobile.capabilities);
  const platformName = typeof given.platformName === 'string' ? given.platformName : 'Android';
  const ios = platformName.toLowerCase() === 'ios';

  const derived: Record<string, unknown> = {
    'appium:automationName': ios ? 'XCUITest' : 'UiAutomator2',
    'appium:newCommandTimeout': Math.max(60, Math.ceil(config.timeout)),
  };
  if (!APP_KEYS.some((key) => key in given)) {
    const appKey = looksLikeAppPath(config.target) ? 'appium:app' : ios ? 'appium:bundleId' : 'appium:appPackage';
    derived[appKey] = config.target;
  }

  return { platformName, ...derived, ...given };
}

function isCapabilities(value: object): value is WebdriverIO.Capabilities {
  return 'platformName' in value && typeof value.platformName === 'string';
}

export interface ServerAddress {
  protocol: 'http' | 'https';
  hostname: string;
  port: number;
  path: string;
}

export function parseServerUrl(serverUrl: string): ServerAddress {
  const url = new URL(serverUrl);
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new Error(`Appium server must be an http(s) URL, got "${serverUrl}"`);
  }
  const protocol = url.protocol === 'https:' ? 'https' : 'http';
  return {
    protocol,
    hostname: url.hostname,
    port: url.port ? Number(url.port) : protocol === 'https' ? 443 : 80,
    path: url.pathname || '/',
  };
}

export const DEFAULT_HOLD_MS = 1000;
const TAP_PRESS_MS = 50;
const DOUBLE_TAP_GAP_MS = 100;
const DRAG_PRESS_MS = 500;
const DRAG_MOVE_MS = 600;

function center(rect: ElementRect): { x: number; y: number } {
  return { x: Math.round(rect.x + rect.width / 2), y: Math.round(rect.y + rect.height / 2) };
}

function finger(actions: PointerAction[]): PointerSequence {
  return { type: 'pointer', id: 'finger1', parameters: { pointerType: 'touch' }, actions };
}

export class AppiumDriverHandle implements DriverHandle {
  readonly platform = 'mobile' as const;
  readonly sessionId: string;
  private isReleased = false;
  private readonly elements = new WeakMap<ElementRef, string>();

  constructor(private readonly client: AppiumClient) {
    this.sessionId = client.sessionId;
  }

  get released(): boolean {
    return this.isReleased;
  }

  async findElements(locator: Locator): Promise<ElementRef[]> {
    this.ensureOpen('findElements');
    const { using, value } = toAppiumSelector(locator);
    const ids = await this.client.findElementIds(using, value);
    return ids.map((id, index) => this.mint(locator, index, id));
  }

  async perform(element: ElementRef, action: ElementAction): Promise<void> {
    this.ensureOpen(action.type);
    const id = this.resolve(element);

    switch (action.type) {
      case 'click':
      case 'tap':
        await this.client.click(id);
        return;
      case 'type':
        if (action.clear) await this.client.clear(id);
        await this.client.sendKeys(id, action.text);
        return;
      case 'clear':
        await this.client.clear(id);
        return;
      case 'doubleClick':
      case 'doubleTap': {
        const { x, y } = center(await this.client.rect(id));
        await this.touch([
          { type: 'pointerMove', duration: 0, x, y },
          { type: 'pointerDown', button: 0 },
          { type: 'pause', duration: TAP_PRESS_MS },
          { type: 'pointerUp', button: 0 },
          { type: 'pause', duration: DOUBLE_TAP_GAP_MS },
          { type: 'pointerDown', button: 0 },
          { type: 'pause', duration: TAP_PRESS_MS },
          { type: 'pointerUp', button: 0 },
        ]);
        return;
      }
      case 'clickAndHold': {
        const { x, y } = center(await this.client.rect(id));
        await this.touch([
          { type: 'pointerMove', duration: 0, x, y },
          { type: 'pointerDown', button: 0 },
          { type: 'pause', duration: action.holdMs ?? DEFAULT_HOLD_MS },
          { type: 'pointerUp', button: 0 },
        ]);
        return;
      }
      case 'dragTo': {
        const from = center(await this.client.rect(id));
        const to = center(await this.client.rect(this.resolve(action.target)));
        await this.touch([
          { type: 'pointerMove', duration: 0, x: from.x, y: from.y },
          { type: 'pointerDown', button: 0 },
          { type: 'pause', duration: DRAG_PRESS_MS },
          { type: 'pointerMove', duration: DRAG_MOVE_MS, x: to.x, y: to.y },
          { type: 'pointerUp', button: 0 },
        ]);
        return;
      }
      case 'doubleTapGesture':
        await this.client.execute('mobile: doubleClickGesture', { elementId: id });
        return;
      case 'dragGesture': {
        const end = await this.client.rect(this.resolve(action.target));
        await this.client.execute('mobile: dragGesture', { elementId: id, endX: end.x, endY: end.y });
        return;
      }
      case 'hover':
      case 'contextClick':
        throw new UnsupportedActionError('mobile', action.type);
    }
  }

  /** Opens a URL or deep link in the app under test. */
  async navigate(url: string): Promise<void> {
    this.ensureOpen('navigate');
    await this.client.navigateTo(url);
  }

  async currentUrl(): Promise<string> {
    this.ensureOpen('currentUrl');
    return this.client.getUrl();
  }

  async title(): Promise<string> {
    this.ensureOpen('title');
    return this.client.getTitle();
  }

  async switchToFrame(_frame: Locator | null): Promise<void> {
    this.ensureOpen('switchToFrame');
    throw new UnsupportedActionError('mobile', 'switchToFrame');
  }

  async screenshot(): Promise<Buffer> {
    this.ensureOpen('screenshot');
    return Buffer.from(await this.client.takeScreenshot(), 'base64');
  }

  async pageSource(): Promise<string> {
    this.ensureOpen('pageSource');
    return this.client.getPageSource();
  }

  async release(): Promise<void> {
    if (this.isReleased) return;
    this.isReleased = true;
    await this.client.deleteSession();
  }

  private async touch(actions: PointerAction[]): Promise<void> {
    try {
      await this.client.performActions([finger(actions)]);
    } finally {
      await this.client.releaseActions();
    }
  }

  private ensureOpen(action: string): void {
    if (this.isReleased) throw new DriverDisconnectedError(action, this.sessionId);
  }

  private resolve(element: ElementRef): string {
    const id = this.elements.get(element);
    if (id === undefined) throw new Error('Element reference was not produced by this session');
    return id;
  }

  private mint(locator: Locator, index: number, id: string): ElementRef {
    const ref: ElementRef = {
      locator: { ...locator },
      index,
      isDisplayed: () => this.client.isDisplayed(id),
      isEnabled: () => this.client.isEnabled(id),
      text: () => this.client.text(id),
      attribute: (name) => this.client.attribute(id, name),
    };
    this.elements.set(ref, id);
    return ref;
  }
}

/** Opens an Appium session for `config.target` on `config.mobile.appiumServer`. */
export async function createMobileDriver(config: Configuration, logger: Logger): Promise<DriverHandle> {
  let address: ServerAddress;
  try {
    address = parseServerUrl(config.mobile.appiumServer);
  } catch (err) {
    throw new DriverInitializationError('mobile', errorMessage(err), { cause: err });
  }
  const capabilities = buildCapabilities(config);
  if (!isCapabilities(capabilities)) {
    throw new DriverInitializationError('mobile', 'Capability platformName must be a string');
  }
  logger.debug(`Connecting to Appium at ${config.mobile.appiumServer}`, { capabilities });

  let browser: WebdriverIO.Browser;
  try {
    browser = await remote({ ...address, logLevel: 'warn', capabilities });
  } catch (err) {
    throw new DriverInitializationError(
      'mobile',
      `Failed to open Appium session at ${config.mobile.appiumServer}: ${errorMessage(err)}`,
      { cause: err }
    );
  }

  logger.info(`Appium session ${browser.sessionId} opened for ${config.target}`);
  return new AppiumDriverHandle(wdioClient(browser));
}
