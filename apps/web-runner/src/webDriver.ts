/**
 * Web Driver
 * Playwright implementation of the DriverHandle contract
 */

import { chromium, firefox, type Browser, type LaunchOptions } from 'playwright';
import { v4 as uuid } from 'uuid';
import {
  DriverDisconnectedError,
  DriverInitializationError,
  UnsupportedActionError,
  cssString,
  errorMessage,
  timeoutMs,
  type BrowserName,
  type Configuration,
  type DriverHandle,
  type ElementAction,
  type ElementRef,
  type Locator,
  type Logger,
} from '@uipom/core';

/** The slice of Playwright's Locator this driver uses. */
export interface PlaywrightLocator {
  count(): Promise<number>;
  nth(index: number): PlaywrightLocator;
  isVisible(): Promise<boolean>;
  isEnabled(): Promise<boolean>;
  innerText(): Promise<string>;
  getAttribute(name: string): Promise<string | null>;
  click(options?: { button?: 'left' | 'right' | 'middle' }): Promise<void>;
  dblclick(): Promise<void>;
  fill(value: string): Promise<void>;
  pressSequentially(text: string): Promise<void>;
  clear(): Promise<void>;
  hover(): Promise<void>;
  dragTo(target: PlaywrightLocator): Promise<void>;
}

/** A page or a frame inside it. */
export interface PlaywrightScope {
  locator(selector: string): PlaywrightLocator;
  frameLocator(selector: string): PlaywrightScope;
}

export interface PlaywrightPage extends PlaywrightScope {
  goto(url: string): Promise<unknown>;
  url(): string;
  title(): Promise<string>;
  content(): Promise<string>;
  screenshot(): Promise<Buffer>;
  waitForTimeout(ms: number): Promise<void>;
  readonly mouse: {
    down(): Promise<void>;
    up(): Promise<void>;
  };
}

export const DEFAULT_HOLD_MS = 1000;
const DEFAULT_VIEWPORT = { width: 1280, height: 720 };

export function toPlaywrightSelector(locator: Locator): string {
  const { value } = locator;
  switch (locator.strategy) {
    case 'css':
      return `css=${value}`;
    case 'xpath':
      return `xpath=${value}`;
    case 'id':
      return `[id=${cssString(value)}]`;
    case 'name':
      return `[name=${cssString(value)}]`;
    case 'text':
      return `text=${value}`;
    case 'testId':
      return `[data-testid=${cssString(value)}]`;
    case 'accessibilityId':
      return `[aria-label=${cssString(value)}]`;
    case 'className':
      return `[class~=${cssString(value)}]`;
  }
}

export interface LaunchPlan {
  engine: 'chromium' | 'firefox';
  options: LaunchOptions;
}

export function launchPlan(browser: BrowserName, headless: boolean): LaunchPlan {
  switch (browser) {
    case 'chrome':
      return { engine: 'chromium', options: { headless } };
    case 'edge':
      return { engine: 'chromium', options: { headless, channel: 'msedge' } };
    case 'firefox':
      return { engine: 'firefox', options: { headless } };
  }
}

export class PlaywrightDriverHandle implements DriverHandle {
  readonly platform = 'web' as const;
  private isReleased = false;
  private scope: PlaywrightScope;
  private readonly elements = new WeakMap<ElementRef, PlaywrightLocator>();

  constructor(
    private readonly page: PlaywrightPage,
    private readonly closeSession: () => Promise<void>,
    readonly sessionId: string = uuid()
  ) {
    this.scope = page;
  }

  get released(): boolean {
    return this.isReleased;
  }

  async findElements(locator: Locator): Promise<ElementRef[]> {
    this.ensureOpen('findElements');
    const matches = this.scope.locator(toPlaywrightSelector(locator));
    const count = await matches.count();
    return Array.from({ length: count }, (_, index) => this.mint(locator, index, matches.nth(index)));
  }

  async perform(element: ElementRef, action: ElementAction): Promise<void> {
    this.ensureOpen(action.type);
    const target = this.resolve(element);

    switch (action.type) {
      case 'click':
      case 'tap':
        await target.click();
        return;
      case 'type':
        // Without `clear` the text is appended, like typing into the field
        if (action.clear) await target.fill(action.text);
        else await target.pressSequentially(action.text);
        return;
      case 'clear':
        await target.clear();
        return;
      case 'doubleClick':
      case 'doubleTap':
        await target.dblclick();
        return;
      case 'contextClick':
        await target.click({ button: 'right' });
        return;
      case 'hover':
        await target.hover();
        return;
      case 'clickAndHold':
        await target.hover();
        await this.page.mouse.down();
        try {
          await this.page.waitForTimeout(action.holdMs ?? DEFAULT_HOLD_MS);
        } finally {
          await this.page.mouse.up();
        }
        return;
      case 'dragTo':
        await target.dragTo(this.resolve(action.target));
        return;
      case 'doubleTapGesture':
      case 'dragGesture':
        throw new UnsupportedActionError('web', action.type);
    }
  }

  async navigate(url: string): Promise<void> {
    this.ensureOpen('navigate');
    await this.page.goto(url);
  }

  async currentUrl(): Promise<string> {
    this.ensureOpen('currentUrl');
    return this.page.url();
  }

  async title(): Promise<string> {
    this.ensureOpen('title');
    return this.page.title();
  }

  /** Frames nest: each call descends from the frame selected before it. */
  async switchToFrame(frame: Locator | null): Promise<void> {
    this.ensureOpen('switchToFrame');
    this.scope = frame ? this.scope.frameLocator(toPlaywrightSelector(frame)) : this.page;
  }

  async screenshot(): Promise<Buffer> {
    this.ensureOpen('screenshot');
    return this.page.screenshot();
  }

  async pageSource(): Promise<string> {
    this.ensureOpen('pageSource');
    return this.page.content();
  }

  async release(): Promise<void> {
    if (this.isReleased) return;
    this.isReleased = true;
    await this.closeSession();
  }

  private ensureOpen(action: string): void {
    if (this.isReleased) throw new DriverDisconnectedError(action, this.sessionId);
  }

  private resolve(element: ElementRef): PlaywrightLocator {
    const target = this.elements.get(element);
    if (!target) throw new Error('Element reference was not produced by this session');
    return target;
  }

  private mint(locator: Locator, index: number, target: PlaywrightLocator): ElementRef {
    const ref: ElementRef = {
      locator: { ...locator },
      index,
      isDisplayed: () => target.isVisible(),
      isEnabled: () => target.isEnabled(),
      text: () => target.innerText(),
      attribute: (name) => target.getAttribute(name),
    };
    this.elements.set(ref, target);
    return ref;
  }
}

/**
 * Launches the configured browser, opens a fresh context and navigates to
 * `config.target`. Anything opened before a failure is closed again.
 */
export async function createWebDriver(config: Configuration, logger: Logger): Promise<DriverHandle> {
  const { browser: name, headless, viewport } = config.web;
  const plan = launchPlan(name, headless);
  logger.debug(`Launching ${name} via ${plan.engine}${plan.options.channel ? ` (${plan.options.channel})` : ''}`);

  let browser: Browser | null = null;
  try {
    browser = await (plan.engine === 'firefox' ? firefox : chromium).launch(plan.options);
    const context = await browser.newContext({ viewport: viewport ?? DEFAULT_VIEWPORT });
    const page = await context.newPage();
    page.setDefaultTimeout(timeoutMs(config));
    await page.goto(config.target);

    const opened = browser;
    const handle = new PlaywrightDriverHandle(page, () => opened.close());
    logger.info(`Opened ${config.target} in ${name} (${opened.version()})`);
    return handle;
  } catch (err) {
    if (browser) {
      await browser.close().catch((closeErr: unknown) => {
        logger.warn(`Failed to close ${name} after startup error: ${errorMessage(closeErr)}`);
      });
    }
    throw new DriverInitializationError('web', `Failed to start ${name}: ${errorMessage(err)}`, { cause: err });
  }
}
