/**
 * In-process DriverHandle for unit-testing page objects without a browser or device.
 */

import { DriverDisconnectedError, UnsupportedActionError } from '../errors.js';
import { describeLocator } from '../locator.js';
import type { DriverHandle, ElementAction, ElementRef, Locator, Platform } from '../schema.js';

export interface FakeElementState {
  displayed?: boolean;
  enabled?: boolean;
  text?: string;
  attributes?: Record<string, string>;
}

export interface PerformedAction {
  locator: string;
  index: number;
  action: ElementAction;
}

export interface FakeDriverOptions {
  platform?: Platform;
  sessionId?: string;
  url?: string;
  title?: string;
  pageSource?: string;
  screenshot?: Buffer;
  /** Action types this fake rejects with an unsupported-action error. */
  unsupported?: ElementAction['type'][];
}

export interface FakeElement extends ElementRef {
  state: FakeElementState;
}

export class FakeDriver implements DriverHandle {
  readonly platform: Platform;
  readonly sessionId: string;
  readonly performed: PerformedAction[] = [];
  readonly navigations: string[] = [];
  readonly frames: Array<string | null> = [];
  /** Number of findElements calls, per locator description. */
  readonly lookups = new Map<string, number>();
  releaseCount = 0;
  screenshotError: Error | null = null;
  pageSourceError: Error | null = null;
  releaseError: Error | null = null;
  /** Error thrown by the next `perform` call, then cleared. */
  performError: Error | null = null;

  private isReleased = false;
  private url: string;
  private pageTitle: string;
  private source: string;
  private png: Buffer;
  private readonly unsupported: Set<string>;
  private readonly elements = new Map<string, FakeElement[]>();
  private readonly minted = new WeakSet<ElementRef>();

  constructor(options: FakeDriverOptions = {}) {
    this.platform = options.platform ?? 'web';
    this.sessionId = options.sessionId ?? 'fake-session';
    this.url = options.url ?? 'about:blank';
    this.pageTitle = options.title ?? '';
    this.source = options.pageSource ?? '<html><body></body></html>';
    this.png = options.screenshot ?? Buffer.from('fake-png');
    this.unsupported = new Set(options.unsupported ?? []);
  }

  get released(): boolean {
    return this.isReleased;
  }

  /** Adds (or replaces) the elements a locator resolves to. */
  setElements(locator: string | Locator, states: FakeElementState[]): FakeElement[] {
    const key = typeof locator === 'string' ? locator : describeLocator(locator);
    const elements = states.map((state, index) => this.mint(key, index, state));
    this.elements.set(key, elements);
    return elements;
  }

  removeElements(locator: string | Locator): void {
    this.elements.delete(typeof locator === 'string' ? locator : describeLocator(locator));
  }

  async findElements(locator: Locator): Promise<ElementRef[]> {
    this.ensureOpen('findElements');
    const key = describeLocator(locator);
    this.lookups.set(key, (this.lookups.get(key) ?? 0) + 1);
    return [...(this.elements.get(key) ?? [])];
  }

  async perform(element: ElementRef, action: ElementAction): Promise<void> {
    this.ensureOpen(action.type);
    if (!this.minted.has(element)) {
      throw new Error('Element reference was not produced by this session');
    }
    if (this.unsupported.has(action.type)) {
      throw new UnsupportedActionError(this.platform, action.type);
    }
    if (this.performError) {
      const err = this.performError;
      this.performError = null;
      throw err;
    }
    this.performed.push({ locator: describeLocator(element.locator), index: element.index, action });
  }

  async navigate(url: string): Promise<void> {
    this.ensureOpen('navigate');
    this.navigations.push(url);
    this.url = url;
  }

  async currentUrl(): Promise<string> {
    this.ensureOpen('currentUrl');
    return this.url;
  }

  async title(): Promise<string> {
    this.ensureOpen('title');
    return this.pageTitle;
  }

  setTitle(title: string): void {
    this.pageTitle = title;
  }

  async switchToFrame(frame: Locator | null): Promise<void> {
    this.ensureOpen('switchToFrame');
    this.frames.push(frame ? describeLocator(frame) : null);
  }

  async screenshot(): Promise<Buffer> {
    this.ensureOpen('screenshot');
    if (this.screenshotError) throw this.screenshotError;
    return this.png;
  }

  async pageSource(): Promise<string> {
    this.ensureOpen('pageSource');
    if (this.pageSourceError) throw this.pageSourceError;
    return this.source;
  }

  async release(): Promise<void> {
    this.releaseCount++;
    this.isReleased = true;
    if (this.releaseError) throw this.releaseError;
  }

  private ensureOpen(action: string): void {
    if (this.isReleased) throw new DriverDisconnectedError(action, this.sessionId);
  }

  private mint(key: string, index: number, state: FakeElementState): FakeElement {
    const locator: Locator = { strategy: 'css', value: key };
    const element: FakeElement = {
      locator,
      index,
      state,
      isDisplayed: async () => state.displayed ?? true,
      isEnabled: async () => state.enabled ?? true,
      text: async () => state.text ?? '',
      attribute: async (name: string) => state.attributes?.[name] ?? null,
    };
    this.minted.add(element);
    return element;
  }
}
