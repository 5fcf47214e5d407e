/**
 * Page Object Base
 *
 * Concrete page and screen objects extend this class (or the web/mobile
 * variants) and build their own high-level actions from `find`, `act` and
 * `waitFor`. Every public operation goes through the action wrapper, so a
 * failure is logged with a screenshot before it reaches the test.
 */

import { pollIntervalMs, timeoutMs, type Configuration } from './config.js';
import { runAction, type ActionContext } from './actionWrapper.js';
import { ActionError, AssertionFailedError } from './errors.js';
import { describeLocator, parseLocator } from './locator.js';
import type { Logger } from './logger.js';
import type { DriverHandle, ElementAction, ElementRef, Locator, LocatorInput } from './schema.js';
import { waitUntil, type Condition } from './wait.js';

export interface PageContext {
  driver: DriverHandle;
  logger: Logger;
  config: Configuration;
}

export interface FindOptions {
  timeoutMs?: number;
  /** Require the element to be displayed, not just present. Defaults to true. */
  visible?: boolean;
}

export interface WaitForOptions {
  timeoutMs?: number;
  message?: string;
}

export class BasePage {
  protected readonly driver: DriverHandle;
  protected readonly logger: Logger;
  protected readonly config: Configuration;
  private readonly locators = new Map<string, Locator>();

  constructor(ctx: PageContext) {
    this.driver = ctx.driver;
    this.config = ctx.config;
    this.logger = ctx.logger.child(this.constructor.name);
  }

  get timeoutMs(): number {
    return timeoutMs(this.config);
  }

  /** Parses and caches a locator. Concrete pages usually keep their locators as string constants. */
  protected locator(input: LocatorInput): Locator {
    if (typeof input !== 'string') return parseLocator(input);
    let cached = this.locators.get(input);
    if (!cached) {
      cached = parseLocator(input);
      this.locators.set(input, cached);
    }
    return cached;
  }

  private get actionContext(): ActionContext {
    return { driver: this.driver, logger: this.logger, artifactsDir: this.config.artifactsDir };
  }

  /** Wraps a page-specific action so its failures are reported like the built-in ones. */
  protected step<T>(name: string, fn: () => Promise<T>): Promise<T> {
    return runAction(this.actionContext, name, fn);
  }

  async find(input: LocatorInput, options: FindOptions = {}): Promise<ElementRef> {
    const locator = this.locator(input);
    return this.step(`find(${describeLocator(locator)})`, () => this.locate(locator, options));
  }

  async findAll(input: LocatorInput, options: Omit<FindOptions, 'visible'> = {}): Promise<ElementRef[]> {
    const locator = this.locator(input);
    const action = `findAll(${describeLocator(locator)})`;
    return this.step(action, async () => {
      let found: ElementRef[] = [];
      await waitUntil(
        async () => {
          found = await this.driver.findElements(locator);
          return found.length > 0;
        },
        this.waitOptions(action, `presence of ${describeLocator(locator)}`, options.timeoutMs)
      );
      return found;
    });
  }

  async act(input: LocatorInput, action: ElementAction): Promise<void> {
    const locator = this.locator(input);
    await this.step(`${action.type}(${describeLocator(locator)})`, async () => {
      const element = await this.locate(locator, {});
      await this.driver.perform(element, action);
    });
  }

  /** Resolves true once `condition` holds; raises TimeoutError when the timeout elapses first. */
  async waitFor(condition: Condition, options: WaitForOptions = {}): Promise<boolean> {
    const action = `waitFor(${options.message ?? 'condition'})`;
    return this.step(action, () => waitUntil(condition, this.waitOptions(action, options.message, options.timeoutMs)));
  }

  /** Immediate check, no waiting and no failure reporting. */
  async isPresent(input: LocatorInput): Promise<boolean> {
    const found = await this.driver.findElements(this.locator(input));
    return found.length > 0;
  }

  async textOf(input: LocatorInput): Promise<string> {
    const locator = this.locator(input);
    return this.step(`textOf(${describeLocator(locator)})`, async () => {
      const element = await this.locate(locator, {});
      return element.text();
    });
  }

  async assertVisible(input: LocatorInput, options: Pick<FindOptions, 'timeoutMs'> = {}): Promise<void> {
    const locator = this.locator(input);
    const action = `assertVisible(${describeLocator(locator)})`;
    await this.step(action, async () => {
      try {
        await this.locate(locator, { timeoutMs: options.timeoutMs });
      } catch (err) {
        if (err instanceof ActionError && err.kind === 'timeout') {
          throw new AssertionFailedError(action, `Expected ${describeLocator(locator)} to be visible`, {
            expected: 'visible',
            actual: 'not visible',
            cause: err,
          });
        }
        throw err;
      }
    });
  }

  async assertText(input: LocatorInput, expected: string | RegExp): Promise<void> {
    const locator = this.locator(input);
    const action = `assertText(${describeLocator(locator)})`;
    await this.step(action, async () => {
      const element = await this.locate(locator, {});
      const actual = (await element.text()).trim();
      const matches = typeof expected === 'string' ? actual === expected : expected.test(actual);
      if (!matches) {
        throw new AssertionFailedError(action, `Expected text ${String(expected)} but found "${actual}"`, {
          expected: String(expected),
          actual,
        });
      }
    });
  }

  /** Unwrapped lookup shared by the public operations. */
  protected async locate(locator: Locator, options: FindOptions): Promise<ElementRef> {
    const visible = options.visible ?? true;
    const described = describeLocator(locator);
    const found: { match?: ElementRef } = {};
    await waitUntil(
      async () => {
        const candidates = await this.driver.findElements(locator);
        if (!visible) {
          found.match = candidates[0];
          return found.match !== undefined;
        }
        for (const candidate of candidates) {
          if (await candidate.isDisplayed()) {
            found.match = candidate;
            return true;
          }
        }
        return false;
      },
      this.waitOptions(`find(${described})`, `${visible ? 'visibility' : 'presence'} of ${described}`, options.timeoutMs)
    );
    if (!found.match) {
      throw new ActionError('locator-not-found', `find(${described})`, `No element matched ${described}`);
    }
    return found.match;
  }

  private waitOptions(action: string, message: string | undefined, override?: number) {
    return {
      timeoutMs: override ?? this.timeoutMs,
      intervalMs: pollIntervalMs(this.config),
      message,
      action,
    };
  }
}
