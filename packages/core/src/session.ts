/**
 * Test session
 * Scoped ownership of one DriverHandle for the lifetime of a single test.
 */

import { runAction, type ActionContext } from './actionWrapper.js';
import type { BasePage, PageContext } from './basePage.js';
import type { Configuration } from './config.js';
import { createDriver, type DriverEngines } from './driverFactory.js';
import { errorMessage } from './errors.js';
import type { Logger } from './logger.js';
import type { DriverHandle } from './schema.js';

export interface SessionOptions {
  config: Configuration;
  engines: DriverEngines;
  logger: Logger;
}

export type PageClass<P extends BasePage> = new (ctx: PageContext) => P;

export class TestSession {
  private closed = false;

  private constructor(
    readonly driver: DriverHandle,
    readonly config: Configuration,
    readonly logger: Logger
  ) {}

  static async open(options: SessionOptions): Promise<TestSession> {
    const driver = await createDriver(options.config, options.engines, options.logger);
    return new TestSession(driver, options.config, options.logger.child(`session:${driver.sessionId}`));
  }

  get isClosed(): boolean {
    return this.closed;
  }

  page<P extends BasePage>(Page: PageClass<P>): P {
    return new Page({ driver: this.driver, logger: this.logger, config: this.config });
  }

  run<T>(action: string, fn: (driver: DriverHandle) => Promise<T>): Promise<T> {
    const ctx: ActionContext = { driver: this.driver, logger: this.logger, artifactsDir: this.config.artifactsDir };
    return runAction(ctx, action, () => fn(this.driver));
  }

  /** Releases the driver. Safe to call more than once; teardown errors propagate. */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.logger.info(`Tearing down session ${this.driver.sessionId}`);
    try {
      await this.driver.release();
    } catch (err) {
      this.logger.error(`Session teardown failed: ${errorMessage(err)}`);
      throw err;
    }
    this.logger.info(`Session ${this.driver.sessionId} released`);
  }
}

/**
 * Opens a session, runs `body`, and always releases the session afterwards.
 * A failure from `body` takes precedence over a teardown failure, which is
 * then only logged.
 */
export async function withSession<T>(options: SessionOptions, body: (session: TestSession) => Promise<T>): Promise<T> {
  const session = await TestSession.open(options);
  let result: T;
  try {
    result = await body(session);
  } catch (err) {
    await session.close().catch((closeErr: unknown) => {
      session.logger.warn(`Ignoring teardown failure after test error: ${errorMessage(closeErr)}`);
    });
    throw err;
  }
  await session.close();
  return result;
}
