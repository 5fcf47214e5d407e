/**
 * Driver Factory
 * Picks the engine for the configured platform and normalizes startup failures.
 */

import type { Configuration } from './config.js';
import { DriverInitializationError, errorMessage } from './errors.js';
import type { Logger } from './logger.js';
import type { DriverHandle, Platform } from './schema.js';

/** Starts an automation session. Implemented by the web and mobile runners. */
export type DriverEngine = (config: Configuration, logger: Logger) => Promise<DriverHandle>;

export type DriverEngines = Readonly<Record<Platform, DriverEngine>>;

export async function createDriver(
  config: Configuration,
  engines: DriverEngines,
  logger: Logger
): Promise<DriverHandle> {
  const log = logger.child('driver');
  const engine = engines[config.platform];
  log.info(`Starting ${config.platform} session for ${config.target}`);

  let handle: DriverHandle;
  try {
    handle = await engine(config, log);
  } catch (err) {
    const failure =
      err instanceof DriverInitializationError
        ? err
        : new DriverInitializationError(
            config.platform,
            `Failed to start ${config.platform} session: ${errorMessage(err)}`,
            { cause: err }
          );
    log.error(failure.message);
    throw failure;
  }

  if (handle.platform !== config.platform) {
    await handle.release().catch((err: unknown) => {
      log.warn(`Failed to release mismatched session ${handle.sessionId}: ${errorMessage(err)}`);
    });
    const failure = new DriverInitializationError(
      config.platform,
      `Engine for ${config.platform} returned a ${handle.platform} session`
    );
    log.error(failure.message);
    throw failure;
  }

  log.info(`Session ${handle.sessionId} ready`);
  return handle;
}
