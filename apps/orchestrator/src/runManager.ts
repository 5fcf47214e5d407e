/**
 * Run Manager
 * Smoke check of a configuration: open a session, read from it, capture a
 * screenshot, tear down. Failures become failed steps in the RunResult.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { v4 as uuid } from 'uuid';
import {
  ActionError,
  DriverInitializationError,
  TestSession,
  errorMessage,
  type Configuration,
  type DriverEngines,
  type Logger,
  type RunResult,
  type StepResult,
} from '@uipom/core';

export interface SmokeOptions {
  engines: DriverEngines;
  logger: Logger;
  runId?: string;
  scenario?: string;
}

type StepError = NonNullable<StepResult['error']>;
type StepEvidence = NonNullable<StepResult['evidence']>;

function toStepError(err: unknown): StepError {
  if (err instanceof ActionError) return { kind: err.kind, message: err.message };
  if (err instanceof DriverInitializationError) return { kind: 'driver-initialization', message: err.message };
  return { kind: 'action-failed', message: errorMessage(err) };
}

function failureEvidence(err: unknown): StepEvidence | undefined {
  if (!(err instanceof ActionError) || !err.attachment) return undefined;
  return err.attachment.endsWith('.png') ? { screenshotPath: err.attachment } : { pageSourcePath: err.attachment };
}

/** Runs `fn` as one step, appending its StepResult. Resolves undefined when the step failed. */
async function recordStep<T>(
  steps: StepResult[],
  stepId: string,
  action: string,
  fn: () => Promise<T>,
  evidence?: (value: T) => StepEvidence
): Promise<{ value: T } | undefined> {
  const startedAt = new Date().toISOString();
  try {
    const value = await fn();
    steps.push({
      stepId,
      action,
      ok: true,
      startedAt,
      finishedAt: new Date().toISOString(),
      ...(evidence ? { evidence: evidence(value) } : {}),
    });
    return { value };
  } catch (err) {
    const proof = failureEvidence(err);
    steps.push({
      stepId,
      action,
      ok: false,
      startedAt,
      finishedAt: new Date().toISOString(),
      error: toStepError(err),
      ...(proof ? { evidence: proof } : {}),
    });
    return undefined;
  }
}

export async function runSmoke(config: Configuration, options: SmokeOptions): Promise<RunResult> {
  const runId = options.runId ?? uuid();
  const scenario = options.scenario ?? 'smoke';
  const log = options.logger.child('smoke');
  const startedAt = new Date().toISOString();
  const steps: StepResult[] = [];

  log.info(`Run ${runId}: ${scenario} on ${config.platform} for ${config.target}`);

  const opened = await recordStep(steps, 'open-session', `open ${config.platform} session`, () =>
    TestSession.open({ config, engines: options.engines, logger: options.logger })
  );

  if (opened) {
    const session = opened.value;
    const read =
      config.platform === 'web'
        ? await recordStep(steps, 'read-title', 'read-title', async () => {
            const title = await session.run('read-title', (driver) => driver.title());
            log.info(`Page title: "${title}"`);
          })
        : await recordStep(steps, 'read-source', 'read-source', async () => {
            const source = await session.run('read-source', (driver) => driver.pageSource());
            log.info(`Page source: ${source.length} characters`);
          });

    if (read) {
      await recordStep(
        steps,
        'screenshot',
        'screenshot',
        () =>
          session.run('screenshot', async (driver) => {
            const dir = resolve(config.artifactsDir);
            await mkdir(dir, { recursive: true });
            const path = join(dir, `${runId}_${scenario}.png`);
            await writeFile(path, await driver.screenshot());
            return path;
          }),
        (screenshotPath) => ({ screenshotPath })
      );
    }

    // Only reported when teardown itself fails
    const teardown: StepResult[] = [];
    await recordStep(teardown, 'close-session', 'close session', () => session.close());
    steps.push(...teardown.filter((step) => !step.ok));
  }

  const passed = steps.filter((s) => s.ok).length;
  const failed = steps.length - passed;
  const result: RunResult = {
    runId,
    platform: config.platform,
    scenario,
    target: config.target,
    startedAt,
    finishedAt: new Date().toISOString(),
    ok: failed === 0,
    steps,
    summary: { total: steps.length, passed, failed },
  };

  if (result.ok) log.info(`Run ${runId} passed (${passed}/${steps.length} steps)`);
  else log.error(`Run ${runId} failed (${failed} of ${steps.length} steps failed)`);
  return result;
}
