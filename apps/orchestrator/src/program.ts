/**
 * CLI program
 * `validate` checks a configuration file, `smoke` opens a session against it
 * and writes run.json and junit.xml.
 */

import { Command, CommanderError } from 'commander';
import {
  ConfigurationError,
  errorMessage,
  initLogging,
  loadConfigFile,
  redactConfig,
  shutdownLogging,
  type Configuration,
  type DriverEngines,
  type EnvOverrides,
  type LogSink,
} from '@uipom/core';
import { defaultEngines } from './engines.js';
import { writeReport } from './reportWriter.js';
import { runSmoke } from './runManager.js';

export interface CliIO {
  engines: DriverEngines;
  env: EnvOverrides;
  print: (line: string) => void;
  printError: (line: string) => void;
  /** Log to the console as well as the configured log file. */
  console: boolean;
  extraSinks: LogSink[];
}

const defaultIO: CliIO = {
  engines: defaultEngines,
  env: process.env,
  print: (line) => console.log(line),
  printError: (line) => console.error(line),
  console: true,
  extraSinks: [],
};

/** Parses `argv` (without the node and script entries) and resolves the exit code. */
export async function runCli(argv: string[], overrides: Partial<CliIO> = {}): Promise<number> {
  const io: CliIO = { ...defaultIO, ...overrides };
  let exitCode = 0;

  const program = new Command();
  program
    .name('uipom')
    .description('Page Object Model runner for web (Playwright) and mobile (Appium)')
    .version('0.1.0')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.print(text.trimEnd()),
      writeErr: (text) => io.printError(text.trimEnd()),
    });

  program
    .command('validate')
    .description('Validate a configuration file and print it with credentials masked')
    .argument('<config>', 'Path to the JSON configuration file')
    .action((configPath: string) => {
      try {
        const config = loadConfigFile(configPath, io.env);
        io.print(JSON.stringify(redactConfig(config), null, 2));
      } catch (err) {
        exitCode = reportFailure(io, err);
      }
    });

  program
    .command('smoke')
    .description('Open a session for the configured target, capture a screenshot and tear down')
    .argument('<config>', 'Path to the JSON configuration file')
    .option('-o, --out <dir>', 'Output directory for run.json and junit.xml', './reports')
    .option('-s, --scenario <name>', 'Scenario name recorded in the reports', 'smoke')
    .action(async (configPath: string, options: { out: string; scenario: string }) => {
      let config: Configuration;
      try {
        config = loadConfigFile(configPath, io.env);
      } catch (err) {
        exitCode = reportFailure(io, err);
        return;
      }

      const logger = await initLogging({
        level: config.logLevel,
        file: config.logFile,
        console: io.console,
        extraSinks: io.extraSinks,
      });
      try {
        io.print(`🚀 Smoke run on ${config.platform}: ${config.target}`);
        const result = await runSmoke(config, { engines: io.engines, logger, scenario: options.scenario });
        const paths = await writeReport([result], options.out);

        for (const step of result.steps) {
          const detail = step.error ? ` [${step.error.kind}] ${step.error.message}` : '';
          io.print(`   ${step.ok ? '✅' : '❌'} ${step.stepId}${detail}`);
        }
        io.print(`📊 ${result.summary.passed}/${result.summary.total} steps passed`);
        io.print(`📁 Reports: ${paths.json}, ${paths.junit}`);
        exitCode = result.ok ? 0 : 1;
      } finally {
        await shutdownLogging();
      }
    });

  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;
    return reportFailure(io, err);
  }
  return exitCode;
}

function reportFailure(io: CliIO, err: unknown): number {
  const prefix = err instanceof ConfigurationError ? 'Configuration error' : 'Error';
  io.printError(`❌ ${prefix}: ${errorMessage(err)}`);
  return 1;
}
