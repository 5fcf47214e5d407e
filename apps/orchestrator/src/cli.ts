#!/usr/bin/env node
/**
 * uipom CLI entry
 */

import { config as dotenvConfig } from 'dotenv';
import { runCli } from './program.js';

// Load environment variables (UIPOM_* overrides, credentials)
dotenvConfig();

process.exitCode = await runCli(process.argv.slice(2));
