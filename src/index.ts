#!/usr/bin/env node

// PACKCHECK_* settings may come from a .env file; must load before the logger
import 'dotenv/config';

import { runCli } from './control-plane/cli.js';
import { formatError, printError } from './control-plane/formatter.js';

/**
 * packcheck CLI entry point. Scenario failures set the exit code inside the
 * commands; anything reaching here is unexpected.
 */
async function main(): Promise<void> {
  try {
    await runCli();
  } catch (error) {
    printError(formatError(`Fatal error: ${error instanceof Error ? error.message : String(error)}`));
    process.exitCode = 1;
  }
}

void main();
