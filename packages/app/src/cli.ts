#!/usr/bin/env node

/**
 * CLI entry point for the bullion command
 *
 * Loads .env, attaches process-level handlers once the logger exists and
 * hands argv to the commander program.
 */

// Load environment variables from .env file
import 'dotenv/config';

import { attachGlobalHandlers } from '@bullion/logger';
import { describeError } from '@bullion/contracts';
import { createProgram, createRuntime } from './program.js';

const program = createProgram({
  createRuntime: (options) => {
    const runtime = createRuntime(options);
    attachGlobalHandlers(runtime.logger);
    return runtime;
  },
});

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(`Fatal error: ${describeError(error)}`);
  process.exit(1);
});
