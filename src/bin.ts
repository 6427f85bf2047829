#!/usr/bin/env node
import { CommanderError } from 'commander';
import { createProgram, EXIT_CONFIG } from './cli.js';
import { toErrorMessage } from './errors.js';

try {
  await createProgram().parseAsync(process.argv);
} catch (err) {
  if (err instanceof CommanderError) {
    process.exitCode = err.exitCode;
  } else {
    process.stderr.write(`Error: ${toErrorMessage(err)}\n`);
    process.exitCode = EXIT_CONFIG;
  }
}
