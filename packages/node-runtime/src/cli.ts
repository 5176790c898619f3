#!/usr/bin/env node
// packages/node-runtime/src/cli.ts
import { CommanderError } from 'commander';
import { stdin, stdout, stderr, exit as processExit } from 'node:process';
import { createProgram, formatError } from './program.js';

process.on('uncaughtException', err => {
  stderr.write(formatError(err) + '\n');
  processExit(1);
});

process.on('unhandledRejection', (err: unknown) => {
  stderr.write(formatError(err) + '\n');
  processExit(1);
});

try {
  await createProgram({ stdin, stdout, stderr }).parseAsync(process.argv);
} catch (err) {
  // commander already printed help/version/usage problems
  if (err instanceof CommanderError) processExit(err.exitCode);
  stderr.write(formatError(err) + '\n');
  processExit(1);
}
