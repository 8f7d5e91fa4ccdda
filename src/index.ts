#!/usr/bin/env node
import { runCli } from './cli.js';
import { logError } from './services/logger.js';

process.on('unhandledRejection', (reason) => {
  const error = reason instanceof Error ? reason : new Error(String(reason));
  logError('Unhandled rejection', error);
  process.stderr.write(`Unhandled rejection: ${error.message}\n`);
});

process.exitCode = await runCli(process.argv.slice(2));
