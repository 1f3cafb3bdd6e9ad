#!/usr/bin/env node
import { runCli } from './cli/index.js';
import { logError, logWarn } from './core/logging.js';

process.on('SIGINT', () => {
  logWarn('Interrupted');
  process.exit(1);
});

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logError('Unexpected error:', error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  });
