#!/usr/bin/env node
import { startServer } from './server/index.js';
import { logError } from './core/logging.js';

startServer().catch((error: unknown) => {
  logError('Failed to start server:', error instanceof Error ? error.message : String(error));
  process.exit(1);
});
