#!/usr/bin/env node
/**
 * idlestop daemon entry point
 *
 * Halts the process once no activity has been reported for SHUTDOWN_TIME
 * seconds.
 */

import { startService } from './service.js';

// Handle uncaught errors
process.on('uncaughtException', (error) => {
  console.error('Uncaught exception:', error);
  process.exit(1);
});

process.on('unhandledRejection', (reason, promise) => {
  console.error('Unhandled rejection at:', promise, 'reason:', reason);
  process.exit(1);
});

startService().catch((error: unknown) => {
  console.error('Failed to start idlestop daemon:', error);
  process.exit(1);
});
