#!/usr/bin/env node

/**
 * CLI tool for the idlestop daemon
 * Entry point for the idlestop command
 */

import { createCLI } from './cli.js';

async function main() {
  const cli = createCLI();
  await cli.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
