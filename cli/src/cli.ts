/**
 * CLI command setup using Commander.js
 */

import { Command } from 'commander';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';

import { pingCommand } from './commands/ping.js';
import { statusCommand } from './commands/status.js';
import { configCommand } from './commands/config.js';
import { loadConfig } from './utils/config-file.js';

// Get package.json version
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

function readVersion(): string {
  let packageJson: unknown;
  try {
    packageJson = JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf-8'));
  } catch {
    // Built output sits outside the package directory
    return '0.0.0';
  }
  if (
    typeof packageJson === 'object' &&
    packageJson !== null &&
    'version' in packageJson &&
    typeof packageJson.version === 'string'
  ) {
    return packageJson.version;
  }
  return '0.0.0';
}

export type GlobalOptions = {
  json: boolean;
  config?: string;
  quiet?: boolean;
};

export function createCLI(): Command {
  const program = new Command();

  program
    .name('idlestop')
    .description('Report activity to and inspect the idlestop daemon')
    .version(readVersion());

  // Global options
  program
    .option('--json', 'Output as JSON')
    .option('--config <path>', 'Path to config file (default: ~/.idlestop/config.json)')
    .option('-q, --quiet', 'Suppress non-essential output');

  program.addCommand(pingCommand());
  program.addCommand(statusCommand());
  program.addCommand(configCommand());

  return program;
}

type ParsedOptions = Partial<GlobalOptions>;

/**
 * Get global options from the root command
 * Traverses up the command chain to find the root program
 *
 * Without --json, JSON output follows outputFormat in the config file.
 */
export function getGlobalOptions(command: Command): GlobalOptions {
  let root = command;
  while (root.parent) {
    root = root.parent;
  }

  const opts = root.opts<ParsedOptions>();
  return {
    json: opts.json === true || loadConfig(opts.config).outputFormat === 'json',
    config: opts.config,
    quiet: opts.quiet,
  };
}
