/**
 * Config command - Manage CLI configuration
 */

import { Command } from 'commander';
import {
  CONFIG_KEYS,
  isConfigKey,
  loadConfig,
  setConfigValue,
  getDefaultConfigPath,
} from '../utils/config-file.js';
import { output, success, error, errorMessage, formatKeyValue } from '../utils/output.js';
import { getGlobalOptions } from '../cli.js';

export function configCommand(): Command {
  const cmd = new Command('config');

  cmd
    .description('Manage CLI configuration')
    .addCommand(configSetCommand())
    .addCommand(configGetCommand())
    .addCommand(configListCommand())
    .addCommand(configPathCommand());

  return cmd;
}

function configSetCommand(): Command {
  const cmd = new Command('set');

  cmd
    .description('Set a configuration value')
    .argument('<key>', 'Configuration key')
    .argument('<value>', 'Configuration value')
    .action((key: string, value: string, _options: unknown, command: Command) => {
      const globalOpts = getGlobalOptions(command);

      if (!isConfigKey(key)) {
        error(`Invalid config key: ${key}`, globalOpts);
        error(`Valid keys: ${CONFIG_KEYS.join(', ')}`, globalOpts);
        process.exit(1);
      }

      try {
        setConfigValue(key, value, globalOpts.config);
        success(`Set ${key} = ${key === 'apiToken' ? '********' : value}`, globalOpts);
      } catch (err) {
        error(`Failed to set config: ${errorMessage(err)}`, globalOpts);
        process.exit(1);
      }
    });

  return cmd;
}

function configGetCommand(): Command {
  const cmd = new Command('get');

  cmd
    .description('Get a configuration value')
    .argument('<key>', 'Configuration key')
    .action((key: string, _options: unknown, command: Command) => {
      const globalOpts = getGlobalOptions(command);

      if (!isConfigKey(key)) {
        error(`Unknown config key: ${key}`, globalOpts);
        process.exit(1);
      }

      const value = loadConfig(globalOpts.config)[key];

      if (globalOpts.json) {
        output({ [key]: value ?? null }, globalOpts);
      } else {
        output(value !== undefined ? value : '(not set)', globalOpts);
      }
    });

  return cmd;
}

function configListCommand(): Command {
  const cmd = new Command('list');

  cmd
    .description('List all configuration values')
    .alias('ls')
    .action((_options: unknown, command: Command) => {
      const globalOpts = getGlobalOptions(command);
      const config = loadConfig(globalOpts.config);

      if (globalOpts.json) {
        output(config, globalOpts);
        return;
      }

      const displayConfig: Record<string, string> = {};
      for (const key of CONFIG_KEYS) {
        const value = config[key];
        displayConfig[key] = value === undefined ? '(not set)' : key === 'apiToken' ? '********' : value;
      }

      if (!globalOpts.quiet) {
        console.log('Current configuration:');
        console.log(formatKeyValue(displayConfig));
      }
    });

  return cmd;
}

function configPathCommand(): Command {
  const cmd = new Command('path');

  cmd
    .description('Show the configuration file path')
    .action((_options: unknown, command: Command) => {
      const globalOpts = getGlobalOptions(command);
      const path = globalOpts.config || getDefaultConfigPath();

      if (globalOpts.json) {
        output({ configPath: path }, globalOpts);
      } else {
        output(path, globalOpts);
      }
    });

  return cmd;
}
