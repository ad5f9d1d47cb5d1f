/**
 * Configuration file management
 * Stores user preferences in ~/.idlestop/config.json
 */

import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'fs';
import { homedir } from 'os';
import { dirname, join } from 'path';
import type { CLIConfiguration } from '@idlestop/shared';
import { ConfigurationError, DEFAULT_CLI_CONFIG } from '@idlestop/shared';

const CONFIG_DIR = join(homedir(), '.idlestop');
const CONFIG_FILE = join(CONFIG_DIR, 'config.json');

export const CONFIG_KEYS = [
  'apiUrl',
  'apiToken',
  'natsUrl',
  'namespace',
  'outputFormat',
] as const satisfies readonly (keyof CLIConfiguration)[];

export type ConfigKey = (typeof CONFIG_KEYS)[number];

export function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some((k) => k === key);
}

function stringField(source: Record<string, unknown>, key: string): string | undefined {
  const value = source[key];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Read the config file, keeping only recognised string fields
 */
function readConfigFile(filePath: string): Partial<CLIConfiguration> {
  if (!existsSync(filePath)) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    console.warn(`Warning: Failed to parse config file: ${error}`);
    return {};
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    console.warn(`Warning: Ignoring config file ${filePath}: expected a JSON object`);
    return {};
  }

  const raw = Object.fromEntries(Object.entries(parsed));
  const outputFormat = stringField(raw, 'outputFormat');

  return {
    apiUrl: stringField(raw, 'apiUrl'),
    apiToken: stringField(raw, 'apiToken'),
    natsUrl: stringField(raw, 'natsUrl'),
    namespace: stringField(raw, 'namespace'),
    outputFormat: outputFormat === 'table' || outputFormat === 'json' ? outputFormat : undefined,
  };
}

/**
 * Load configuration from file and environment variables
 * Environment variables take precedence over file config
 */
export function loadConfig(
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env,
): CLIConfiguration {
  const fileConfig = readConfigFile(configPath || CONFIG_FILE);

  return {
    apiUrl: env.IDLESTOP_API_URL || fileConfig.apiUrl || DEFAULT_CLI_CONFIG.apiUrl,
    apiToken: env.IDLESTOP_API_TOKEN || fileConfig.apiToken,
    natsUrl: env.NATS_URL || fileConfig.natsUrl || DEFAULT_CLI_CONFIG.natsUrl,
    namespace: env.IDLESTOP_NAMESPACE || fileConfig.namespace || DEFAULT_CLI_CONFIG.namespace,
    outputFormat: fileConfig.outputFormat || DEFAULT_CLI_CONFIG.outputFormat,
  };
}

/**
 * Save configuration to file, merged over what is already there
 */
export function saveConfig(config: Partial<CLIConfiguration>, configPath?: string): void {
  const filePath = configPath || CONFIG_FILE;
  const dir = dirname(filePath);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  const mergedConfig = {
    ...readConfigFile(filePath),
    ...config,
  };

  writeFileSync(filePath, JSON.stringify(mergedConfig, null, 2), 'utf-8');
}

/**
 * Turn a raw `config set` value into a typed partial config
 */
export function parseConfigValue(key: ConfigKey, value: string): Partial<CLIConfiguration> {
  switch (key) {
    case 'outputFormat':
      if (value !== 'table' && value !== 'json') {
        throw new ConfigurationError(key, 'must be either "table" or "json"');
      }
      return { outputFormat: value };
    case 'apiUrl':
      return { apiUrl: value };
    case 'apiToken':
      return { apiToken: value };
    case 'natsUrl':
      return { natsUrl: value };
    case 'namespace':
      return { namespace: value };
  }
}

/**
 * Set a specific config value
 */
export function setConfigValue(key: ConfigKey, value: string, configPath?: string): void {
  const update = parseConfigValue(key, value);
  const errors = validateConfig(update);
  if (errors.length > 0) {
    throw new ConfigurationError(key, errors.join('; '));
  }
  saveConfig(update, configPath);
}

/**
 * Validate configuration
 */
export function validateConfig(config: Partial<CLIConfiguration>): string[] {
  const errors: string[] = [];

  if (config.apiUrl && !/^https?:\/\//.test(config.apiUrl)) {
    errors.push('apiUrl must start with http:// or https://');
  }

  if (config.natsUrl && !/^(nats|tls|ws|wss):\/\//.test(config.natsUrl)) {
    errors.push('natsUrl must start with nats://, tls://, ws:// or wss://');
  }

  if (config.namespace !== undefined && !/^[A-Za-z0-9_-]+$/.test(config.namespace)) {
    errors.push('namespace may only contain letters, digits, "-" and "_"');
  }

  return errors;
}

/**
 * Get default config file path
 */
export function getDefaultConfigPath(): string {
  return CONFIG_FILE;
}
