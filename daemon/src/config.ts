/**
 * Daemon configuration
 */

import type { DaemonConfiguration } from '@idlestop/shared';
import {
  ConfigurationError,
  DEFAULT_DAEMON_CONFIG,
  DEFAULT_NATS_CONFIG,
  parseBoolean,
  parseList,
  parseNatsEndpoint,
  parsePort,
  parseShutdownTime,
} from '@idlestop/shared';

/**
 * Load configuration from environment variables
 *
 * Read once at startup. A malformed value throws ConfigurationError, and so
 * does a configuration that leaves the monitor with no way to hear activity.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): DaemonConfiguration {
  const config = structuredClone(DEFAULT_DAEMON_CONFIG);

  config.idle.shutdownTimeMs = parseShutdownTime(env.SHUTDOWN_TIME);
  config.idle.armOnStart = parseBoolean('ARM_ON_START', env.ARM_ON_START, config.idle.armOnStart);

  config.api.enabled = parseBoolean('API_ENABLED', env.API_ENABLED, config.api.enabled);
  config.api.port = parsePort('API_PORT', env.API_PORT, config.api.port);

  if (env.API_HOST) {
    config.api.host = env.API_HOST;
  }

  const tokens = parseList(env.API_TOKENS);
  if (tokens.length > 0) {
    config.api.authTokens = tokens;
  }

  const origins = parseList(env.API_CORS_ORIGINS);
  if (origins.length > 0) {
    config.api.corsOrigins = origins;
  }

  if (env.NATS_URL) {
    parseNatsEndpoint(env.NATS_URL);
    config.nats = {
      ...structuredClone(DEFAULT_NATS_CONFIG),
      url: env.NATS_URL,
      credentials: env.NATS_CREDENTIALS || undefined,
    };
  }

  if (env.IDLESTOP_NAMESPACE) {
    config.namespace = env.IDLESTOP_NAMESPACE;
  }

  if (env.NATS_CREDENTIALS && !config.nats) {
    throw new ConfigurationError('NATS_CREDENTIALS', 'set without NATS_URL');
  }

  if (!config.api.enabled && !config.nats) {
    throw new ConfigurationError(
      'API_ENABLED',
      'no activity source: enable the REST API or set NATS_URL',
    );
  }

  return config;
}
