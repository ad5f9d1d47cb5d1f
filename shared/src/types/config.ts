/**
 * NATS connection configuration
 */
export interface NATSConfiguration {
  /** NATS server URL */
  url: string;

  /** Path to credentials file */
  credentials?: string;

  /** Connection name */
  name?: string;

  /** Reconnect options */
  reconnect?: {
    maxAttempts: number;
    delayMs: number;
  };
}

/**
 * REST API configuration
 */
export interface APIConfiguration {
  /** Whether API is enabled */
  enabled: boolean;

  /** Port to listen on */
  port: number;

  /** Host to bind to */
  host: string;

  /** Bearer tokens for authentication (empty = no auth) */
  authTokens?: string[];

  /** CORS origins */
  corsOrigins?: string[];
}

/**
 * Idle shutdown configuration
 */
export interface IdleConfiguration {
  /** Inactivity window after which the process halts (ms) */
  shutdownTimeMs: number;

  /** How often the watcher compares elapsed idle time to the window (ms) */
  pollIntervalMs: number;

  /** Record a startup activity so a daemon that never sees traffic still exits */
  armOnStart: boolean;
}

/**
 * Full daemon configuration
 */
export interface DaemonConfiguration {
  /** NATS connection settings (absent = NATS listener disabled) */
  nats?: NATSConfiguration;

  /** Namespace for subject isolation */
  namespace: string;

  /** REST API configuration */
  api: APIConfiguration;

  /** Idle shutdown configuration */
  idle: IdleConfiguration;
}

/** Seconds of inactivity before shutdown when SHUTDOWN_TIME is unset */
export const DEFAULT_SHUTDOWN_TIME_SECONDS = 300;

/** Fixed watcher poll interval */
export const DEFAULT_POLL_INTERVAL_MS = 5000;

/**
 * Default daemon configuration
 */
export const DEFAULT_DAEMON_CONFIG: DaemonConfiguration = {
  namespace: 'default',
  api: {
    enabled: true,
    port: 3000,
    host: '0.0.0.0',
  },
  idle: {
    shutdownTimeMs: DEFAULT_SHUTDOWN_TIME_SECONDS * 1000, // 5 minutes
    pollIntervalMs: DEFAULT_POLL_INTERVAL_MS,
    armOnStart: true,
  },
};

/**
 * Default NATS settings, applied when NATS_URL is set
 */
export const DEFAULT_NATS_CONFIG: Omit<NATSConfiguration, 'url'> = {
  name: 'idlestop-daemon',
  reconnect: {
    maxAttempts: 10,
    delayMs: 1000,
  },
};

/**
 * CLI configuration (persisted to file)
 */
export interface CLIConfiguration {
  /** Daemon API URL */
  apiUrl: string;

  /** API auth token */
  apiToken?: string;

  /** NATS URL, used by `ping --nats` */
  natsUrl: string;

  /** Subject namespace */
  namespace: string;

  /** Output format preference */
  outputFormat?: 'table' | 'json';
}

/**
 * Default CLI configuration
 */
export const DEFAULT_CLI_CONFIG: CLIConfiguration = {
  apiUrl: 'http://localhost:3000',
  natsUrl: 'nats://localhost:4222',
  namespace: 'default',
  outputFormat: 'table',
};
