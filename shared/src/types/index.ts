// Activity types
export type {
  MonitorState,
  ActivityEvent,
  MonitorStatus,
  IdleShutdownEvent,
  ActivityRequest,
  ActivityResponse,
} from './activity.js';

// Configuration types
export type {
  NATSConfiguration,
  APIConfiguration,
  IdleConfiguration,
  DaemonConfiguration,
  CLIConfiguration,
} from './config.js';

export {
  DEFAULT_SHUTDOWN_TIME_SECONDS,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_DAEMON_CONFIG,
  DEFAULT_NATS_CONFIG,
  DEFAULT_CLI_CONFIG,
} from './config.js';
