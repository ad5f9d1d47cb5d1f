/**
 * idlestop daemon service
 *
 * Hosts one idle monitor per process and feeds it from:
 * - REST API (POST /api/activity)
 * - NATS activity subject (optional, enabled by NATS_URL)
 *
 * The process halts once no activity has arrived for SHUTDOWN_TIME seconds.
 */

import type { Server } from 'http';
import { v4 as uuidv4 } from 'uuid';
import type { DaemonConfiguration, NATSConfiguration } from '@idlestop/shared';
import { createNATSClient, parseNatsEndpoint } from '@idlestop/shared';

import { loadConfig } from './config.js';
import { createIdleMonitor, type IdleMonitor, type Terminator } from './idle/index.js';
import {
  createExpressApp,
  startServer,
  stopServer,
  type MonitorServiceLayer,
} from './api/index.js';
import {
  startActivityListener,
  type ActivityListener,
  type ListenerConnection,
} from './nats/index.js';

/**
 * NATS connection as the daemon uses it
 */
export interface ActivityConnection {
  nc: ListenerConnection;
  /** Drain and close the connection */
  close(): Promise<void>;
}

export type Connector = (config: NATSConfiguration) => Promise<ActivityConnection>;

/**
 * Service state
 */
interface ServiceState {
  config: DaemonConfiguration;
  monitor: IdleMonitor;
  nats?: ActivityConnection;
  listener?: ActivityListener;
  httpServer?: Server;
  signalHandler?: () => void;
}

let state: ServiceState | null = null;

export interface StartServiceOptions {
  /** Environment to read configuration from (default: process.env) */
  env?: NodeJS.ProcessEnv;

  /** Replaces the hard process exit on idle shutdown */
  terminate?: Terminator;

  /** Install SIGINT/SIGTERM handlers (default: true) */
  handleSignals?: boolean;

  /** Opens the NATS connection when NATS_URL is set (default: createNATSClient) */
  connect?: Connector;
}

export interface RunningService {
  config: DaemonConfiguration;
  monitor: IdleMonitor;
  /** Bound HTTP server, when the API is enabled */
  httpServer?: Server;
}

/**
 * Create the service layer shared by the REST API and the NATS listener
 *
 * recordActivity() returns null once the monitor is stopped or terminated.
 */
export function createMonitorServiceLayer(monitor: IdleMonitor): MonitorServiceLayer {
  return {
    recordActivity(source) {
      if (!monitor.recordActivity(source)) {
        return null;
      }
      return {
        id: uuidv4(),
        source,
        timestamp: new Date().toISOString(),
      };
    },

    getStatus() {
      return monitor.getStatus();
    },
  };
}

/**
 * Start the daemon
 */
export async function startService(options: StartServiceOptions = {}): Promise<RunningService> {
  if (state) {
    throw new Error('Service is already running');
  }

  const config = loadConfig(options.env);

  console.log('Starting idlestop daemon...');
  console.log(`  Namespace: ${config.namespace}`);
  console.log(`  Shutdown after: ${config.idle.shutdownTimeMs / 1000}s without activity`);

  const monitor = createIdleMonitor(
    {
      shutdownTimeMs: config.idle.shutdownTimeMs,
      pollIntervalMs: config.idle.pollIntervalMs,
    },
    { terminate: options.terminate },
  );
  const serviceLayer = createMonitorServiceLayer(monitor);
  const current: ServiceState = { config, monitor };
  state = current;

  try {
    if (config.nats) {
      console.log(`Connecting to NATS at ${parseNatsEndpoint(config.nats.url).server}...`);
      const connect = options.connect ?? createNATSClient;
      current.nats = await connect(config.nats);
      current.listener = startActivityListener(current.nats.nc, config.namespace, serviceLayer);
    }

    if (config.api.enabled) {
      console.log(`Starting REST API on ${config.api.host}:${config.api.port}...`);
      const app = createExpressApp(config.api, serviceLayer);
      current.httpServer = await startServer(app, config.api);
    }
  } catch (error) {
    await stopService();
    throw error;
  }

  if (config.idle.armOnStart) {
    serviceLayer.recordActivity('startup');
  }

  if (options.handleSignals !== false) {
    const shutdown = () => {
      console.log('\nShutting down...');
      stopService().then(
        () => process.exit(0),
        (error: unknown) => {
          console.error('Failed to stop service:', error);
          process.exit(1);
        },
      );
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
    current.signalHandler = shutdown;
  }

  console.log('\n=== idlestop daemon ready ===\n');

  return {
    config,
    monitor,
    httpServer: current.httpServer,
  };
}

/**
 * Stop the daemon without exiting the process
 *
 * Every resource is released even if an earlier one fails to close; the first
 * failure is rethrown afterwards (an AggregateError when there are several).
 */
export async function stopService(): Promise<void> {
  if (!state) {
    return;
  }

  const current = state;
  state = null;

  console.log('Stopping idlestop daemon...');

  current.monitor.stop();

  if (current.signalHandler) {
    process.off('SIGINT', current.signalHandler);
    process.off('SIGTERM', current.signalHandler);
  }

  const failures: unknown[] = [];
  const release = async (step: () => void | Promise<void>, done?: string): Promise<void> => {
    try {
      await step();
      if (done) {
        console.log(done);
      }
    } catch (error) {
      failures.push(error);
    }
  };

  const { listener, nats, httpServer } = current;

  if (listener) {
    await release(() => listener.stop());
  }

  if (nats) {
    await release(() => nats.close(), '  NATS connection closed');
  }

  if (httpServer) {
    await release(() => stopServer(httpServer), '  REST API stopped');
  }

  if (failures.length === 1) {
    throw failures[0];
  }
  if (failures.length > 1) {
    throw new AggregateError(failures, 'Failed to stop idlestop daemon');
  }

  console.log('idlestop daemon stopped');
}

/**
 * Check whether the daemon is running
 */
export function isRunning(): boolean {
  return state !== null;
}
