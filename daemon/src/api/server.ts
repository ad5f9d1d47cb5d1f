import express, { type Express } from 'express';
import cors from 'cors';
import type { Server } from 'http';
import type { ActivityEvent, APIConfiguration, MonitorStatus } from '@idlestop/shared';
import { createAuthMiddleware } from './middleware/auth.js';
import { errorHandler, notFoundHandler } from './middleware/error.js';
import { createActivityRouter } from './routes/activity.js';
import { createStatusRouter } from './routes/status.js';

/**
 * Service layer the routes talk to
 */
export interface MonitorServiceLayer {
  /**
   * Record activity from the given source and return the reported event, or
   * null when the monitor no longer accepts activity
   */
  recordActivity(source: string): ActivityEvent | null;

  getStatus(): MonitorStatus;
}

/**
 * Creates and configures the Express application
 */
export function createExpressApp(
  config: APIConfiguration,
  serviceLayer: MonitorServiceLayer,
): Express {
  const app = express();

  app.use(express.json());

  const corsOptions = config.corsOrigins
    ? { origin: config.corsOrigins }
    : {};
  app.use(cors(corsOptions));

  app.use('/api', createAuthMiddleware(config.authTokens));

  app.use('/api/activity', createActivityRouter(serviceLayer));
  app.use('/api/status', createStatusRouter(serviceLayer));

  // Health check endpoint (no auth required)
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.use(notFoundHandler);

  // Error handler (must be last)
  app.use(errorHandler);

  return app;
}

/**
 * Starts the Express server
 */
export async function startServer(
  app: Express,
  config: Pick<APIConfiguration, 'port' | 'host'>,
): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(config.port, config.host, () => {
      console.log(`API server listening on http://${config.host}:${config.port}`);
      resolve(server);
    });

    server.on('error', reject);
  });
}

/**
 * Close a server started with startServer
 */
export async function stopServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => {
      if (err) {
        reject(err);
        return;
      }
      resolve();
    });
  });
}
