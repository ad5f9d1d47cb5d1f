import { Router } from 'express';
import type { MonitorServiceLayer } from '../server.js';

/**
 * Creates the status router
 */
export function createStatusRouter(service: MonitorServiceLayer): Router {
  const router = Router();

  /**
   * GET /api/status
   * Idle monitor snapshot
   */
  router.get('/', (_req, res, next) => {
    try {
      res.json({
        timestamp: new Date().toISOString(),
        ...service.getStatus(),
      });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
