import { Router } from 'express';
import type { ActivityResponse } from '@idlestop/shared';
import type { MonitorServiceLayer } from '../server.js';
import { APIError } from '../middleware/error.js';

/**
 * Creates the activity router
 */
export function createActivityRouter(service: MonitorServiceLayer): Router {
  const router = Router();

  /**
   * POST /api/activity
   * Report activity and re-arm the idle timer
   *
   * Body: { source?: string }
   * 409 once the monitor is stopped or terminated
   */
  router.post('/', (req, res, next) => {
    try {
      const body: unknown = req.body ?? {};
      let source = 'http';

      if (typeof body === 'object' && body !== null && 'source' in body && body.source !== undefined) {
        if (typeof body.source !== 'string' || body.source.trim() === '') {
          throw new APIError(400, 'source must be a non-empty string');
        }
        source = body.source.trim();
      }

      const event = service.recordActivity(source);
      if (!event) {
        throw new APIError(409, `Idle monitor is ${service.getStatus().state} and no longer accepts activity`);
      }

      const response: ActivityResponse = {
        event,
        status: service.getStatus(),
      };

      res.status(202).json(response);
    } catch (err) {
      next(err);
    }
  });

  return router;
}
