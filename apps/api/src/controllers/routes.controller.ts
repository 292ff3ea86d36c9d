import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { RoutePlanningService } from '../services/routes/route-planning.service.js';
import { resolveTargetDistance } from '../services/routes/goal-distance.js';

const coordinateSchema = z.object({
  lat: z.number().min(-90).max(90),
  lng: z.number().min(-180).max(180),
});

const goalSchema = z.object({
  kind: z.enum(['steps', 'distance', 'time']),
  value: z.number().positive().finite(),
});

const generateBodySchema = z.object({
  start: coordinateSchema,
  goal: goalSchema,
  strategy: z.enum(['geometric', 'street', 'all']).optional(),
});

export function createRoutesRouter(planner: RoutePlanningService): Router {
  const router = Router();

  /** POST /api/routes/generate — candidate loops for a start point and goal */
  router.post('/generate', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = generateBodySchema.parse(req.body);

      // Stop issuing directions lookups once the client has gone away
      const abort = new AbortController();
      res.on('close', () => {
        if (!res.writableEnded) abort.abort();
      });

      const routes = await planner.generateRoutes(body.start, body.goal, {
        strategy: body.strategy,
        signal: abort.signal,
      });

      res.json({
        goal: body.goal,
        targetDistanceM: resolveTargetDistance(body.goal),
        strategy: planner.resolveStrategy(body.strategy),
        data: routes,
      });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
