import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { InMemoryHealthStore } from '@walkloop/adapters';
import type { ActivityQueryPort } from '@walkloop/domain';

const sampleSchema = z
  .object({
    type: z.enum(['step_count', 'distance_walking_running', 'walking_speed']),
    value: z.number().min(0).finite(),
    startTs: z.string().datetime(),
    endTs: z.string().datetime(),
  })
  .refine((s) => Date.parse(s.startTs) <= Date.parse(s.endTs), {
    message: 'startTs must not be after endTs',
  });

const sampleBatchSchema = z.object({
  samples: z.array(sampleSchema).min(1).max(500),
});

export function createActivityRouter(
  activity: ActivityQueryPort,
  healthStore: InMemoryHealthStore,
): Router {
  const router = Router();

  /** GET /api/activity/authorization — read permission per quantity type */
  router.get('/authorization', (_req: Request, res: Response) => {
    res.json(activity.getAuthorization());
  });

  /** POST /api/activity/authorize — request read access to every quantity type */
  router.post('/authorize', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await activity.requestAccess());
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/activity/today */
  router.get('/today', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await activity.getDailySummary());
    } catch (err) {
      next(err);
    }
  });

  /** POST /api/activity/samples — batch upload from the device */
  router.post('/samples', (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = sampleBatchSchema.parse(req.body);
      const ingested = healthStore.appendMany(
        body.samples.map((s) => ({
          type: s.type,
          value: s.value,
          startTs: new Date(s.startTs),
          endTs: new Date(s.endTs),
        })),
      );
      res.status(202).json({ ingested });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
