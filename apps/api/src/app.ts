import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import { createServer } from 'http';
import type { InMemoryHealthStore } from '@walkloop/adapters';

import { createRoutesRouter } from './controllers/routes.controller.js';
import { createActivityRouter } from './controllers/activity.controller.js';
import { WsGateway } from './ws/ws-gateway.js';
import { errorHandler } from './middleware/error-handler.js';
import { RoutePlanningService } from './services/routes/route-planning.service.js';
import { ActivitySummaryService } from './services/activity/activity-summary.service.js';
import {
  createDirectionsAdapter,
  createHealthStore,
  createMeanderRandomSource,
  getRouteStrategy,
} from './config/routing.js';

export interface AppDeps {
  planner: RoutePlanningService;
  activity: ActivitySummaryService;
  healthStore: InMemoryHealthStore;
}

/** Wire services from environment configuration. */
export function createAppDeps(): AppDeps {
  const directions = createDirectionsAdapter();
  const planner = new RoutePlanningService({
    directions,
    rng: createMeanderRandomSource(),
    defaultStrategy: getRouteStrategy(),
  });
  const healthStore = createHealthStore();
  const activity = new ActivitySummaryService(healthStore);

  console.log(
    `[app] directions=${directions ? 'osrm' : 'disabled'} default strategy=${planner.defaultStrategy}`,
  );
  return { planner, activity, healthStore };
}

export function buildApp(deps: AppDeps): ReturnType<typeof express> {
  const app = express();

  // ─── Middleware ─────────────────────────────────────────────────────────────
  app.use(helmet());
  app.use(cors({ origin: process.env['CORS_ORIGIN'] ?? '*' }));
  app.use(morgan('combined', { skip: () => process.env['NODE_ENV'] === 'test' }));
  app.use(express.json({ limit: '1mb' }));

  // ─── Routes ─────────────────────────────────────────────────────────────────
  app.use('/api/routes', createRoutesRouter(deps.planner));
  app.use('/api/activity', createActivityRouter(deps.activity, deps.healthStore));

  app.get('/healthz', (_req, res) => {
    res.json({
      status: 'ok',
      ts: new Date().toISOString(),
      directions: deps.planner.supports('street') ? 'osrm' : 'disabled',
    });
  });

  // ─── Error handler (must be last) ───────────────────────────────────────────
  app.use(errorHandler);

  return app;
}

export function buildHttpServer(app: ReturnType<typeof express>, deps: AppDeps) {
  const httpServer = createServer(app);
  const wsGateway = new WsGateway(httpServer);
  const stopLiveUpdates = deps.activity.startLiveUpdates(wsGateway);
  return { httpServer, wsGateway, stopLiveUpdates };
}
