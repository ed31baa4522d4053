// src/routes/statsRoutes.ts
import StatsController from 'App/controllers/StatsController';
import { Router } from 'express';

export const createStatsRoutes = (controller: StatsController): Router => {
  const statsRoutes = Router();

  statsRoutes.get('/api/stats', controller.list);
  statsRoutes.get('/api/stats/live-emit', controller.liveEmitStatus);
  statsRoutes.post('/api/stats/live-emit', controller.liveEmitSet);
  statsRoutes.post('/api/stats/reset', controller.reset);
  statsRoutes.get('/api/stats/:metric', controller.one);
  statsRoutes.get('/metrics', controller.metrics);

  return statsRoutes;
};
