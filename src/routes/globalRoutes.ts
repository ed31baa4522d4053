// src/routes/globalRoutes.ts
import { StatMonitorState } from 'App/services/StatMonitorState';
import { Router } from 'express';

export const createGlobalRoutes = (state: StatMonitorState): Router => {
  const globalRoutes = Router();

  globalRoutes.get('/health', (req, res) => {
    res.json({ status: 'ok', ...state.getStatus() });
  });

  return globalRoutes;
};
