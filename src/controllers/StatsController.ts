// src/controllers/StatsController.ts
import { NotFoundError } from 'App/errors/CustomError';
import { StatsSocketProvider } from 'App/providers/WebSocketsProvider';
import { PrometheusExporter } from 'App/services/PrometheusExporter';
import { StatMonitorState } from 'App/services/StatMonitorState';
import { NextFunction, Request, Response } from 'express';

class StatsController {
  constructor(
    private readonly state: StatMonitorState,
    private readonly exporter: PrometheusExporter,
    private readonly sockets?: StatsSocketProvider,
  ) {}

  /**
   * GET /api/stats
   * Returns every tracked metric with its window and summary.
   */
  list = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const views = await this.state.runExclusive(stats => stats.views());
      return res.status(200).json({ success: true, data: views });
    } catch (err) {
      return next(err);
    }
  };

  /**
   * GET /api/stats/:metric
   */
  one = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { metric } = req.params;
      const view = await this.state.runExclusive(stats => stats.view(metric));
      if (!view) throw new NotFoundError(`Unknown metric: ${metric}`);
      return res.status(200).json({ success: true, data: view });
    } catch (err) {
      return next(err);
    }
  };

  /**
   * POST /api/stats/reset
   * Clears every window; the next cycle is treated as a first sample.
   */
  reset = async (req: Request, res: Response, next: NextFunction) => {
    try {
      await this.state.runExclusive(stats => stats.reset());
      return res.status(200).json({ success: true });
    } catch (err) {
      return next(err);
    }
  };

  /**
   * GET /metrics
   * Prometheus text exposition of the current windows.
   */
  metrics = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const views = await this.state.runExclusive(stats => stats.views());
      const body = await this.exporter.render(views);
      return res.status(200).type(this.exporter.contentType).send(body);
    } catch (err) {
      return next(err);
    }
  };

  /**
   * GET /api/stats/live-emit
   * Returns current status of the real-time emission toggle.
   */
  liveEmitStatus = (req: Request, res: Response, next: NextFunction) => {
    try {
      const enabled = this.sockets?.isLiveEmitEnabled() ?? false;
      return res.status(200).json({ success: true, data: { enabled } });
    } catch (err) {
      return next(err);
    }
  };

  /**
   * POST /api/stats/live-emit
   * Body: { enabled: boolean }
   */
  liveEmitSet = (req: Request, res: Response, next: NextFunction) => {
    try {
      const enabled: unknown = req.body?.enabled;
      if (typeof enabled !== 'boolean') {
        return res
          .status(400)
          .json({ success: false, error: 'enabled (boolean) is required' });
      }
      if (!this.sockets) {
        throw new NotFoundError('WebSocket emission is not available');
      }
      this.sockets.setLiveEmitEnabled(enabled);
      return res.status(200).json({ success: true, data: { enabled } });
    } catch (err) {
      return next(err);
    }
  };
}

export default StatsController;
