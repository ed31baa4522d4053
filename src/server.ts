import cors, { CorsOptions } from 'cors';
import express, { Express } from 'express';
import helmet from 'helmet';
import http from 'http';
import morgan from 'morgan';
import StatsController from './controllers/StatsController';
import errorHandler from './middlewares/errorHandler';
import { StatsSocketProvider } from './providers/WebSocketsProvider';
import { generalLimiter } from './rateLimiters/generalRateLimiter';
import { createGlobalRoutes } from './routes/globalRoutes';
import { createStatsRoutes } from './routes/statsRoutes';
import { PrometheusExporter } from './services/PrometheusExporter';
import { StatMonitorState } from './services/StatMonitorState';
// ------------------------------------------------------------------------------

const maxQuerySize = '0.5mb';

export interface ServerOptions {
  mode: string;
  liveEmitEnabled: boolean;
}

export interface StatsServer {
  app: Express;
  server: http.Server;
  sockets: StatsSocketProvider;
}

/**
 * Builds the export surface around an existing monitor state:
 * JSON/Prometheus routes on Express and `stats` events on Socket.IO.
 * The caller decides when to listen.
 */
export function createStatsServer(
  state: StatMonitorState,
  { mode, liveEmitEnabled }: ServerOptions,
): StatsServer {
  const app = express();

  // Parse JSON bodies (as sent by API clients)
  app.use(express.json({ limit: maxQuerySize }));

  if (mode === 'production') {
    app.enable('trust proxy');

    app.disable('x-powered-by');

    app.use(helmet());
    app.use(
      helmet.frameguard({
        action: 'deny',
      }),
    );
    app.use(
      helmet.hsts({
        maxAge: 31536000,
        includeSubDomains: false,
      }),
    );
    app.use(helmet.noSniff());
    app.use(helmet.crossOriginResourcePolicy({ policy: 'cross-origin' }));
    // adding morgan to log HTTP requests
    app.use(morgan('common'));
    app.use(generalLimiter);
  }

  const corsOptions: CorsOptions = {
    methods: ['GET', 'POST'],
    origin: true,
  };

  app.use(cors(corsOptions));

  const server = http.createServer(app);

  // Initialize Socket.IO in the HTTP server
  const sockets = new StatsSocketProvider(server, state, liveEmitEnabled);

  const controller = new StatsController(
    state,
    new PrometheusExporter(),
    sockets,
  );

  app.use('/', [createGlobalRoutes(state), createStatsRoutes(controller)]);

  app.use(errorHandler);

  return { app, server, sockets };
}
