// src/providers/WebSocketsProvider.ts
import { StatMonitorState } from 'App/services/StatMonitorState';
import type { MetricView } from 'App/stats/StatAggregator';
import { createLogger, formatError } from 'App/utils/logger';
import type { Server as HttpServer } from 'node:http';
import { Server as SocketIOServer } from 'socket.io';

const log = createLogger('WebSocket');

/**
 * Socket.IO server pushing `stats` events (the full list of metric views).
 * A client receives the current views on connect and after every poll
 * cycle while live emission is enabled.
 */
export class StatsSocketProvider {
  readonly io: SocketIOServer;
  private liveEmitEnabled: boolean;

  constructor(
    server: HttpServer,
    private readonly state: StatMonitorState,
    liveEmitEnabled: boolean,
  ) {
    this.liveEmitEnabled = liveEmitEnabled;
    this.io = new SocketIOServer(server, {
      cors: {
        origin: true,
        methods: ['GET'],
      },
    });

    this.io.on('connection', socket => {
      log.info(`client connected, id: ${socket.id}`);
      this.state
        .runExclusive(stats => stats.views())
        .then(views => {
          socket.emit('stats', views);
        })
        .catch(err => log.error(`initial emit failed: ${formatError(err)}`));

      socket.on('disconnect', () => {
        log.info(`client disconnected, id: ${socket.id}`);
      });
    });
  }

  isLiveEmitEnabled(): boolean {
    return this.liveEmitEnabled;
  }

  setLiveEmitEnabled(enabled: boolean) {
    this.liveEmitEnabled = enabled;
  }

  /** Call with the lock held so the views match the cycle just applied. */
  broadcast(views: MetricView[]) {
    if (!this.liveEmitEnabled) return;
    this.io.emit('stats', views);
  }

  clientCount(): number {
    return this.io.of('/').sockets.size;
  }
}
