import 'dotenv/config';

import http from 'http';
import { Server } from 'socket.io';
import app from './app';
import config from './config';
import Logger from './logger';
import { setupSocketIO } from './socket';
import * as validation from './validation';

export interface ReplayServer {
  server: http.Server;
  io: Server;
}

export function createReplayServer(): ReplayServer {
  const server = http.createServer(app);
  const io = new Server(server, {
    maxHttpBufferSize: 25e6, // trace batches are large
  });

  setupSocketIO(io);

  io.engine.on('connection_error', (err: Error) => {
    Logger.error('Socket.io connection error:', err.message);
  });

  return { server, io };
}

function start(): void {
  const { server, io } = createReplayServer();

  process.on('uncaughtException', (err: Error) => {
    Logger.error('Uncaught Exception:', err);
  });

  process.on('unhandledRejection', (reason: unknown, promise: Promise<unknown>) => {
    Logger.error('Unhandled Rejection at:', promise, 'reason:', reason);
  });

  // HTTP clients are rate limited by IP and never disconnect
  const cleanupIntervalId = setInterval(() => {
    const removed = validation.pruneRateLimitData();
    if (removed > 0) {
      Logger.debug(`Memory cleanup: removed ${removed} stale rate limit entries`);
    }
  }, config.CLEANUP_INTERVAL_MS);

  const shutdown = (signal: string) => () => {
    Logger.info(`Received ${signal}, shutting down...`);
    clearInterval(cleanupIntervalId);
    io.close(() => {
      process.exit(0);
    });
  };

  process.on('SIGTERM', shutdown('SIGTERM'));
  process.on('SIGINT', shutdown('SIGINT'));

  server.listen(Number(config.PORT), config.HOST, () => {
    Logger.info(`Replay compare server listening on http://${config.HOST}:${config.PORT}`);
    Logger.info(`Threshold ${config.DEFAULT_THRESHOLD}, outlier bound ${config.OUTLIER_BOUND}, ` +
      `numeric policy '${config.NUMERIC_POLICY}', ${config.TRUSTED_PLAYERS.size} trusted players`);
  });
}

if (require.main === module) {
  start();
}
