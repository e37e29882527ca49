import { Server } from 'socket.io';
import { Comparer } from './comparer';
import config from './config';
import { isReplayCompareError } from './errors';
import Logger from './logger';
import { CustomSocket } from './types';
import * as validation from './validation';

// Track connections by IP
const connectionsByIP: Record<string, number> = {};

function getClientIP(socket: CustomSocket): string {
  const forwarded = socket.handshake.headers['x-forwarded-for'];
  if (forwarded) {
    const forwardedStr = Array.isArray(forwarded) ? forwarded[0] : forwarded;
    return forwardedStr.split(',')[0].trim();
  }
  return socket.handshake.address;
}

export interface CompareErrorPayload {
  message: string;
  code: string;
}

function toErrorPayload(err: unknown): CompareErrorPayload {
  if (isReplayCompareError(err)) {
    return { message: err.message, code: err.code };
  }
  return { message: 'Comparison failed', code: 'INTERNAL_ERROR' };
}

/**
 * Run one batch, emitting each flagged pair as soon as it is found
 */
function handleCompare(socket: CustomSocket, payload: unknown): void {
  if (validation.isRateLimited(socket.id)) {
    Logger.security('Comparison rate limit reached', socket.clientIP || 'unknown', { socket: socket.id });
    socket.emit('compareError', { message: 'Too many requests', code: 'RATE_LIMITED' });
    return;
  }

  try {
    const request = validation.parseCompareRequest(payload);
    const comparer = new Comparer(request.threshold, request.replays1, request.replays2, {
      interpolation: request.interpolation,
      breakThreshold: request.breakThreshold,
    });

    Logger.batchEvent('started', { socket: socket.id, mode: request.mode });

    const batch = comparer.compare(request.mode);
    let flagged = 0;
    let step = batch.next();
    while (!step.done) {
      flagged++;
      socket.emit('outcome', step.value);
      step = batch.next();
    }

    const { compared, skipped } = step.value;
    Logger.batchEvent('completed', { socket: socket.id, compared, skipped, flagged });
    socket.emit('complete', { compared, skipped, flagged });
  } catch (err) {
    if (isReplayCompareError(err)) {
      Logger.warn(`Batch rejected for ${socket.id}: ${err.message}`);
    } else {
      Logger.error('Batch failed:', err);
    }
    socket.emit('compareError', toErrorPayload(err));
  }
}

export function setupSocketIO(io: Server): void {
  // Connection limiting middleware
  io.use((socket: CustomSocket, next) => {
    const ip = getClientIP(socket);

    if (!connectionsByIP[ip]) {
      connectionsByIP[ip] = 0;
    }

    if (connectionsByIP[ip] >= config.MAX_CONNECTIONS_PER_IP) {
      Logger.security('Connection rejected - limit reached', ip, { limit: config.MAX_CONNECTIONS_PER_IP });
      return next(new Error('Too many connections from this IP'));
    }

    connectionsByIP[ip]++;
    socket.clientIP = ip;
    Logger.debug(`Connection from ${ip} (${connectionsByIP[ip]}/${config.MAX_CONNECTIONS_PER_IP})`);
    next();
  });

  io.on('connection', (socket: CustomSocket) => {
    Logger.debug(`Client connected: ${socket.id}`);

    socket.on('compare', (payload: unknown) => {
      handleCompare(socket, payload);
    });

    socket.on('disconnect', () => {
      validation.cleanupRateLimitData(socket.id);
      if (socket.clientIP && connectionsByIP[socket.clientIP]) {
        connectionsByIP[socket.clientIP]--;
        if (connectionsByIP[socket.clientIP] <= 0) {
          delete connectionsByIP[socket.clientIP];
        }
      }
    });
  });
}

