/**
 * Custom Express middleware
 * @module middleware
 */

import { Request, Response, NextFunction } from 'express';
import { isReplayCompareError } from './errors';
import Logger from './logger';
import * as validation from './validation';

interface CustomError extends Error {
  status?: number;
  type?: string;
}

/**
 * Request logging middleware
 */
export function requestLogger() {
  return (req: Request, res: Response, next: NextFunction): void => {
    const start = Date.now();

    res.on('finish', () => {
      const duration = Date.now() - start;
      const message = `${req.method} ${req.path} ${res.statusCode} ${duration}ms`;

      if (res.statusCode >= 500) {
        Logger.error(message);
      } else if (res.statusCode >= 400) {
        Logger.warn(message);
      } else {
        Logger.debug(message);
      }
    });

    next();
  };
}

/**
 * API responses are computed per request and never cached
 */
export function noStore() {
  return (_req: Request, res: Response, next: NextFunction): void => {
    res.setHeader('Cache-Control', 'no-store');
    next();
  };
}

/**
 * Limit comparison batches per client IP
 */
export function rateLimit() {
  return (req: Request, res: Response, next: NextFunction): void => {
    const ip = req.ip || 'unknown';
    if (validation.isRateLimited(ip)) {
      Logger.security('Comparison rate limit reached', ip, { path: req.path });
      res.status(429).json({ error: 'Too many requests' });
      return;
    }
    next();
  };
}

/**
 * Error handling middleware
 */
export function errorHandler(
  err: CustomError,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (isReplayCompareError(err)) {
    Logger.warn(`Rejected ${req.method} ${req.path}: ${err.message}`);
    res.status(err.status).json({ error: err.message, code: err.code });
    return;
  }

  // body-parser failures carry their own 4xx status
  if (err.status && err.status < 500) {
    Logger.warn(`Rejected ${req.method} ${req.path}: ${err.message}`);
    res.status(err.status).json({ error: err.message, code: err.type || 'BAD_REQUEST' });
    return;
  }

  Logger.error(`Express error: ${err.message}`, {
    stack: err.stack,
    path: req.path,
    method: req.method,
  });

  res.status(err.status || 500).json({
    error: process.env.NODE_ENV === 'production'
      ? 'Internal server error'
      : err.message,
  });
}

/**
 * 404 handler
 */
export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({
    error: 'Not found',
    path: req.path,
  });
}
