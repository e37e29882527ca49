
import { Router, Request, Response } from 'express';
import { align } from './aligner';
import { Comparer } from './comparer';
import config from './config';
import { InputError } from './errors';
import { INTERPOLATION_KINDS } from './interpolation';
import Logger from './logger';
import * as middleware from './middleware';
import { computeSimilarity } from './similarity';
import { resample, skipBreaks } from './timeline';
import { toPoints } from './trace';
import * as validation from './validation';

const router = Router();

function requireBody(req: Request): Record<string, unknown> {
  if (!validation.isRecord(req.body)) {
    throw new InputError('Request body must be a JSON object');
  }
  return req.body;
}

// Health check
router.get('/health', (_req: Request, res: Response) => {
  res.json({
    status: 'healthy',
    uptime: process.uptime(),
    timestamp: new Date().toISOString(),
  });
});

// Public defaults
router.get('/api/config', (_req: Request, res: Response) => {
  res.json({
    defaultThreshold: config.DEFAULT_THRESHOLD,
    outlierBound: config.OUTLIER_BOUND,
    breakThresholdMs: config.BREAK_THRESHOLD_MS,
    defaultResampleHz: config.DEFAULT_RESAMPLE_HZ,
    maxResampleHz: config.MAX_RESAMPLE_HZ,
    maxTracesPerBatch: config.MAX_TRACES_PER_BATCH,
    numericPolicy: config.NUMERIC_POLICY,
    modes: ['double', 'single'],
    interpolations: INTERPOLATION_KINDS,
  });
});

// Compare sets of replays and return the flagged pairs
router.post('/api/compare', middleware.rateLimit(), (req: Request, res: Response) => {
  const request = validation.parseCompareRequest(req.body);

  Logger.batchEvent('started', {
    mode: request.mode,
    threshold: request.threshold,
    replays1: request.replays1.length,
    replays2: request.replays2 ? request.replays2.length : 0,
  });

  const comparer = new Comparer(request.threshold, request.replays1, request.replays2, {
    interpolation: request.interpolation,
    breakThreshold: request.breakThreshold,
  });
  const { outcomes, compared, skipped } = comparer.collect(request.mode);

  res.json({
    mode: request.mode,
    threshold: request.threshold,
    compared,
    skipped,
    outcomes,
  });
});

// Align two traces and score them
router.post('/api/align', (req: Request, res: Response) => {
  const body = requireBody(req);
  const a = validation.parseTrace(body.a);
  const b = validation.parseTrace(body.b);
  const interpolation = validation.validateInterpolation(body.interpolation);

  const { clean, interpolated } = align(a.samples, b.samples, {
    interpolation,
    preserveOrder: body.preserveOrder === true,
  });

  // traces that never overlap have nothing to score
  const similarity = clean.length > 0
    ? computeSimilarity(toPoints(clean), toPoints(interpolated))
    : null;

  res.json({ clean, interpolated, similarity });
});

// Fixed-frequency copy of one trace
router.post('/api/resample', (req: Request, res: Response) => {
  const body = requireBody(req);
  const trace = validation.parseTrace(body.trace);
  const frequency = validation.validateFrequency(body.frequency);

  res.json({
    owner: trace.owner,
    frequency,
    samples: resample(trace.samples, frequency),
  });
});

// Same trace with idle gaps collapsed
router.post('/api/skip-breaks', (req: Request, res: Response) => {
  const body = requireBody(req);
  const trace = validation.parseTrace(body.trace);
  const breakThreshold = validation.validateBreakThreshold(body.breakThreshold);

  res.json({
    owner: trace.owner,
    breakThreshold,
    samples: skipBreaks(trace.samples, breakThreshold),
  });
});

export default router;
