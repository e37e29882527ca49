/**
 * Input Validation Module
 * Turns untrusted JSON payloads into traces and comparison options
 * @module validation
 */

import { isComparisonMode } from './comparer';
import config from './config';
import { InputError, InvalidModeError } from './errors';
import { isInterpolationKind } from './interpolation';
import { Trace } from './trace';
import { ComparisonMode, InterpolationKind, ReplayEvent, Sample } from './types';

export interface CompareRequest {
  mode: ComparisonMode;
  threshold: number;
  replays1: Trace[];
  replays2: Trace[] | null;
  interpolation: InterpolationKind;
  breakThreshold: number | null;
}

/**
 * Sanitize a string by trimming whitespace and limiting length
 */
export function sanitizeString(str: unknown, maxLength: number): string {
  if (typeof str !== 'string') return '';
  return str.trim().slice(0, maxLength);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * A `[a, b, c]` row of finite numbers
 */
function parseTriple(row: unknown, index: number, owner: string): [number, number, number] {
  if (!Array.isArray(row) || row.length !== 3) {
    throw new InputError(`Trace "${owner}": entry ${index} must be a [number, number, number] triple`);
  }
  const [a, b, c]: unknown[] = row;
  if (typeof a !== 'number' || typeof b !== 'number' || typeof c !== 'number' ||
      !Number.isFinite(a) || !Number.isFinite(b) || !Number.isFinite(c)) {
    throw new InputError(`Trace "${owner}": entry ${index} contains a non-finite value`);
  }
  return [a, b, c];
}

/**
 * Parse one trace. Accepts either raw replay events as `[dt, x, y]` rows
 * or absolute samples as `[t, x, y]` rows.
 */
export function parseTrace(value: unknown): Trace {
  if (!isRecord(value)) {
    throw new InputError('Trace must be an object');
  }

  const owner = sanitizeString(value.owner, config.MAX_OWNER_LENGTH);
  if (!owner) {
    throw new InputError('Trace owner is required');
  }

  const useEvents = value.events !== undefined && value.events !== null;
  const rows = useEvents ? value.events : value.samples;
  if (!Array.isArray(rows)) {
    throw new InputError(`Trace "${owner}": expected an "events" or "samples" array`);
  }
  if (rows.length > config.MAX_SAMPLES_PER_TRACE) {
    throw new InputError(`Trace "${owner}": more than ${config.MAX_SAMPLES_PER_TRACE} entries`);
  }

  const triples = rows.map((row: unknown, i) => parseTriple(row, i, owner));

  if (useEvents) {
    const events: ReplayEvent[] = triples.map(([dt, x, y], i) => {
      if (dt < 0) {
        throw new InputError(`Trace "${owner}": event ${i} has a negative time delta`);
      }
      return { dt, x, y };
    });
    return Trace.fromDeltas(owner, events);
  }

  const samples: Sample[] = triples.map(([t, x, y]) => ({ t, x, y }));
  return Trace.fromSamples(owner, samples);
}

/**
 * Parse a list of traces, enforcing the batch size limit
 */
export function parseTraceList(value: unknown, label: string): Trace[] {
  if (!Array.isArray(value)) {
    throw new InputError(`"${label}" must be an array of traces`);
  }
  if (value.length > config.MAX_TRACES_PER_BATCH) {
    throw new InputError(`"${label}" has more than ${config.MAX_TRACES_PER_BATCH} traces`);
  }
  return value.map((item: unknown) => parseTrace(item));
}

/**
 * Threshold must be a positive finite number; missing means the default
 */
export function validateThreshold(threshold: unknown): number {
  if (threshold === undefined || threshold === null) return config.DEFAULT_THRESHOLD;
  const num = Number(threshold);
  if (!Number.isFinite(num) || num <= 0) {
    throw new InputError(`Invalid threshold: ${String(threshold)}`);
  }
  return num;
}

/**
 * Validate and clamp resampling frequency to allowed range
 */
export function validateFrequency(frequency: unknown): number {
  if (frequency === undefined || frequency === null) return config.DEFAULT_RESAMPLE_HZ;
  const num = Number(frequency);
  if (isNaN(num) || num <= 0) {
    throw new InputError(`Invalid frequency: ${String(frequency)}`);
  }
  if (num > config.MAX_RESAMPLE_HZ) return config.MAX_RESAMPLE_HZ;
  return num;
}

export function validateBreakThreshold(breakThreshold: unknown): number {
  if (breakThreshold === undefined || breakThreshold === null) return config.BREAK_THRESHOLD_MS;
  const num = Number(breakThreshold);
  if (!Number.isFinite(num) || num < 0) {
    throw new InputError(`Invalid break threshold: ${String(breakThreshold)}`);
  }
  return num;
}

export function validateInterpolation(interpolation: unknown): InterpolationKind {
  if (interpolation === undefined || interpolation === null) return 'linear';
  if (!isInterpolationKind(interpolation)) {
    throw new InputError(`Unknown interpolation: ${String(interpolation)}`);
  }
  return interpolation;
}

/**
 * Validate a whole comparison batch. The mode is checked before any trace
 * is parsed.
 */
export function parseCompareRequest(body: unknown): CompareRequest {
  if (!isRecord(body)) {
    throw new InputError('Request body must be an object');
  }

  const { mode } = body;
  if (!isComparisonMode(mode)) {
    throw new InvalidModeError(mode);
  }

  const threshold = validateThreshold(body.threshold);
  const interpolation = validateInterpolation(body.interpolation);
  const breakThreshold = body.skipBreaks === true ? validateBreakThreshold(body.breakThreshold) : null;

  const replays1 = parseTraceList(body.replays1, 'replays1');
  const replays2 = mode === 'double' ? parseTraceList(body.replays2, 'replays2') : null;

  return { mode, threshold, replays1, replays2, interpolation, breakThreshold };
}

/** Comparison requests by client key (IP or socket ID) */
const requestTimestamps: Record<string, number[]> = {};

/**
 * Check if a client is rate limited (too many comparison batches per window)
 */
export function isRateLimited(key: string): boolean {
  const now = Date.now();
  const windowStart = now - config.RATE_LIMIT_WINDOW_MS;

  // Remove timestamps outside the window
  const recent = (requestTimestamps[key] ?? []).filter((ts) => ts > windowStart);

  if (recent.length >= config.MAX_COMPARISONS_PER_WINDOW) {
    requestTimestamps[key] = recent;
    return true;
  }

  recent.push(now);
  requestTimestamps[key] = recent;
  return false;
}

/**
 * Drop every key whose window has emptied
 */
export function pruneRateLimitData(now = Date.now()): number {
  const windowStart = now - config.RATE_LIMIT_WINDOW_MS;
  let removed = 0;
  for (const key of Object.keys(requestTimestamps)) {
    if (requestTimestamps[key].every((ts) => ts <= windowStart)) {
      delete requestTimestamps[key];
      removed++;
    }
  }
  return removed;
}

/**
 * Get request timestamps for a client (read-only copy)
 */
export function getRequestTimestamps(key: string): number[] | undefined {
  const timestamps = requestTimestamps[key];
  return timestamps ? [...timestamps] : undefined;
}

/**
 * Cleanup rate limit data for a disconnected client
 */
export function cleanupRateLimitData(key: string): void {
  delete requestTimestamps[key];
}
