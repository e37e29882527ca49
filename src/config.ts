
// ============================================
// CONFIGURATION
// ============================================

import { NumericPolicy } from './types';

export interface Config {
  PORT: number | string;
  HOST: string;

  // Comparison
  DEFAULT_THRESHOLD: number;
  OUTLIER_BOUND: number;
  BREAK_THRESHOLD_MS: number;
  TRUSTED_PLAYERS: ReadonlySet<string>;
  NUMERIC_POLICY: NumericPolicy;

  // Resampling
  DEFAULT_RESAMPLE_HZ: number;
  MAX_RESAMPLE_HZ: number;

  // Input validation
  MAX_OWNER_LENGTH: number;
  MAX_TRACES_PER_BATCH: number;
  MAX_SAMPLES_PER_TRACE: number;
  JSON_BODY_LIMIT: string;

  // Connection and rate limiting
  MAX_CONNECTIONS_PER_IP: number;
  MAX_COMPARISONS_PER_WINDOW: number;
  RATE_LIMIT_WINDOW_MS: number;

  // Memory cleanup
  CLEANUP_INTERVAL_MS: number;
}

function parseList(value: string | undefined): Set<string> {
  if (!value) return new Set();
  return new Set(value.split(',').map((name) => name.trim()).filter((name) => name.length > 0));
}

function parseNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const num = Number(value);
  return Number.isFinite(num) ? num : fallback;
}

function parseNumericPolicy(value: string | undefined): NumericPolicy {
  return value === 'ignore' ? 'ignore' : 'raise';
}

const config: Config = {
  PORT: process.env.PORT || 3000,
  HOST: process.env.HOST || '0.0.0.0',

  // Comparison
  DEFAULT_THRESHOLD: parseNumber(process.env.DEFAULT_THRESHOLD, 18),
  OUTLIER_BOUND: parseNumber(process.env.OUTLIER_BOUND, 600), // playfield plus margin
  BREAK_THRESHOLD_MS: parseNumber(process.env.BREAK_THRESHOLD_MS, 1000),
  TRUSTED_PLAYERS: parseList(process.env.TRUSTED_PLAYERS),
  NUMERIC_POLICY: parseNumericPolicy(process.env.NUMERIC_POLICY), // floating-point faults are fatal unless 'ignore'

  // Resampling
  DEFAULT_RESAMPLE_HZ: 60,
  MAX_RESAMPLE_HZ: 1000,

  // Input validation
  MAX_OWNER_LENGTH: 50,
  MAX_TRACES_PER_BATCH: parseInt(process.env.MAX_TRACES_PER_BATCH || '100', 10),
  MAX_SAMPLES_PER_TRACE: 200000,
  JSON_BODY_LIMIT: process.env.JSON_BODY_LIMIT || '25mb',

  // Connection and rate limiting
  MAX_CONNECTIONS_PER_IP: parseInt(process.env.MAX_CONNECTIONS_PER_IP || '20', 10),
  MAX_COMPARISONS_PER_WINDOW: 10,
  RATE_LIMIT_WINDOW_MS: 60 * 1000, // 1 minute

  // Memory cleanup
  CLEANUP_INTERVAL_MS: 5 * 60 * 1000, // 5 minutes
};

export default config;
