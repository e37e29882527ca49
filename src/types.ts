import { Socket } from 'socket.io';

export interface CustomSocket extends Socket {
  clientIP?: string;
}

/** One cursor position at an absolute time in ms */
export interface Sample {
  t: number;
  x: number;
  y: number;
}

/** One raw replay event: time since the previous event, then position */
export interface ReplayEvent {
  dt: number;
  x: number;
  y: number;
}

export type Point = readonly [number, number];

export type InterpolationKind = 'linear' | 'stepBefore';

export type ComparisonMode = 'double' | 'single';

export type NumericPolicy = 'raise' | 'ignore';

export interface AlignedPair {
  clean: Sample[];
  interpolated: Sample[];
}

export interface SimilarityResult {
  mean: number;
  std: number;
}

export interface ComparisonOutcome {
  ownerA: string;
  ownerB: string;
  mean: number;
  std: number;
}

export interface BatchCounts {
  compared: number;
  skipped: number;
}

export interface BatchSummary extends BatchCounts {
  outcomes: ComparisonOutcome[];
}
