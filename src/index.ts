// Re-export all modules for convenient importing
export { default as config } from './config';
export { default as Logger } from './logger';
export * from './errors';
export * from './types';
export { Trace, toPoints, velocity } from './trace';
export { interpolate, isInterpolationKind, INTERPOLATION_KINDS } from './interpolation';
export { skipBreaks, resample } from './timeline';
export { align } from './aligner';
export type { AlignOptions } from './aligner';
export { checkFinite } from './numeric';
export { computeSimilarity, pointDistances } from './similarity';
export { Comparer, isComparisonMode } from './comparer';
export type { ComparerOptions } from './comparer';
export * as validation from './validation';
export * as middleware from './middleware';
