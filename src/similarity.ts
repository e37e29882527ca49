// ============================================
// SIMILARITY SCORING
// ============================================
// Mean and spread of the point-to-point distance between two aligned traces.
// A low mean means both cursors followed the same path.

import config from './config';
import { checkFinite } from './numeric';
import { NumericPolicy, Point, SimilarityResult } from './types';

/**
 * Euclidean distance between each pair of points at the same index.
 * The longer sequence is cut to the length of the shorter one.
 */
export function pointDistances(
  data1: readonly Point[],
  data2: readonly Point[],
  policy: NumericPolicy = config.NUMERIC_POLICY
): number[] {
  let longer = data1;
  let shorter = data2;
  if (shorter.length > longer.length) {
    [longer, shorter] = [shorter, longer];
  }

  return shorter.map((point, i) => {
    const dx = longer[i][0] - point[0];
    const dy = longer[i][1] - point[1];
    // squares overflow before the root does, which is what the policy must see
    const squared = checkFinite(dx * dx + dy * dy, 'squared distance', policy);
    return Math.sqrt(squared);
  });
}

/**
 * Population mean and standard deviation of the distances
 */
export function computeSimilarity(
  data1: readonly Point[],
  data2: readonly Point[],
  policy: NumericPolicy = config.NUMERIC_POLICY
): SimilarityResult {
  const distances = pointDistances(data1, data2, policy);

  const mean = checkFinite(distances.reduce((a, b) => a + b, 0) / distances.length, 'mean distance', policy);

  const squaredDiffs = distances.map((d) => Math.pow(d - mean, 2));
  const variance = checkFinite(squaredDiffs.reduce((a, b) => a + b, 0) / distances.length, 'distance variance', policy);

  return { mean, std: Math.sqrt(variance) };
}
