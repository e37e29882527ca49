/**
 * Trace alignment
 * @module aligner
 */

import config from './config';
import { InputError } from './errors';
import { interpolate } from './interpolation';
import { AlignedPair, InterpolationKind, Sample } from './types';

export interface AlignOptions {
  interpolation?: InterpolationKind;
  /** Return results in argument order instead of (reference, source) */
  preserveOrder?: boolean;
  /** Interpolated coordinates beyond this magnitude are replaced by the reference sample */
  outlierBound?: number;
}

/**
 * Interpolate one sequence onto the timestamps of the other.
 *
 * The sequence with fewer samples after trimming becomes the reference: its
 * samples are kept as `clean` and the other one is interpolated onto its
 * timestamps as `interpolated`. Reference samples past the end of the source
 * cannot be bracketed and are dropped from both.
 */
export function align(data1: readonly Sample[], data2: readonly Sample[], options: AlignOptions = {}): AlignedPair {
  const {
    interpolation = 'linear',
    preserveOrder = false,
    outlierBound = config.OUTLIER_BOUND,
  } = options;

  if (data1.length < 2 || data2.length < 2) {
    throw new InputError('Alignment needs at least 2 samples in each trace');
  }

  let a = data1;
  let b = data2;
  let flipped = false;

  // a starts no later than b
  if (a[0].t > b[0].t) {
    flipped = !flipped;
    [a, b] = [b, a];
  }

  const i = a.findIndex((s) => s.t > b[0].t);
  if (i === -1) {
    // a is over before b begins
    return { clean: [], interpolated: [] };
  }

  // the longer one keeps a leading sample so it still brackets b's start
  a = a.length < b.length ? a.slice(i) : a.slice(i - 1);

  if (a.length > b.length) {
    flipped = !flipped;
    [a, b] = [b, a];
  }

  const reference = a;
  const source = b;
  const last = source.length - 1;

  const clean: Sample[] = [];
  const interpolated: Sample[] = [];
  let j = 0;

  for (const sample of reference) {
    while (j < last && source[j].t < sample.t) {
      j++;
    }

    if (j === last) {
      break;
    }

    clean.push(sample);

    const before = source[j];
    const after = source[j + 1];
    const dtReference = sample.t - before.t;
    const dtSource = after.t - before.t;

    if (dtSource === 0) {
      interpolated.push({ t: sample.t, x: before.x, y: before.y });
      continue;
    }

    const [x, y] = interpolate(interpolation, [before.x, before.y], [after.x, after.y], dtReference / dtSource);

    if (Math.abs(x) > outlierBound || Math.abs(y) > outlierBound) {
      interpolated.push(sample);
      continue;
    }

    interpolated.push({ t: sample.t, x, y });
  }

  if (preserveOrder && flipped) {
    return { clean: interpolated, interpolated: clean };
  }

  return { clean, interpolated };
}
