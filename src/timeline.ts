/**
 * Timeline utilities that prepare a trace for alignment
 * @module timeline
 */

import config from './config';
import { InputError } from './errors';
import { interpolate } from './interpolation';
import { Sample } from './types';

/**
 * Collapse pauses longer than `breakThreshold` ms to zero width.
 *
 * The whole gap is removed, not just the part above the threshold, and
 * every later sample is shifted by the running total.
 */
export function skipBreaks(samples: readonly Sample[], breakThreshold: number = config.BREAK_THRESHOLD_MS): Sample[] {
  if (samples.length === 0) return [];

  let totalBreakTime = 0;
  let tPrev = samples[0].t;
  const skipped: Sample[] = [];

  for (const sample of samples) {
    const dt = sample.t - tPrev;
    if (dt > breakThreshold) {
      totalBreakTime += dt;
    }
    skipped.push({ t: sample.t - totalBreakTime, x: sample.x, y: sample.y });
    tPrev = sample.t;
  }

  return skipped;
}

/**
 * Resample to a constant interval of `1000 / frequency` ms by linear
 * interpolation.
 */
export function resample(samples: readonly Sample[], frequency: number): Sample[] {
  if (samples.length < 2) {
    throw new InputError('Resampling needs at least 2 samples');
  }
  if (!Number.isFinite(frequency) || frequency <= 0) {
    throw new InputError(`Invalid resampling frequency: ${frequency}`);
  }

  const step = 1000 / frequency;
  const tMin = samples[0].t;
  const tMax = samples[samples.length - 1].t;
  const count = Math.floor(((tMax - tMin) * frequency) / 1000);

  const resampled: Sample[] = [];
  let i = 1;

  for (let k = 0; k < count; k++) {
    // multiply instead of accumulating so the spacing does not drift
    const t = tMin + k * step;
    while (i < samples.length - 1 && samples[i].t < t) {
      i++;
    }

    const before = samples[i - 1];
    const after = samples[i];
    const span = after.t - before.t;

    if (span === 0) {
      resampled.push({ t, x: before.x, y: before.y });
      continue;
    }

    const [x, y] = interpolate('linear', [before.x, before.y], [after.x, after.y], (t - before.t) / span);
    resampled.push({ t, x, y });
  }

  return resampled;
}
