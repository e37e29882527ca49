/**
 * Tests for break skipping and resampling
 */

import { InputError } from '../src/errors';
import { resample, skipBreaks } from '../src/timeline';
import { Sample } from '../src/types';

const s = (t: number, x: number, y: number): Sample => ({ t, x, y });

describe('skipBreaks', () => {
  it('removes a whole break from every later timestamp', () => {
    const samples = [s(0, 1, 1), s(100, 2, 2), s(2100, 3, 3), s(2200, 4, 4)];

    expect(skipBreaks(samples, 1000)).toEqual([s(0, 1, 1), s(100, 2, 2), s(100, 3, 3), s(200, 4, 4)]);
  });

  it('accumulates several breaks', () => {
    const samples = [s(0, 0, 0), s(1500, 0, 0), s(1600, 0, 0), s(3000, 0, 0)];

    expect(skipBreaks(samples, 1000).map((p) => p.t)).toEqual([0, 0, 100, 100]);
  });

  it('leaves gaps at the threshold untouched', () => {
    const samples = [s(0, 0, 0), s(1000, 0, 0), s(1500, 0, 0)];

    expect(skipBreaks(samples, 1000)).toEqual(samples);
  });

  it('uses a 1000ms threshold by default', () => {
    const samples = [s(50, 0, 0), s(1051, 0, 0)];

    expect(skipBreaks(samples).map((p) => p.t)).toEqual([50, 50]);
  });

  it('keeps every sample and no gap above the threshold', () => {
    const samples = [s(0, 0, 0), s(300, 1, 1), s(5300, 2, 2), s(5400, 3, 3), s(9000, 4, 4)];
    const skipped = skipBreaks(samples, 1000);

    expect(skipped).toHaveLength(samples.length);
    for (let i = 1; i < skipped.length; i++) {
      expect(skipped[i].t - skipped[i - 1].t).toBeLessThanOrEqual(1000);
    }
  });

  it('returns an empty list for no samples', () => {
    expect(skipBreaks([])).toEqual([]);
  });
});

describe('resample', () => {
  const samples = [s(0, 0, 0), s(10, 10, 20), s(40, 40, 80)];

  it('emits evenly spaced samples', () => {
    const resampled = resample(samples, 100);

    expect(resampled.map((p) => p.t)).toEqual([0, 10, 20, 30]);
    for (let i = 1; i < resampled.length; i++) {
      expect(resampled[i].t - resampled[i - 1].t).toBe(10);
    }
  });

  it('interpolates linearly inside each bracket', () => {
    const resampled = resample(samples, 100);

    expect(resampled[0]).toEqual(s(0, 0, 0));
    expect(resampled[1]).toEqual(s(10, 10, 20));
    expect(resampled[2].x).toBeCloseTo(20);
    expect(resampled[2].y).toBeCloseTo(40);
    expect(resampled[3].x).toBeCloseTo(30);
    expect(resampled[3].y).toBeCloseTo(60);
  });

  it('emits floor(duration * frequency / 1000) samples', () => {
    expect(resample(samples, 50)).toHaveLength(2);
    expect(resample([s(0, 0, 0), s(1000, 0, 0)], 60)).toHaveLength(60);
  });

  it('needs at least 2 samples', () => {
    expect(() => resample([s(0, 0, 0)], 60)).toThrow(InputError);
  });

  it('rejects non-positive frequencies', () => {
    expect(() => resample(samples, 0)).toThrow(InputError);
    expect(() => resample(samples, -5)).toThrow(InputError);
  });
});
