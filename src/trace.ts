/**
 * Cursor traces
 * @module trace
 */

import { EmptyTraceError, InputError } from './errors';
import { Point, ReplayEvent, Sample } from './types';

/**
 * One player's recorded cursor movement, ordered by time.
 *
 * Samples are sorted once at construction (replay data has been seen with
 * time running backwards) and frozen afterwards.
 */
export class Trace {
  readonly owner: string;
  readonly samples: readonly Sample[];

  private constructor(owner: string, samples: Sample[]) {
    this.owner = owner;
    this.samples = Object.freeze(samples.map((s) => Object.freeze({ ...s })));
  }

  /**
   * Build a trace from per-event time deltas
   */
  static fromDeltas(owner: string, events: readonly ReplayEvent[]): Trace {
    if (events.length === 0) {
      throw new EmptyTraceError(owner);
    }

    let t = 0;
    const samples = events.map((event) => {
      t += event.dt;
      return { t, x: event.x, y: event.y };
    });

    return new Trace(owner, sortByTime(samples));
  }

  /**
   * Build a trace from samples that already carry absolute timestamps
   */
  static fromSamples(owner: string, samples: readonly Sample[]): Trace {
    if (samples.length === 0) {
      throw new EmptyTraceError(owner);
    }
    return new Trace(owner, sortByTime([...samples]));
  }

  get length(): number {
    return this.samples.length;
  }

  get duration(): number {
    return this.samples[this.samples.length - 1].t - this.samples[0].t;
  }

  /**
   * Copy of the samples, for the sequence-level utilities
   */
  toSamples(): Sample[] {
    return this.samples.map((s) => ({ ...s }));
  }

  /**
   * Same owner, new samples
   */
  withSamples(samples: readonly Sample[]): Trace {
    return Trace.fromSamples(this.owner, samples);
  }
}

// Array.prototype.sort is stable, so equal timestamps keep event order
function sortByTime(samples: Sample[]): Sample[] {
  return samples.sort((a, b) => a.t - b.t);
}

/**
 * Drop the time column
 */
export function toPoints(samples: readonly Sample[]): Point[] {
  return samples.map((s) => [s.x, s.y] as const);
}

/**
 * Finite-difference velocity between consecutive samples, in units per ms.
 * Pairs sharing a timestamp have no defined velocity and are skipped.
 */
export function velocity(samples: readonly Sample[]): Sample[] {
  if (samples.length < 2) {
    throw new InputError('Velocity needs at least 2 samples');
  }

  const result: Sample[] = [];
  for (let i = 1; i < samples.length; i++) {
    const dt = samples[i].t - samples[i - 1].t;
    if (dt === 0) continue;
    result.push({
      t: samples[i].t,
      x: (samples[i].x - samples[i - 1].x) / dt,
      y: (samples[i].y - samples[i - 1].y) / dt,
    });
  }
  return result;
}
