/**
 * Coordinate interpolation between two bracketing samples
 * @module interpolation
 */

import { InterpolationKind, Point } from './types';

type Interpolator = (from: Point, to: Point, ratio: number) => Point;

const interpolators: Record<InterpolationKind, Interpolator> = {
  // Weighted average by time ratio
  linear: (from, to, ratio) => [
    (1 - ratio) * from[0] + ratio * to[0],
    (1 - ratio) * from[1] + ratio * to[1],
  ],
  // Hold the earlier bracket, for signals that must not be smoothed
  stepBefore: (from) => [from[0], from[1]],
};

export const INTERPOLATION_KINDS: readonly InterpolationKind[] = ['linear', 'stepBefore'];

export function isInterpolationKind(value: unknown): value is InterpolationKind {
  return typeof value === 'string' && (INTERPOLATION_KINDS as readonly string[]).includes(value);
}

export function interpolate(kind: InterpolationKind, from: Point, to: Point, ratio: number): Point {
  return interpolators[kind](from, to, ratio);
}
