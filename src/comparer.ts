/**
 * Pairwise replay comparison
 * @module comparer
 */

import { align } from './aligner';
import config from './config';
import { InputError, InvalidModeError } from './errors';
import Logger from './logger';
import { computeSimilarity } from './similarity';
import { skipBreaks } from './timeline';
import { toPoints, Trace } from './trace';
import {
  BatchCounts,
  BatchSummary,
  ComparisonMode,
  ComparisonOutcome,
  InterpolationKind,
  NumericPolicy,
  SimilarityResult,
} from './types';

export interface ComparerOptions {
  /** Owners exempt from being compared with each other */
  trusted?: ReadonlySet<string>;
  interpolation?: InterpolationKind;
  outlierBound?: number;
  numericPolicy?: NumericPolicy;
  /** Collapse idle gaps longer than this many ms before aligning */
  breakThreshold?: number | null;
}

type TracePair = [Trace, Trace];

export function isComparisonMode(value: unknown): value is ComparisonMode {
  return value === 'double' || value === 'single';
}

function* product(first: readonly Trace[], second: readonly Trace[]): Generator<TracePair> {
  for (const a of first) {
    for (const b of second) {
      yield [a, b];
    }
  }
}

function* combinations(traces: readonly Trace[]): Generator<TracePair> {
  for (let i = 0; i < traces.length; i++) {
    for (let j = i + 1; j < traces.length; j++) {
      yield [traces[i], traces[j]];
    }
  }
}

/**
 * Compares sets of traces and reports the pairs whose mean distance falls
 * below the threshold.
 *
 * The order of the two sets does not matter: comparing 1 to 2 is the same
 * as comparing 2 to 1.
 */
export class Comparer {
  readonly threshold: number;
  readonly replays1: readonly Trace[];
  readonly replays2: readonly Trace[] | null;
  private readonly trusted: ReadonlySet<string>;
  private readonly interpolation: InterpolationKind;
  private readonly outlierBound: number;
  private readonly numericPolicy: NumericPolicy;
  private readonly breakThreshold: number | null;

  constructor(threshold: number, replays1: readonly Trace[], replays2: readonly Trace[] | null = null, options: ComparerOptions = {}) {
    this.threshold = threshold;
    this.replays1 = replays1;
    this.replays2 = replays2;
    this.trusted = options.trusted ?? config.TRUSTED_PLAYERS;
    this.interpolation = options.interpolation ?? 'linear';
    this.outlierBound = options.outlierBound ?? config.OUTLIER_BOUND;
    this.numericPolicy = options.numericPolicy ?? config.NUMERIC_POLICY;
    this.breakThreshold = options.breakThreshold ?? null;
  }

  /**
   * Lazily yield every flagged pair.
   *
   * "double" compares every trace in the first set with every trace in the
   * second; "single" compares every trace in the first set with every other
   * one, each unordered pair once. The mode is checked before the first pair
   * is produced. Once exhausted the generator returns its own counts.
   */
  compare(mode: unknown): Generator<ComparisonOutcome, BatchCounts> {
    if (!isComparisonMode(mode)) {
      throw new InvalidModeError(mode);
    }

    let pairs: Generator<TracePair>;
    if (mode === 'double') {
      if (this.replays2 === null) {
        throw new InputError('"double" mode needs a second set of replays');
      }
      Logger.debug(`Comparing ${this.replays1.length} replays against ${this.replays2.length}`);
      pairs = product(this.replays1, this.replays2);
    } else {
      Logger.debug(`Comparing ${this.replays1.length} replays against each other`);
      pairs = combinations(this.replays1);
    }

    return this.run(pairs);
  }

  /**
   * Run a whole batch and count what was compared and skipped
   */
  collect(mode: unknown): BatchSummary {
    const batch = this.compare(mode);
    const outcomes: ComparisonOutcome[] = [];

    let step = batch.next();
    while (!step.done) {
      outcomes.push(step.value);
      step = batch.next();
    }

    const { compared, skipped } = step.value;
    Logger.batchEvent('completed', { compared, skipped, flagged: outcomes.length });
    return { outcomes, compared, skipped };
  }

  /**
   * True if both players are trusted or they are the same player
   */
  isExempt(player1: string, player2: string): boolean {
    return (this.trusted.has(player1) && this.trusted.has(player2)) || player1 === player2;
  }

  /**
   * Mean distance and standard deviation between two traces
   */
  compareTraces(replay1: Trace, replay2: Trace): SimilarityResult {
    return Comparer.compareTraces(replay1, replay2, {
      interpolation: this.interpolation,
      outlierBound: this.outlierBound,
      numericPolicy: this.numericPolicy,
      breakThreshold: this.breakThreshold,
    });
  }

  static compareTraces(replay1: Trace, replay2: Trace, options: ComparerOptions = {}): SimilarityResult {
    let data1 = replay1.toSamples();
    let data2 = replay2.toSamples();

    if (options.breakThreshold !== undefined && options.breakThreshold !== null) {
      data1 = skipBreaks(data1, options.breakThreshold);
      data2 = skipBreaks(data2, options.breakThreshold);
    }

    const { clean, interpolated } = align(data1, data2, {
      interpolation: options.interpolation,
      outlierBound: options.outlierBound,
    });

    return computeSimilarity(toPoints(clean), toPoints(interpolated), options.numericPolicy);
  }

  private *run(pairs: Generator<TracePair>): Generator<ComparisonOutcome, BatchCounts> {
    const counts: BatchCounts = { compared: 0, skipped: 0 };

    for (const [replay1, replay2] of pairs) {
      if (this.isExempt(replay1.owner, replay2.owner)) {
        counts.skipped++;
        continue;
      }

      const { mean, std } = this.compareTraces(replay1, replay2);
      counts.compared++;

      if (mean < this.threshold) {
        Logger.comparison(replay1.owner, replay2.owner, {
          mean: Number(mean.toFixed(1)),
          std: Number(std.toFixed(1)),
        });
        yield { ownerA: replay1.owner, ownerB: replay2.owner, mean, std };
      }
    }

    return counts;
  }
}
