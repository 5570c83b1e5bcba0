/**
 * Feedback signals and reporting.
 *
 * Everything here is a read over run counters and erase counts; nothing
 * mutates the device or a strategy, so the adaptive controller and
 * external reporting can query at any time.
 */

import { FTL_DEFAULTS } from "./schema/config";
import type {
  RunCounters,
  ScoringWeights,
  StrategyName,
} from "./types/types";

/**
 * Write amplification factor: physical programs per host write.
 * Defined as 1.0 before the first host write.
 */
export function writeAmplification(
  counters: Pick<RunCounters, "hostWrites" | "physicalWrites">,
): number {
  if (counters.hostWrites === 0) return 1.0;
  return counters.physicalWrites / counters.hostWrites;
}

/**
 * Population variance of per-block erase counts.
 */
export function wearVariance(eraseCounts: readonly number[]): number {
  if (eraseCounts.length === 0) return 0.0;
  const mean =
    eraseCounts.reduce((sum, count) => sum + count, 0) / eraseCounts.length;
  const squared = eraseCounts.reduce(
    (sum, count) => sum + (count - mean) ** 2,
    0,
  );
  return squared / eraseCounts.length;
}

/** Highest erase count; 0 for an empty device */
export function maxEraseCount(eraseCounts: readonly number[]): number {
  return eraseCounts.reduce((max, count) => (count > max ? count : max), 0);
}

/** Lowest erase count; 0 for an empty device */
export function minEraseCount(eraseCounts: readonly number[]): number {
  if (eraseCounts.length === 0) return 0;
  return eraseCounts.reduce(
    (min, count) => (count < min ? count : min),
    Number.POSITIVE_INFINITY,
  );
}

/**
 * Host writes the device survives before its most-worn block reaches the
 * P/E limit, extrapolated from the wear so far. Infinity until a block has
 * been erased.
 */
export function lifetimeEstimate(
  eraseCounts: readonly number[],
  hostWrites: number,
  maxEraseLimit: number = FTL_DEFAULTS.MAX_ERASE_LIMIT,
): number {
  const maxErase = maxEraseCount(eraseCounts);
  if (maxErase === 0) return Number.POSITIVE_INFINITY;
  return (maxEraseLimit / maxErase) * hostWrites;
}

/**
 * Source the recorder and summary read from; FlashTranslationLayer
 * satisfies it structurally.
 */
export interface MetricsSource {
  readonly strategyName: StrategyName;
  counters(): RunCounters;
  eraseCounts(): number[];
  weights(): ScoringWeights | undefined;
}

export interface MetricsCheckpoint {
  hostWrites: number;
  physicalWrites: number;
  waf: number;
  wearVariance: number;
  /** Infinity is recorded as 0 so the series stays plottable */
  lifetimeEstimate: number;
}

export interface MetricsSummary {
  strategy: StrategyName;
  hostWrites: number;
  physicalWrites: number;
  rejectedWrites: number;
  waf: number;
  wearVariance: number;
  lifetimeEstimate: number;
  gcInvocations: number;
  blocksReclaimed: number;
  migratedPages: number;
  maxEraseCount: number;
  minEraseCount: number;
  eraseCounts: number[];
  weights?: ScoringWeights;
}

export function summarize(
  source: MetricsSource,
  maxEraseLimit: number = FTL_DEFAULTS.MAX_ERASE_LIMIT,
): MetricsSummary {
  const counters = source.counters();
  const eraseCounts = source.eraseCounts();
  const weights = source.weights();
  return {
    strategy: source.strategyName,
    hostWrites: counters.hostWrites,
    physicalWrites: counters.physicalWrites,
    rejectedWrites: counters.rejectedWrites,
    waf: writeAmplification(counters),
    wearVariance: wearVariance(eraseCounts),
    lifetimeEstimate: lifetimeEstimate(
      eraseCounts,
      counters.hostWrites,
      maxEraseLimit,
    ),
    gcInvocations: counters.gcInvocations,
    blocksReclaimed: counters.blocksReclaimed,
    migratedPages: counters.migratedPages,
    maxEraseCount: maxEraseCount(eraseCounts),
    minEraseCount: minEraseCount(eraseCounts),
    eraseCounts,
    ...(weights ? { weights } : {}),
  };
}

/**
 * Collects a checkpoint every `checkpointEvery` host writes to build the
 * time series reporting tools plot.
 */
export class MetricsRecorder {
  private readonly series: MetricsCheckpoint[] = [];
  private lastRecordedAt = 0;

  constructor(
    private readonly source: MetricsSource,
    private readonly checkpointEvery: number = FTL_DEFAULTS.CHECKPOINT_EVERY,
    private readonly maxEraseLimit: number = FTL_DEFAULTS.MAX_ERASE_LIMIT,
  ) {}

  /**
   * Record a checkpoint if a checkpoint boundary has been crossed since the
   * last one. Returns the new checkpoint, if any.
   */
  maybeRecord(): MetricsCheckpoint | undefined {
    const { hostWrites } = this.source.counters();
    if (hostWrites === 0 || hostWrites % this.checkpointEvery !== 0) {
      return undefined;
    }
    if (hostWrites === this.lastRecordedAt) return undefined;
    return this.record();
  }

  record(): MetricsCheckpoint {
    const counters = this.source.counters();
    const eraseCounts = this.source.eraseCounts();
    const lifetime = lifetimeEstimate(
      eraseCounts,
      counters.hostWrites,
      this.maxEraseLimit,
    );
    const checkpoint: MetricsCheckpoint = {
      hostWrites: counters.hostWrites,
      physicalWrites: counters.physicalWrites,
      waf: writeAmplification(counters),
      wearVariance: wearVariance(eraseCounts),
      lifetimeEstimate: Number.isFinite(lifetime) ? lifetime : 0,
    };
    this.series.push(checkpoint);
    this.lastRecordedAt = counters.hostWrites;
    return checkpoint;
  }

  get checkpoints(): readonly MetricsCheckpoint[] {
    return this.series;
  }
}
