import type { FlashDevice } from "../device";
import type { FtlResult } from "../errors";
import type { TranslationTable } from "../translation-table";
import type {
  AdaptationReport,
  FeedbackSignals,
  GcOutcome,
  PhysicalAddress,
  RunCounters,
  ScoringWeights,
  StrategyName,
} from "../types/types";

/**
 * State a strategy works on. The write path owns all of it and hands the
 * same context to every call; strategies keep only their own cursor or
 * controller.
 */
export interface StrategyContext {
  readonly device: FlashDevice;
  readonly table: TranslationTable;
  /** Live counters; GC migration advances physicalWrites et al. */
  readonly counters: RunCounters;
  signals(): FeedbackSignals;
}

export interface AllocateOptions {
  /** Block that must not receive the page (the GC victim during migration) */
  excludeBlock?: number;
}

export interface FtlStrategy {
  readonly name: StrategyName;

  /**
   * Find a free page. Fails with E_ALLOCATION_EXHAUSTED when no eligible
   * block has spare capacity.
   */
  allocatePage(
    ctx: StrategyContext,
    options?: AllocateOptions,
  ): FtlResult<PhysicalAddress>;

  /**
   * Select a victim, migrate its valid pages and erase it.
   * Counting the invocation is the caller's job.
   */
  garbageCollect(ctx: StrategyContext): GcOutcome;

  /**
   * Called after every accepted host write. Returns a report when the
   * strategy retuned itself on this write.
   */
  afterHostWrite?(ctx: StrategyContext): AdaptationReport | undefined;

  /** Current scoring weights, for strategies that score victims */
  weights?(): ScoringWeights;
}
