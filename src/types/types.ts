export type LogicalAddress = number;

export type PagePayload = string | Uint8Array;

export interface PhysicalAddress {
  blockId: number;
  pageIndex: number;
}

export type StrategyName = "baseline" | "adaptive";

export interface DeviceGeometry {
  totalBlocks: number;
  pagesPerBlock: number;
  /** Physical headroom reserved beyond the logical space (0..1) */
  overprovisionRatio: number;
}

/**
 * Run counters owned by the write path. Strategies and metrics read them;
 * only the write path and GC migration advance them.
 */
export interface RunCounters {
  hostWrites: number;
  /** Every page program, host writes and GC migrations alike */
  physicalWrites: number;
  gcInvocations: number;
  /** Writes rejected with E_STORAGE_EXHAUSTED (not counted as host writes) */
  rejectedWrites: number;
  migratedPages: number;
  blocksReclaimed: number;
}

export interface ScoringWeights {
  /** Efficiency: reward for reclaiming blocks full of invalid pages */
  alpha: number;
  /** Wear: reward for picking less-erased blocks */
  beta: number;
  /** Migration cost: penalty for moving still-valid pages */
  gamma: number;
}

export interface FeedbackSignals {
  waf: number;
  wearVariance: number;
}

export type AdaptAction = "init" | "emergency" | "tuned" | "steady";

export interface AdaptationReport {
  round: number;
  action: AdaptAction;
  weights: ScoringWeights;
  wafAvg: number;
  varianceAvg: number;
}

export interface ReadResult {
  address: PhysicalAddress;
  data: PagePayload | undefined;
}

export type GcStatus = "noop" | "reclaimed" | "incomplete";

export interface GcOutcome {
  status: GcStatus;
  victim?: number;
  /** Valid pages copied out of the victim */
  migrated: number;
  /** Invalid pages freed by the erase (0 unless reclaimed) */
  reclaimed: number;
}

export interface FtlStats extends RunCounters {
  strategy: StrategyName;
  waf: number;
  wearVariance: number;
  lifetimeEstimate: number;
  freePages: number;
  validPages: number;
  invalidPages: number;
  mappedAddresses: number;
}
