/**
 * FlashTranslationLayer - host-facing write path
 *
 * Owns the translation table and run counters, decides when GC runs, and
 * delegates physical placement and victim choice to the active strategy.
 * Everything is synchronous: a write, including any GC it triggers,
 * finishes before the next one starts.
 */

import type { FlashDevice } from "./device";
import { fail, ok, type FtlResult } from "./errors";
import {
  lifetimeEstimate,
  wearVariance,
  writeAmplification,
} from "./metrics";
import { FTL_DEFAULTS } from "./schema/config";
import type { FtlStrategy, StrategyContext } from "./strategies/types";
import { TranslationTable } from "./translation-table";
import { TypedEventEmitter } from "./typedEmitter";
import type {
  AdaptationReport,
  FeedbackSignals,
  FtlStats,
  GcOutcome,
  LogicalAddress,
  PagePayload,
  PhysicalAddress,
  ReadResult,
  RunCounters,
  ScoringWeights,
  StrategyName,
} from "./types/types";

export type GcReason = "free-space" | "invalid-ratio" | "forced" | "manual";

export interface FtlEvents {
  /**
   * Emitted after every GC pass, no-ops included. During a write,
   * `hostWrites` already counts that write, even if it is rejected later.
   */
  gc: GcOutcome & { reason: GcReason; hostWrites: number };
  /** Emitted when the strategy retunes its scoring weights */
  adapt: AdaptationReport & { hostWrites: number };
  /** Emitted when a write fails with E_STORAGE_EXHAUSTED; `hostWrites` is rolled back */
  rejected: { address: LogicalAddress; hostWrites: number; lostMapping: boolean };
}

export interface GcTrigger {
  triggered: boolean;
  reason?: "free-space" | "invalid-ratio";
  threshold: number;
  invalidRatio: number;
}

export interface FtlOptions {
  maxEraseLimit?: number;
}

const clampUnit = (value: number): number => Math.max(0, Math.min(1, value));

/**
 * Invalid-ratio threshold for proactive GC. Tolerates more garbage as
 * amplification climbs and less as wear spreads; clamped to [0, 1].
 */
export function gcThreshold(signals: FeedbackSignals): number {
  return clampUnit(
    FTL_DEFAULTS.GC_BASE_THRESHOLD +
      FTL_DEFAULTS.GC_WAF_COEFFICIENT * signals.waf -
      FTL_DEFAULTS.GC_VARIANCE_COEFFICIENT * signals.wearVariance,
  );
}

const isLogicalAddress = (value: number): boolean =>
  Number.isSafeInteger(value) && value >= 0;

export class FlashTranslationLayer extends TypedEventEmitter<FtlEvents> {
  readonly device: FlashDevice;
  readonly strategy: FtlStrategy;
  private readonly table = new TranslationTable();
  private readonly runCounters: RunCounters = {
    hostWrites: 0,
    physicalWrites: 0,
    gcInvocations: 0,
    rejectedWrites: 0,
    migratedPages: 0,
    blocksReclaimed: 0,
  };
  private readonly ctx: StrategyContext;
  readonly maxEraseLimit: number;

  constructor(device: FlashDevice, strategy: FtlStrategy, options?: FtlOptions) {
    super();
    this.device = device;
    this.strategy = strategy;
    this.maxEraseLimit = options?.maxEraseLimit ?? FTL_DEFAULTS.MAX_ERASE_LIMIT;
    this.ctx = {
      device,
      table: this.table,
      counters: this.runCounters,
      signals: () => this.signals(),
    };
  }

  get strategyName(): StrategyName {
    return this.strategy.name;
  }

  /**
   * Host write. Invalidates the previous copy, places the new one through
   * the strategy and remaps. Fails with E_STORAGE_EXHAUSTED when nothing
   * can be allocated even after one forced GC pass; a rejected write is
   * not counted as a host write.
   */
  write(address: LogicalAddress, data?: PagePayload): FtlResult<PhysicalAddress> {
    if (!isLogicalAddress(address)) {
      return fail(
        "E_INVALID_ADDRESS",
        `Logical address must be a non-negative integer, got ${address}`,
      );
    }

    this.runCounters.hostWrites += 1;

    const trigger = this.evaluateGcTrigger();
    if (trigger.reason) {
      this.runGc(trigger.reason);
    }

    const previous = this.table.lookup(address);
    if (previous) {
      this.device.invalidatePage(previous.blockId, previous.pageIndex);
    }

    let target = this.strategy.allocatePage(this.ctx);
    if (!target.ok) {
      this.runGc("forced");
      target = this.strategy.allocatePage(this.ctx);
    }
    if (!target.ok) {
      return this.reject(address, previous !== undefined);
    }

    const written = this.device.writePage(target.value.blockId, address, data);
    if (!written.ok) {
      return this.reject(address, previous !== undefined);
    }

    const placed: PhysicalAddress = {
      blockId: target.value.blockId,
      pageIndex: written.value,
    };
    this.table.remap(address, placed);
    this.runCounters.physicalWrites += 1;

    const report = this.strategy.afterHostWrite?.(this.ctx);
    if (report) {
      this.emit("adapt", { ...report, hostWrites: this.runCounters.hostWrites });
    }

    return ok(placed);
  }

  read(address: LogicalAddress): FtlResult<ReadResult> {
    const location = this.table.lookup(address);
    if (!location) {
      return fail("E_NOT_MAPPED", `Logical address ${address} is not mapped`);
    }
    const page = this.device.readPage(location.blockId, location.pageIndex);
    return ok({ address: location, data: page?.data });
  }

  /**
   * Run one GC pass outside the write path (idle-time collection).
   */
  collectGarbage(): GcOutcome {
    return this.runGc("manual");
  }

  lookup(address: LogicalAddress): PhysicalAddress | undefined {
    return this.table.lookup(address);
  }

  mappings(): Array<[LogicalAddress, PhysicalAddress]> {
    return this.table.entriesSnapshot();
  }

  /**
   * Proactive GC check run at the start of every write: free space down to
   * one block's worth, or the global invalid ratio over the threshold.
   */
  evaluateGcTrigger(): GcTrigger {
    const threshold = gcThreshold(this.signals());
    const invalidRatio =
      this.device.totalInvalidPages() / this.device.physicalPages;
    if (this.device.totalFreePages() <= this.device.pagesPerBlock) {
      return { triggered: true, reason: "free-space", threshold, invalidRatio };
    }
    if (invalidRatio > threshold) {
      return {
        triggered: true,
        reason: "invalid-ratio",
        threshold,
        invalidRatio,
      };
    }
    return { triggered: false, threshold, invalidRatio };
  }

  counters(): RunCounters {
    return { ...this.runCounters };
  }

  get hostWrites(): number {
    return this.runCounters.hostWrites;
  }

  get physicalWrites(): number {
    return this.runCounters.physicalWrites;
  }

  get gcInvocations(): number {
    return this.runCounters.gcInvocations;
  }

  eraseCounts(): number[] {
    return this.device.eraseCounts();
  }

  waf(): number {
    return writeAmplification(this.runCounters);
  }

  wearVariance(): number {
    return wearVariance(this.device.eraseCounts());
  }

  lifetimeEstimate(): number {
    return lifetimeEstimate(
      this.device.eraseCounts(),
      this.runCounters.hostWrites,
      this.maxEraseLimit,
    );
  }

  /** Scoring weights of the adaptive strategy; undefined for baseline */
  weights(): ScoringWeights | undefined {
    return this.strategy.weights?.();
  }

  signals(): FeedbackSignals {
    return { waf: this.waf(), wearVariance: this.wearVariance() };
  }

  stats(): FtlStats {
    return {
      ...this.counters(),
      strategy: this.strategy.name,
      waf: this.waf(),
      wearVariance: this.wearVariance(),
      lifetimeEstimate: this.lifetimeEstimate(),
      freePages: this.device.totalFreePages(),
      validPages: this.device.totalValidPages(),
      invalidPages: this.device.totalInvalidPages(),
      mappedAddresses: this.table.size,
    };
  }

  private runGc(reason: GcReason): GcOutcome {
    this.runCounters.gcInvocations += 1;
    const outcome = this.strategy.garbageCollect(this.ctx);
    this.emit("gc", {
      ...outcome,
      reason,
      hostWrites: this.runCounters.hostWrites,
    });
    return outcome;
  }

  /**
   * Roll back the host write count and, for an overwrite, drop the
   * mapping: its old copy is already invalid and nothing replaced it.
   */
  private reject(
    address: LogicalAddress,
    overwrite: boolean,
  ): FtlResult<PhysicalAddress> {
    this.runCounters.hostWrites -= 1;
    this.runCounters.rejectedWrites += 1;
    if (overwrite) {
      this.table.forget(address);
    }
    this.emit("rejected", {
      address,
      hostWrites: this.runCounters.hostWrites,
      lostMapping: overwrite,
    });
    return fail(
      "E_STORAGE_EXHAUSTED",
      `No free page for logical address ${address} after a forced GC pass`,
    );
  }
}
