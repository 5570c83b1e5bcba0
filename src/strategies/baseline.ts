import { fail, ok, type FtlResult } from "../errors";
import type { GcOutcome, PhysicalAddress } from "../types/types";
import { migrateAndErase } from "./migrate";
import type { AllocateOptions, FtlStrategy, StrategyContext } from "./types";

/**
 * Fixed first-fit baseline: a rotating allocation cursor and greedy
 * (most-invalid) victim selection. No wear awareness.
 */
export class BaselineStrategy implements FtlStrategy {
  readonly name = "baseline" as const;
  private cursor = 0;

  /** Block the allocator is currently filling */
  get activeBlock(): number {
    return this.cursor;
  }

  allocatePage(
    ctx: StrategyContext,
    options?: AllocateOptions,
  ): FtlResult<PhysicalAddress> {
    const { device } = ctx;
    for (let scanned = 0; scanned < device.totalBlocks; scanned += 1) {
      const block = device.block(this.cursor);
      if (block.id !== options?.excludeBlock && !block.isFull) {
        return ok({ blockId: block.id, pageIndex: block.writeCursor });
      }
      this.cursor = (this.cursor + 1) % device.totalBlocks;
    }
    return fail(
      "E_ALLOCATION_EXHAUSTED",
      "No block has a free page after a full rotation",
    );
  }

  /**
   * Victim: the block with the most INVALID pages, first one wins ties.
   * The active block is skipped while it still has room.
   */
  selectVictim(ctx: StrategyContext): number | undefined {
    let victim: number | undefined;
    let maxInvalid = 0;
    for (const block of ctx.device.allBlocks()) {
      if (block.id === this.cursor && !block.isFull) continue;
      if (block.invalidPages > maxInvalid) {
        maxInvalid = block.invalidPages;
        victim = block.id;
      }
    }
    return victim;
  }

  garbageCollect(ctx: StrategyContext): GcOutcome {
    const victim = this.selectVictim(ctx);
    if (victim === undefined) {
      return { status: "noop", migrated: 0, reclaimed: 0 };
    }
    return migrateAndErase(this, ctx, victim);
  }
}
