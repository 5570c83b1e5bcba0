import type { GcOutcome } from "../types/types";
import type { FtlStrategy, StrategyContext } from "./types";

/**
 * Relocate every VALID page of `victimId` and erase the victim.
 *
 * Pages move in page order. Each new copy is written before the old copy
 * is invalidated and the mapping flipped, so an address is never without
 * a VALID page. The victim is never a destination. If allocation runs dry
 * part-way, migration stops and the victim is left unerased: its remaining
 * VALID pages keep their data and the outcome is "incomplete".
 */
export function migrateAndErase(
  strategy: FtlStrategy,
  ctx: StrategyContext,
  victimId: number,
): GcOutcome {
  const { device, table, counters } = ctx;
  const victim = device.block(victimId);
  let migrated = 0;

  for (const pageIndex of victim.validPageIndexes()) {
    const page = victim.page(pageIndex);
    if (!page || page.tag === undefined) continue;

    const target = strategy.allocatePage(ctx, { excludeBlock: victimId });
    if (!target.ok) {
      return { status: "incomplete", victim: victimId, migrated, reclaimed: 0 };
    }

    const written = device.writePage(target.value.blockId, page.tag, page.data);
    if (!written.ok) {
      return { status: "incomplete", victim: victimId, migrated, reclaimed: 0 };
    }

    victim.invalidate(pageIndex);
    table.remap(page.tag, {
      blockId: target.value.blockId,
      pageIndex: written.value,
    });
    counters.physicalWrites += 1;
    counters.migratedPages += 1;
    migrated += 1;
  }

  const reclaimed = victim.invalidPages - migrated;
  device.erase(victimId);
  counters.blocksReclaimed += 1;
  return { status: "reclaimed", victim: victimId, migrated, reclaimed };
}
