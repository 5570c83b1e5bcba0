import type { LogicalAddress, PhysicalAddress } from "./types/types";

/**
 * Logical → physical mapping. One entry per live logical address;
 * `lookup` returns undefined for addresses never written.
 */
export class TranslationTable {
  private readonly entries = new Map<LogicalAddress, PhysicalAddress>();

  lookup(address: LogicalAddress): PhysicalAddress | undefined {
    const entry = this.entries.get(address);
    return entry ? { ...entry } : undefined;
  }

  has(address: LogicalAddress): boolean {
    return this.entries.has(address);
  }

  /**
   * Point `address` at a new location, replacing any previous entry.
   * Returns the location it replaced.
   */
  remap(
    address: LogicalAddress,
    target: PhysicalAddress,
  ): PhysicalAddress | undefined {
    const previous = this.entries.get(address);
    this.entries.set(address, {
      blockId: target.blockId,
      pageIndex: target.pageIndex,
    });
    return previous;
  }

  /**
   * Drop an entry whose only copy was lost. Internal to the write path;
   * hosts have no delete operation.
   */
  forget(address: LogicalAddress): boolean {
    return this.entries.delete(address);
  }

  get size(): number {
    return this.entries.size;
  }

  entriesSnapshot(): Array<[LogicalAddress, PhysicalAddress]> {
    return Array.from(this.entries, ([address, target]) => [
      address,
      { ...target },
    ]);
  }
}
