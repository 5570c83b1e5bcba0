/**
 * Flash device model: pages, blocks and the three block-level operations
 * (program, invalidate, erase). Holds no policy; allocation and GC live in
 * the strategies.
 *
 * NAND constraints modelled here:
 * - pages are programmed strictly in order through a per-block write cursor
 * - a programmed page is never rewritten in place; only an erase frees it
 * - erase works on whole blocks and bumps the block's P/E counter
 */

import { fail, FtlError, ok, type FtlResult } from "./errors";
import {
  deviceGeometrySchema,
  parseConfig,
  type DeviceGeometryInput,
} from "./schema/config";
import type {
  DeviceGeometry,
  LogicalAddress,
  PagePayload,
} from "./types/types";

export enum PageState {
  FREE = "free",
  VALID = "valid",
  INVALID = "invalid",
}

export interface PageView {
  readonly state: PageState;
  /** Logical address the page holds, or held before invalidation */
  readonly tag: LogicalAddress | undefined;
  readonly data: PagePayload | undefined;
}

interface Page {
  state: PageState;
  tag: LogicalAddress | undefined;
  data: PagePayload | undefined;
}

const freshPage = (): Page => ({
  state: PageState.FREE,
  tag: undefined,
  data: undefined,
});

export class Block {
  readonly id: number;
  readonly capacity: number;
  private pages: Page[];
  private cursor = 0;
  private valid = 0;
  private invalid = 0;
  private erases = 0;

  constructor(id: number, capacity: number) {
    this.id = id;
    this.capacity = capacity;
    this.pages = Array.from({ length: capacity }, freshPage);
  }

  get eraseCount(): number {
    return this.erases;
  }

  /** Next unused page slot; equals capacity once the block is full */
  get writeCursor(): number {
    return this.cursor;
  }

  get freePages(): number {
    return this.capacity - this.cursor;
  }

  get validPages(): number {
    return this.valid;
  }

  get invalidPages(): number {
    return this.invalid;
  }

  get isFull(): boolean {
    return this.cursor >= this.capacity;
  }

  page(index: number): PageView | undefined {
    return this.pages[index];
  }

  /**
   * Program the page under the write cursor. Never erases implicitly.
   */
  write(tag: LogicalAddress, data?: PagePayload): FtlResult<number> {
    if (this.cursor >= this.capacity) {
      return fail("E_BLOCK_FULL", `Block ${this.id} has no free pages`);
    }
    const index = this.cursor;
    this.pages[index] = { state: PageState.VALID, tag, data };
    this.cursor += 1;
    this.valid += 1;
    return ok(index);
  }

  /**
   * VALID → INVALID. Any other state (or an out-of-range index) is a no-op,
   * so repeating the call is harmless.
   */
  invalidate(index: number): boolean {
    const page = this.pages[index];
    if (!page || page.state !== PageState.VALID) {
      return false;
    }
    page.state = PageState.INVALID;
    this.valid -= 1;
    this.invalid += 1;
    return true;
  }

  /**
   * Reset every page to FREE. Does not check for VALID pages: migrating
   * them first is the caller's job, and anything left is discarded.
   */
  erase(): void {
    this.pages = Array.from({ length: this.capacity }, freshPage);
    this.cursor = 0;
    this.valid = 0;
    this.invalid = 0;
    this.erases += 1;
  }

  /**
   * Indexes of VALID pages in page order.
   */
  validPageIndexes(): number[] {
    const indexes: number[] = [];
    this.pages.forEach((page, index) => {
      if (page.state === PageState.VALID) indexes.push(index);
    });
    return indexes;
  }
}

export class FlashDevice {
  readonly totalBlocks: number;
  readonly pagesPerBlock: number;
  readonly overprovisionRatio: number;
  private readonly blocks: Block[];

  constructor(
    totalBlocks: number,
    pagesPerBlock: number,
    overprovisionRatio?: number,
  ) {
    const geometry: DeviceGeometry = parseConfig(
      deviceGeometrySchema,
      { totalBlocks, pagesPerBlock, overprovisionRatio },
      "device geometry",
    );
    this.totalBlocks = geometry.totalBlocks;
    this.pagesPerBlock = geometry.pagesPerBlock;
    this.overprovisionRatio = geometry.overprovisionRatio;
    this.blocks = Array.from(
      { length: geometry.totalBlocks },
      (_, id) => new Block(id, geometry.pagesPerBlock),
    );
  }

  static fromGeometry(input: DeviceGeometryInput): FlashDevice {
    return new FlashDevice(
      input.totalBlocks,
      input.pagesPerBlock,
      input.overprovisionRatio,
    );
  }

  get geometry(): DeviceGeometry {
    return {
      totalBlocks: this.totalBlocks,
      pagesPerBlock: this.pagesPerBlock,
      overprovisionRatio: this.overprovisionRatio,
    };
  }

  get physicalPages(): number {
    return this.totalBlocks * this.pagesPerBlock;
  }

  /** Blocks held back as GC headroom. Informational; never enforced. */
  get reservedBlocks(): number {
    return Math.floor(this.totalBlocks * this.overprovisionRatio);
  }

  get logicalBlocks(): number {
    return this.totalBlocks - this.reservedBlocks;
  }

  /** Addressable logical pages implied by the over-provisioning ratio */
  get logicalPages(): number {
    return Math.floor(this.physicalPages * (1 - this.overprovisionRatio));
  }

  block(blockId: number): Block {
    const block = this.blocks[blockId];
    if (!block) {
      throw new FtlError(
        "E_INVALID_ADDRESS",
        `Block ${blockId} is outside 0..${this.totalBlocks - 1}`,
      );
    }
    return block;
  }

  allBlocks(): readonly Block[] {
    return this.blocks;
  }

  writePage(
    blockId: number,
    tag: LogicalAddress,
    data?: PagePayload,
  ): FtlResult<number> {
    return this.block(blockId).write(tag, data);
  }

  invalidatePage(blockId: number, pageIndex: number): boolean {
    return this.block(blockId).invalidate(pageIndex);
  }

  erase(blockId: number): void {
    this.block(blockId).erase();
  }

  readPage(blockId: number, pageIndex: number): PageView | undefined {
    return this.block(blockId).page(pageIndex);
  }

  eraseCounts(): number[] {
    return this.blocks.map(block => block.eraseCount);
  }

  totalFreePages(): number {
    return this.blocks.reduce((sum, block) => sum + block.freePages, 0);
  }

  totalValidPages(): number {
    return this.blocks.reduce((sum, block) => sum + block.validPages, 0);
  }

  totalInvalidPages(): number {
    return this.blocks.reduce((sum, block) => sum + block.invalidPages, 0);
  }
}
