import { expect } from "vitest";
import type { FlashDevice } from "../src/device";
import { FtlError, type FtlErrorCode, type FtlResult } from "../src/errors";
import { wearVariance, writeAmplification } from "../src/metrics";
import type { StrategyContext } from "../src/strategies/types";
import { TranslationTable } from "../src/translation-table";

export function expectFtlError(fn: () => unknown, code: FtlErrorCode): FtlError {
  let caught: unknown;
  try {
    fn();
  } catch (error) {
    caught = error;
  }
  if (!(caught instanceof FtlError)) {
    throw new Error(`expected an FtlError with code ${code}`);
  }
  expect(caught.code).toBe(code);
  return caught;
}

export function expectFailure<T>(
  result: FtlResult<T>,
  code: FtlErrorCode,
): FtlError {
  if (result.ok) {
    throw new Error(`expected a ${code} failure`);
  }
  expect(result.error.code).toBe(code);
  return result.error;
}

/** Bare strategy context over a device, for driving a strategy directly */
export function createContext(device: FlashDevice): StrategyContext {
  const counters = {
    hostWrites: 0,
    physicalWrites: 0,
    gcInvocations: 0,
    rejectedWrites: 0,
    migratedPages: 0,
    blocksReclaimed: 0,
  };
  return {
    device,
    table: new TranslationTable(),
    counters,
    signals: () => ({
      waf: writeAmplification(counters),
      wearVariance: wearVariance(device.eraseCounts()),
    }),
  };
}

/** Program `tags` into a block, then invalidate the listed page indexes */
export function fillBlock(
  device: FlashDevice,
  blockId: number,
  tags: number[],
  invalid: number[] = [],
): void {
  for (const tag of tags) {
    device.writePage(blockId, tag);
  }
  for (const pageIndex of invalid) {
    device.invalidatePage(blockId, pageIndex);
  }
}
