/**
 * Logical-address streams for driving the simulator.
 *
 * All generators are deterministic for a given seed so two strategies can
 * be compared on the identical sequence.
 */

import type { LogicalAddress } from "./types/types";

export type WorkloadKind = "sequential" | "random" | "hotspot" | "mixed";

/**
 * mulberry32 PRNG. Small state, good enough spread for workload shaping.
 */
export class SeededRandom {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  /** Float in [0, 1) */
  next(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  /** Integer in [min, max], both inclusive */
  int(min: number, max: number): number {
    return min + Math.floor(this.next() * (max - min + 1));
  }
}

export interface WorkloadOptions {
  /** Size of the logical address space; addresses are 0..maxAddress-1 */
  maxAddress: number;
  writes: number;
  seed?: number;
}

export interface HotspotOptions extends WorkloadOptions {
  /** Share of writes aimed at the hot region */
  hotRatio?: number;
  /** Share of the address space that is hot */
  hotFraction?: number;
}

export const WORKLOAD_DEFAULTS = {
  SEED: 1,
  HOT_RATIO: 0.8,
  HOT_FRACTION: 0.2,
  MIXED_SEQUENTIAL_SHARE: 0.5,
} as const;

function assertSpace(options: WorkloadOptions): void {
  if (!Number.isInteger(options.maxAddress) || options.maxAddress < 1) {
    throw new RangeError(
      `maxAddress must be a positive integer, got ${options.maxAddress}`,
    );
  }
  if (!Number.isInteger(options.writes) || options.writes < 0) {
    throw new RangeError(
      `writes must be a non-negative integer, got ${options.writes}`,
    );
  }
}

/** Video capture, backups: 0, 1, 2, … wrapping at maxAddress */
export function sequentialWorkload(options: WorkloadOptions): LogicalAddress[] {
  assertSpace(options);
  return Array.from(
    { length: options.writes },
    (_, i) => i % options.maxAddress,
  );
}

/** Databases, filesystem churn: uniform over the whole space */
export function randomWorkload(options: WorkloadOptions): LogicalAddress[] {
  assertSpace(options);
  const rng = new SeededRandom(options.seed ?? WORKLOAD_DEFAULTS.SEED);
  return Array.from({ length: options.writes }, () =>
    rng.int(0, options.maxAddress - 1),
  );
}

/**
 * Logs, caches, metadata: `hotRatio` of writes land in the first
 * `hotFraction` of the space, the rest in the cold remainder.
 */
export function hotspotWorkload(options: HotspotOptions): LogicalAddress[] {
  assertSpace(options);
  const rng = new SeededRandom(options.seed ?? WORKLOAD_DEFAULTS.SEED);
  const hotRatio = options.hotRatio ?? WORKLOAD_DEFAULTS.HOT_RATIO;
  const hotFraction = options.hotFraction ?? WORKLOAD_DEFAULTS.HOT_FRACTION;
  const hotLimit = Math.floor(options.maxAddress * hotFraction);
  const coldAvailable = hotLimit < options.maxAddress;

  return Array.from({ length: options.writes }, () => {
    const hot = rng.next() < hotRatio;
    if ((hot && hotLimit > 0) || !coldAvailable) {
      return rng.int(0, Math.max(hotLimit, 1) - 1);
    }
    return rng.int(hotLimit, options.maxAddress - 1);
  });
}

/** Half sequential, half uniform random */
export function mixedWorkload(options: WorkloadOptions): LogicalAddress[] {
  assertSpace(options);
  const rng = new SeededRandom(options.seed ?? WORKLOAD_DEFAULTS.SEED);
  let sequential = 0;
  return Array.from({ length: options.writes }, () => {
    if (rng.next() < WORKLOAD_DEFAULTS.MIXED_SEQUENTIAL_SHARE) {
      const address = sequential % options.maxAddress;
      sequential += 1;
      return address;
    }
    return rng.int(0, options.maxAddress - 1);
  });
}

export function createWorkload(
  kind: WorkloadKind,
  options: HotspotOptions,
): LogicalAddress[] {
  switch (kind) {
    case "sequential":
      return sequentialWorkload(options);
    case "random":
      return randomWorkload(options);
    case "hotspot":
      return hotspotWorkload(options);
    case "mixed":
      return mixedWorkload(options);
  }
}

export interface WorkloadAnalysis {
  totalWrites: number;
  uniqueAddresses: number;
  /** Writes that land on an address already written, in percent */
  overwritePercent: number;
  /** Writes below `hotLimit`, in percent */
  hotWritePercent: number;
  coldWritePercent: number;
  averageWritesPerAddress: number;
  maxWritesPerAddress: number;
  /** Busiest addresses first; ties keep first-seen order */
  hottest: Array<{ address: LogicalAddress; writes: number }>;
}

export interface AnalyzeOptions {
  /** Addresses below this bound form the hot region */
  hotLimit: number;
  /** Length of the `hottest` list, default 10 */
  top?: number;
}

/**
 * Shape statistics for an address stream. Pure; an empty stream reports
 * zeros throughout.
 */
export function analyzeWorkload(
  addresses: readonly LogicalAddress[],
  options: AnalyzeOptions,
): WorkloadAnalysis {
  const frequency = new Map<LogicalAddress, number>();
  let hotWrites = 0;
  for (const address of addresses) {
    frequency.set(address, (frequency.get(address) ?? 0) + 1);
    if (address < options.hotLimit) hotWrites += 1;
  }

  const total = addresses.length;
  const unique = frequency.size;
  const percentOf = (count: number): number =>
    total > 0 ? (count / total) * 100 : 0;
  const hottest = Array.from(frequency, ([address, writes]) => ({
    address,
    writes,
  }))
    .sort((a, b) => b.writes - a.writes)
    .slice(0, options.top ?? 10);

  return {
    totalWrites: total,
    uniqueAddresses: unique,
    overwritePercent: total > 0 ? (1 - unique / total) * 100 : 0,
    hotWritePercent: percentOf(hotWrites),
    coldWritePercent: percentOf(total - hotWrites),
    averageWritesPerAddress: unique > 0 ? total / unique : 0,
    maxWritesPerAddress: hottest.length > 0 ? hottest[0].writes : 0,
    hottest,
  };
}
