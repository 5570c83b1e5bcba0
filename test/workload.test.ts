import { describe, expect, it } from "vitest";
import {
  SeededRandom,
  analyzeWorkload,
  createWorkload,
  hotspotWorkload,
  mixedWorkload,
  randomWorkload,
  sequentialWorkload,
} from "../src/workload";

describe("SeededRandom", () => {
  it("produces the mulberry32 sequence for a seed", () => {
    const rng = new SeededRandom(1);
    expect(rng.next()).toBeCloseTo(0.6270739405881613, 12);
    expect(rng.next()).toBeCloseTo(0.002735721180215478, 12);
    expect(rng.next()).toBeCloseTo(0.5274470399599522, 12);
  });

  it("draws inclusive integers", () => {
    const rng = new SeededRandom(42);
    expect(Array.from({ length: 8 }, () => rng.int(0, 9))).toEqual([
      6, 4, 8, 6, 1, 5, 2, 6,
    ]);
  });
});

describe("sequentialWorkload", () => {
  it("wraps at the end of the address space", () => {
    expect(sequentialWorkload({ maxAddress: 3, writes: 7 })).toEqual([
      0, 1, 2, 0, 1, 2, 0,
    ]);
  });
});

describe("randomWorkload", () => {
  it("stays inside the address space and repeats per seed", () => {
    const first = randomWorkload({ maxAddress: 50, writes: 500, seed: 3 });
    const again = randomWorkload({ maxAddress: 50, writes: 500, seed: 3 });
    const other = randomWorkload({ maxAddress: 50, writes: 500, seed: 4 });

    expect(again).toEqual(first);
    expect(other).not.toEqual(first);
    expect(Math.min(...first)).toBeGreaterThanOrEqual(0);
    expect(Math.max(...first)).toBeLessThanOrEqual(49);
  });
});

describe("hotspotWorkload", () => {
  it("sends about 80% of writes to the first 20% of addresses", () => {
    const writes = hotspotWorkload({ maxAddress: 100, writes: 10_000, seed: 1 });
    const hot = writes.filter(address => address < 20).length;
    expect(hot).toBe(7981);
  });

  it("honours an all-hot or all-cold ratio", () => {
    const hotOnly = hotspotWorkload({
      maxAddress: 100,
      writes: 1_000,
      hotRatio: 1,
    });
    const coldOnly = hotspotWorkload({
      maxAddress: 100,
      writes: 1_000,
      hotRatio: 0,
    });
    expect(hotOnly.every(address => address >= 0 && address < 20)).toBe(true);
    expect(coldOnly.every(address => address >= 20 && address < 100)).toBe(true);
  });

  it("falls back to the whole space when a region is empty", () => {
    const noHot = hotspotWorkload({ maxAddress: 10, writes: 200, hotFraction: 0 });
    const allHot = hotspotWorkload({ maxAddress: 10, writes: 200, hotFraction: 1 });
    expect(noHot.every(address => address >= 0 && address < 10)).toBe(true);
    expect(allHot.every(address => address >= 0 && address < 10)).toBe(true);
  });
});

describe("mixedWorkload", () => {
  it("interleaves a sequential stream with random addresses", () => {
    const writes = mixedWorkload({ maxAddress: 1_000, writes: 2_000, seed: 5 });
    expect(writes).toHaveLength(2_000);
    expect(writes.every(address => address >= 0 && address < 1_000)).toBe(true);
    expect(writes).toContain(0);
  });
});

describe("createWorkload", () => {
  it("dispatches by kind", () => {
    const options = { maxAddress: 64, writes: 128, seed: 11 };
    expect(createWorkload("sequential", options)).toEqual(sequentialWorkload(options));
    expect(createWorkload("random", options)).toEqual(randomWorkload(options));
    expect(createWorkload("hotspot", options)).toEqual(hotspotWorkload(options));
    expect(createWorkload("mixed", options)).toEqual(mixedWorkload(options));
  });

  it.each([
    [{ maxAddress: 0, writes: 10 }, "maxAddress must be a positive integer, got 0"],
    [{ maxAddress: 2.5, writes: 10 }, "maxAddress must be a positive integer, got 2.5"],
    [{ maxAddress: 10, writes: -1 }, "writes must be a non-negative integer, got -1"],
  ])("rejects %j", (options, message) => {
    expect(() => createWorkload("random", options)).toThrow(new RangeError(message));
  });
});

describe("analyzeWorkload", () => {
  it("counts overwrites, regions and the busiest addresses", () => {
    const analysis = analyzeWorkload([3, 1, 3, 2, 3, 1], { hotLimit: 2 });

    expect(analysis).toMatchObject({
      totalWrites: 6,
      uniqueAddresses: 3,
      overwritePercent: 50,
      averageWritesPerAddress: 2,
      maxWritesPerAddress: 3,
      hottest: [
        { address: 3, writes: 3 },
        { address: 1, writes: 2 },
        { address: 2, writes: 1 },
      ],
    });
    expect(analysis.hotWritePercent).toBeCloseTo(100 / 3, 10);
    expect(analysis.coldWritePercent).toBeCloseTo(200 / 3, 10);
  });

  it("keeps first-seen order on ties and honours top", () => {
    const analysis = analyzeWorkload([5, 4, 4, 5, 6], { hotLimit: 0, top: 2 });
    expect(analysis.hottest).toEqual([
      { address: 5, writes: 2 },
      { address: 4, writes: 2 },
    ]);
    expect(analysis.hotWritePercent).toBe(0);
    expect(analysis.coldWritePercent).toBe(100);
  });

  it("reports zeros for an empty stream", () => {
    expect(analyzeWorkload([], { hotLimit: 10 })).toEqual({
      totalWrites: 0,
      uniqueAddresses: 0,
      overwritePercent: 0,
      hotWritePercent: 0,
      coldWritePercent: 0,
      averageWritesPerAddress: 0,
      maxWritesPerAddress: 0,
      hottest: [],
    });
  });

  it("describes a seeded 80/20 hotspot stream", () => {
    const writes = hotspotWorkload({ maxAddress: 100, writes: 10_000, seed: 1 });
    const analysis = analyzeWorkload(writes, { hotLimit: 20 });

    expect(analysis.totalWrites).toBe(10_000);
    expect(analysis.uniqueAddresses).toBe(100);
    expect(analysis.overwritePercent).toBeCloseTo(99, 10);
    expect(analysis.averageWritesPerAddress).toBe(100);
    expect(analysis.hotWritePercent).toBeCloseTo(79.81, 10);
    expect(analysis.coldWritePercent).toBeCloseTo(20.19, 10);

    expect(analysis.hottest).toHaveLength(10);
    expect(analysis.hottest.every(entry => entry.address < 20)).toBe(true);
    expect(analysis.maxWritesPerAddress).toBe(analysis.hottest[0].writes);
    const counts = analysis.hottest.map(entry => entry.writes);
    expect(counts).toEqual([...counts].sort((a, b) => b - a));
  });
});
