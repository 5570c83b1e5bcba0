import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fc from "fast-check";
import {
  ADAPTIVE_DEFAULTS,
  adaptWeights,
  clampWeights,
  createControllerState,
  movingAverage,
  resolveAdaptiveConfig,
  type ControllerState,
} from "../src/adaptive-controller";
import { expectFtlError } from "./helpers";

let intervalEnvBefore: string | undefined;

beforeEach(() => {
  intervalEnvBefore = process.env.FTL_ADAPT_INTERVAL;
  delete process.env.FTL_ADAPT_INTERVAL;
});

afterEach(() => {
  if (intervalEnvBefore === undefined) {
    delete process.env.FTL_ADAPT_INTERVAL;
  } else {
    process.env.FTL_ADAPT_INTERVAL = intervalEnvBefore;
  }
});

describe("movingAverage", () => {
  it("weights the newest sample by the factor", () => {
    expect(movingAverage(1, 11, 0.1)).toBeCloseTo(2, 10);
    expect(movingAverage(5, 0, 1)).toBe(0);
    expect(movingAverage(5, 100, 0)).toBe(5);
  });
});

describe("clampWeights", () => {
  it("bounds each weight independently", () => {
    expect(
      clampWeights({ alpha: 3, beta: -1, gamma: 0.5 }, { minWeight: 0.1, maxWeight: 2 }),
    ).toEqual({ alpha: 2, beta: 0.1, gamma: 0.5 });
  });
});

describe("createControllerState", () => {
  it("starts neutral", () => {
    expect(createControllerState()).toEqual({
      weights: { alpha: 1, beta: 1, gamma: 1 },
      wafAvg: 1,
      varianceAvg: 0,
      rounds: 0,
      lastAction: "init",
    });
  });
});

describe("adaptWeights", () => {
  const initial = createControllerState();

  it("holds the weights while both averages are on target", () => {
    const next = adaptWeights(initial, { waf: 1, wearVariance: 0 });
    expect(next.weights).toEqual({ alpha: 1, beta: 1, gamma: 1 });
    expect(next.lastAction).toBe("steady");
    expect(next.rounds).toBe(1);
  });

  it("favours efficiency and penalises migration when WAF is high", () => {
    const next = adaptWeights(initial, { waf: 40, wearVariance: 0 });
    expect(next.wafAvg).toBeCloseTo(4.9, 10);
    expect(next.lastAction).toBe("tuned");
    expect(next.weights.alpha).toBeCloseTo(1.05, 10);
    expect(next.weights.gamma).toBeCloseTo(1.05, 10);
    expect(next.weights.beta).toBeCloseTo(0.99, 10);
  });

  it("favours wear when erase counts spread out", () => {
    const next = adaptWeights(initial, { waf: 1, wearVariance: 300 });
    expect(next.varianceAvg).toBeCloseTo(30, 10);
    expect(next.weights.beta).toBeCloseTo(1.05, 10);
    expect(next.weights.alpha).toBeCloseTo(0.99, 10);
    expect(next.weights.gamma).toBe(1);
  });

  it("adds up both rules in the same round", () => {
    const next = adaptWeights(initial, { waf: 40, wearVariance: 300 });
    expect(next.weights.alpha).toBeCloseTo(1.04, 10);
    expect(next.weights.beta).toBeCloseTo(1.04, 10);
    expect(next.weights.gamma).toBeCloseTo(1.05, 10);
  });

  it("snaps to the emergency profile on runaway amplification", () => {
    const next = adaptWeights(initial, { waf: 60, wearVariance: 5000 });
    expect(next.wafAvg).toBeCloseTo(6.9, 10);
    expect(next.weights).toEqual({ alpha: 1.5, beta: 0.5, gamma: 1.5 });
    expect(next.lastAction).toBe("emergency");
  });

  it("does not mutate the previous state", () => {
    adaptWeights(initial, { waf: 40, wearVariance: 300 });
    expect(initial.weights).toEqual({ alpha: 1, beta: 1, gamma: 1 });
    expect(initial.rounds).toBe(0);
  });

  it("clamps weights after repeated pressure", () => {
    let state: ControllerState = initial;
    for (let round = 0; round < 100; round += 1) {
      state = adaptWeights(state, { waf: 1, wearVariance: 1000 });
    }
    expect(state.weights).toEqual({ alpha: 0.1, beta: 2, gamma: 1 });
    expect(state.rounds).toBe(100);
  });

  it("keeps every weight inside the configured bounds", () => {
    const signal = fc.record({
      waf: fc.double({ min: 0, max: 50, noNaN: true }),
      wearVariance: fc.double({ min: 0, max: 1000, noNaN: true }),
    });
    fc.assert(
      fc.property(fc.array(signal, { minLength: 1, maxLength: 200 }), signals => {
        let state = createControllerState();
        for (const sample of signals) {
          state = adaptWeights(state, sample);
          for (const weight of Object.values(state.weights)) {
            expect(weight).toBeGreaterThanOrEqual(ADAPTIVE_DEFAULTS.minWeight);
            expect(weight).toBeLessThanOrEqual(ADAPTIVE_DEFAULTS.maxWeight);
          }
        }
      }),
    );
  });
});

describe("resolveAdaptiveConfig", () => {
  it("returns the defaults without overrides", () => {
    expect(resolveAdaptiveConfig()).toEqual(ADAPTIVE_DEFAULTS);
  });

  it("merges explicit overrides", () => {
    const config = resolveAdaptiveConfig({ targetWaf: 3, step: 0.1 });
    expect(config.targetWaf).toBe(3);
    expect(config.step).toBe(0.1);
    expect(config.targetVariance).toBe(20);
  });

  it("reads the adaptation interval from FTL_ADAPT_INTERVAL", () => {
    process.env.FTL_ADAPT_INTERVAL = "250";
    expect(resolveAdaptiveConfig().adaptInterval).toBe(250);
    expect(resolveAdaptiveConfig({ adaptInterval: 10 }).adaptInterval).toBe(10);
  });

  it.each(["abc", "0", "-5", ""])(
    "ignores FTL_ADAPT_INTERVAL=%j",
    value => {
      process.env.FTL_ADAPT_INTERVAL = value;
      expect(resolveAdaptiveConfig().adaptInterval).toBe(1000);
    },
  );

  it("rejects a minimum above the maximum", () => {
    const error = expectFtlError(
      () => resolveAdaptiveConfig({ minWeight: 1.5, maxWeight: 1 }),
      "E_INVALID_CONFIG",
    );
    expect(error.message).toBe(
      "Invalid adaptive config: minWeight: minWeight must not exceed maxWeight",
    );
    const merged = expectFtlError(
      () => resolveAdaptiveConfig({ minWeight: 3 }),
      "E_INVALID_CONFIG",
    );
    expect(merged.message).toBe(
      "Invalid adaptive config: minWeight 3 exceeds maxWeight 2",
    );
  });
});
