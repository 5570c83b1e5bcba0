/**
 * AdaptiveController - feedback loop for the adaptive GC scoring weights
 *
 * Every `adaptInterval` host writes the controller folds the current WAF and
 * wear variance into exponential moving averages and nudges the victim
 * scoring weights:
 * - amplification above target → favour reclaim efficiency (α) and penalise
 *   migration (γ) harder, ease off wear (β)
 * - wear spread above target → favour less-erased blocks (β), ease off α
 * - runaway amplification → snap to a fixed emergency profile
 *
 * The state is an immutable value. `adaptWeights` is the only way to move
 * it forward; the adaptive strategy holds the current value.
 */

import { FtlError } from "./errors";
import {
  adaptiveConfigSchema,
  parseConfig,
  type AdaptiveConfigInput,
} from "./schema/config";
import type {
  AdaptAction,
  FeedbackSignals,
  ScoringWeights,
} from "./types/types";

export interface AdaptiveConfig {
  /** Host writes between adaptation rounds */
  adaptInterval: number;
  /** Weight of the newest sample in the moving averages */
  emaFactor: number;
  targetWaf: number;
  targetVariance: number;
  /** Moving-average WAF above which the emergency profile applies */
  emergencyWaf: number;
  emergencyWeights: ScoringWeights;
  initialWeights: ScoringWeights;
  /** Increment for the weight being favoured */
  step: number;
  /** Decrement for the weight being traded off */
  smallStep: number;
  minWeight: number;
  maxWeight: number;
}

export interface ControllerState {
  readonly weights: Readonly<ScoringWeights>;
  readonly wafAvg: number;
  readonly varianceAvg: number;
  /** Completed adaptation rounds */
  readonly rounds: number;
  readonly lastAction: AdaptAction;
}

export const ADAPTIVE_DEFAULTS: AdaptiveConfig = {
  adaptInterval: 1000,
  emaFactor: 0.1,
  targetWaf: 4.0,
  targetVariance: 20.0,
  emergencyWaf: 6.0,
  emergencyWeights: { alpha: 1.5, beta: 0.5, gamma: 1.5 },
  initialWeights: { alpha: 1.0, beta: 1.0, gamma: 1.0 },
  step: 0.05,
  smallStep: 0.01,
  minWeight: 0.1,
  maxWeight: 2.0,
};

export function movingAverage(
  previous: number,
  sample: number,
  factor: number,
): number {
  return (1 - factor) * previous + factor * sample;
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function clampWeights(
  weights: ScoringWeights,
  config: Pick<AdaptiveConfig, "minWeight" | "maxWeight">,
): ScoringWeights {
  return {
    alpha: clamp(weights.alpha, config.minWeight, config.maxWeight),
    beta: clamp(weights.beta, config.minWeight, config.maxWeight),
    gamma: clamp(weights.gamma, config.minWeight, config.maxWeight),
  };
}

function parseIntervalValue(value?: string | number | null): number | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  const numeric =
    typeof value === "string" ? Number.parseInt(value, 10) : value;
  if (Number.isNaN(numeric)) {
    return undefined;
  }
  const normalized = Math.floor(numeric);
  return normalized > 0 ? normalized : undefined;
}

function envAdaptInterval(): number | undefined {
  return parseIntervalValue(process.env.FTL_ADAPT_INTERVAL);
}

/**
 * Merge overrides onto the defaults. An explicit `adaptInterval` wins over
 * the FTL_ADAPT_INTERVAL environment variable.
 */
export function resolveAdaptiveConfig(
  overrides?: AdaptiveConfigInput,
): AdaptiveConfig {
  const parsed = parseConfig(
    adaptiveConfigSchema,
    overrides ?? {},
    "adaptive config",
  );
  const config: AdaptiveConfig = {
    adaptInterval:
      parsed.adaptInterval ??
      envAdaptInterval() ??
      ADAPTIVE_DEFAULTS.adaptInterval,
    emaFactor: parsed.emaFactor ?? ADAPTIVE_DEFAULTS.emaFactor,
    targetWaf: parsed.targetWaf ?? ADAPTIVE_DEFAULTS.targetWaf,
    targetVariance: parsed.targetVariance ?? ADAPTIVE_DEFAULTS.targetVariance,
    emergencyWaf: parsed.emergencyWaf ?? ADAPTIVE_DEFAULTS.emergencyWaf,
    emergencyWeights:
      parsed.emergencyWeights ?? ADAPTIVE_DEFAULTS.emergencyWeights,
    initialWeights: parsed.initialWeights ?? ADAPTIVE_DEFAULTS.initialWeights,
    step: parsed.step ?? ADAPTIVE_DEFAULTS.step,
    smallStep: parsed.smallStep ?? ADAPTIVE_DEFAULTS.smallStep,
    minWeight: parsed.minWeight ?? ADAPTIVE_DEFAULTS.minWeight,
    maxWeight: parsed.maxWeight ?? ADAPTIVE_DEFAULTS.maxWeight,
  };
  if (config.minWeight > config.maxWeight) {
    throw new FtlError(
      "E_INVALID_CONFIG",
      `Invalid adaptive config: minWeight ${config.minWeight} exceeds maxWeight ${config.maxWeight}`,
    );
  }
  return config;
}

export function createControllerState(
  config: AdaptiveConfig = ADAPTIVE_DEFAULTS,
): ControllerState {
  return {
    weights: clampWeights(config.initialWeights, config),
    wafAvg: 1.0,
    varianceAvg: 0.0,
    rounds: 0,
    lastAction: "init",
  };
}

/**
 * One adaptation round. Pure: returns the next state.
 *
 * The emergency profile replaces the weights outright and skips the
 * standard rules for the round. Otherwise both rules are evaluated
 * independently and their effects add up before clamping.
 */
export function adaptWeights(
  state: ControllerState,
  signals: FeedbackSignals,
  config: AdaptiveConfig = ADAPTIVE_DEFAULTS,
): ControllerState {
  const wafAvg = movingAverage(state.wafAvg, signals.waf, config.emaFactor);
  const varianceAvg = movingAverage(
    state.varianceAvg,
    signals.wearVariance,
    config.emaFactor,
  );
  const rounds = state.rounds + 1;

  if (wafAvg > config.emergencyWaf) {
    return {
      weights: clampWeights(config.emergencyWeights, config),
      wafAvg,
      varianceAvg,
      rounds,
      lastAction: "emergency",
    };
  }

  let { alpha, beta, gamma } = state.weights;
  let tuned = false;

  if (wafAvg > config.targetWaf) {
    alpha += config.step;
    gamma += config.step;
    beta -= config.smallStep;
    tuned = true;
  }

  if (varianceAvg > config.targetVariance) {
    beta += config.step;
    alpha -= config.smallStep;
    tuned = true;
  }

  return {
    weights: clampWeights({ alpha, beta, gamma }, config),
    wafAvg,
    varianceAvg,
    rounds,
    lastAction: tuned ? "tuned" : "steady",
  };
}
