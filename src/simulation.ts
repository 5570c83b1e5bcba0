import type { FtlError } from "./errors";
import { createFtl, type CreateFtlOptions } from "./factory";
import type { FlashTranslationLayer } from "./ftl";
import {
  MetricsRecorder,
  summarize,
  type MetricsCheckpoint,
  type MetricsSummary,
} from "./metrics";
import {
  parseConfig,
  simulationOptionsSchema,
  type SimulationOptionsInput,
} from "./schema/config";
import type { LogicalAddress, StrategyName } from "./types/types";

export interface SimulationResult {
  summary: MetricsSummary;
  checkpoints: readonly MetricsCheckpoint[];
  /** Index into the workload of the write that stopped the run, if any */
  stoppedAt?: number;
  error?: FtlError;
}

/**
 * Feed `workload` through `ftl`, recording a checkpoint every
 * `checkpointEvery` host writes.
 *
 * With `onExhausted: "stop"` (default) the run ends at the first write
 * that fails; with "skip" failed writes are dropped and the run goes on.
 */
export function runSimulation(
  ftl: FlashTranslationLayer,
  workload: Iterable<LogicalAddress>,
  options?: SimulationOptionsInput,
): SimulationResult {
  const resolved = parseConfig(
    simulationOptionsSchema,
    options ?? {},
    "simulation options",
  );
  const maxEraseLimit = resolved.maxEraseLimit ?? ftl.maxEraseLimit;
  const recorder = new MetricsRecorder(
    ftl,
    resolved.checkpointEvery,
    maxEraseLimit,
  );

  let index = 0;
  let stoppedAt: number | undefined;
  let lastError: FtlError | undefined;
  for (const address of workload) {
    const result = ftl.write(address);
    if (!result.ok) {
      lastError = result.error;
      if (resolved.onExhausted === "stop") {
        stoppedAt = index;
        break;
      }
    } else {
      recorder.maybeRecord();
    }
    index += 1;
  }

  return {
    summary: summarize(ftl, maxEraseLimit),
    checkpoints: recorder.checkpoints,
    ...(stoppedAt !== undefined ? { stoppedAt } : {}),
    ...(lastError ? { error: lastError } : {}),
  };
}

export type StrategyComparison = Record<StrategyName, SimulationResult>;

/**
 * Run baseline and adaptive on fresh devices over the identical sequence.
 */
export function compareStrategies(
  workload: readonly LogicalAddress[],
  ftlOptions: Omit<CreateFtlOptions, "strategy">,
  options?: SimulationOptionsInput,
): StrategyComparison {
  return {
    baseline: runSimulation(
      createFtl({ ...ftlOptions, strategy: "baseline" }),
      workload,
      options,
    ),
    adaptive: runSimulation(
      createFtl({ ...ftlOptions, strategy: "adaptive" }),
      workload,
      options,
    ),
  };
}
