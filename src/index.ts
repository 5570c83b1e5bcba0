export { FlashDevice, Block, PageState, type PageView } from "./device";
export { TranslationTable } from "./translation-table";
export {
  FlashTranslationLayer,
  gcThreshold,
  type FtlEvents,
  type FtlOptions,
  type GcReason,
  type GcTrigger,
} from "./ftl";
export { BaselineStrategy } from "./strategies/baseline";
export {
  AdaptiveStrategy,
  scoreBlocks,
  selectVictim,
  type VictimScore,
} from "./strategies/adaptive";
export { migrateAndErase } from "./strategies/migrate";
export type {
  AllocateOptions,
  FtlStrategy,
  StrategyContext,
} from "./strategies/types";
export {
  ADAPTIVE_DEFAULTS,
  adaptWeights,
  clampWeights,
  createControllerState,
  movingAverage,
  resolveAdaptiveConfig,
  type AdaptiveConfig,
  type ControllerState,
} from "./adaptive-controller";
export {
  MetricsRecorder,
  lifetimeEstimate,
  maxEraseCount,
  minEraseCount,
  summarize,
  wearVariance,
  writeAmplification,
  type MetricsCheckpoint,
  type MetricsSource,
  type MetricsSummary,
} from "./metrics";
export {
  SeededRandom,
  WORKLOAD_DEFAULTS,
  analyzeWorkload,
  createWorkload,
  hotspotWorkload,
  mixedWorkload,
  randomWorkload,
  sequentialWorkload,
  type AnalyzeOptions,
  type HotspotOptions,
  type WorkloadAnalysis,
  type WorkloadKind,
  type WorkloadOptions,
} from "./workload";
export { createFtl, createStrategy, type CreateFtlOptions } from "./factory";
export {
  compareStrategies,
  runSimulation,
  type SimulationResult,
  type StrategyComparison,
} from "./simulation";
export {
  FTL_DEFAULTS,
  adaptiveConfigSchema,
  deviceGeometrySchema,
  simulationOptionsSchema,
  type AdaptiveConfigInput,
  type DeviceGeometryInput,
  type SimulationOptions,
  type SimulationOptionsInput,
} from "./schema/config";
export { FtlError, fail, ok, unwrap } from "./errors";
export type { FtlErrorCode, FtlResult } from "./errors";
export { TypedEventEmitter, type TypedListener } from "./typedEmitter";
export {
  attachConsoleLogger,
  createConsoleMetricsLogger,
} from "./metrics-logger";
export type {
  AdaptAction,
  AdaptationReport,
  DeviceGeometry,
  FeedbackSignals,
  FtlStats,
  GcOutcome,
  GcStatus,
  LogicalAddress,
  PagePayload,
  PhysicalAddress,
  ReadResult,
  RunCounters,
  ScoringWeights,
  StrategyName,
} from "./types/types";
