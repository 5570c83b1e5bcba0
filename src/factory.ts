import { FlashDevice } from "./device";
import { FlashTranslationLayer } from "./ftl";
import type {
  AdaptiveConfigInput,
  DeviceGeometryInput,
} from "./schema/config";
import { AdaptiveStrategy } from "./strategies/adaptive";
import { BaselineStrategy } from "./strategies/baseline";
import type { FtlStrategy } from "./strategies/types";
import type { StrategyName } from "./types/types";

export interface CreateFtlOptions {
  strategy: StrategyName;
  geometry: DeviceGeometryInput;
  /** Ignored by the baseline strategy */
  adaptive?: AdaptiveConfigInput;
  maxEraseLimit?: number;
}

export function createStrategy(
  name: StrategyName,
  adaptive?: AdaptiveConfigInput,
): FtlStrategy {
  switch (name) {
    case "baseline":
      return new BaselineStrategy();
    case "adaptive":
      return new AdaptiveStrategy(adaptive);
  }
}

/**
 * Builds a fresh device and an FTL running the named strategy on it.
 */
export function createFtl(options: CreateFtlOptions): FlashTranslationLayer {
  const device = FlashDevice.fromGeometry(options.geometry);
  return new FlashTranslationLayer(
    device,
    createStrategy(options.strategy, options.adaptive),
    { maxEraseLimit: options.maxEraseLimit },
  );
}
