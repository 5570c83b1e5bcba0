import {
  adaptWeights,
  createControllerState,
  resolveAdaptiveConfig,
  type AdaptiveConfig,
  type ControllerState,
} from "../adaptive-controller";
import type { Block } from "../device";
import { fail, ok, type FtlResult } from "../errors";
import type { AdaptiveConfigInput } from "../schema/config";
import type {
  AdaptationReport,
  GcOutcome,
  PhysicalAddress,
  ScoringWeights,
} from "../types/types";
import { migrateAndErase } from "./migrate";
import type { AllocateOptions, FtlStrategy, StrategyContext } from "./types";

export interface VictimScore {
  blockId: number;
  efficiency: number;
  migrationCost: number;
  wearScore: number;
  score: number;
}

/**
 * Score every block holding invalid pages.
 *
 *   score = α·invalid/cap − γ·valid/cap + β·(1 − erases/maxErase)
 *
 * maxErase is floored at 1 so a fresh device scores wear as 1 everywhere.
 */
export function scoreBlocks(
  blocks: readonly Block[],
  weights: ScoringWeights,
): VictimScore[] {
  const maxErase = blocks.reduce(
    (max, block) => (block.eraseCount > max ? block.eraseCount : max),
    1,
  );
  const scores: VictimScore[] = [];
  for (const block of blocks) {
    if (block.invalidPages === 0) continue;
    const efficiency = block.invalidPages / block.capacity;
    const migrationCost = block.validPages / block.capacity;
    const wearScore = 1 - block.eraseCount / maxErase;
    scores.push({
      blockId: block.id,
      efficiency,
      migrationCost,
      wearScore,
      score:
        weights.alpha * efficiency -
        weights.gamma * migrationCost +
        weights.beta * wearScore,
    });
  }
  return scores;
}

/**
 * Highest score wins; on a tie the lowest block index wins. Pure.
 */
export function selectVictim(
  blocks: readonly Block[],
  weights: ScoringWeights,
): number | undefined {
  let best: VictimScore | undefined;
  for (const candidate of scoreBlocks(blocks, weights)) {
    if (!best || candidate.score > best.score) {
      best = candidate;
    }
  }
  return best?.blockId;
}

/**
 * Feedback-tuned strategy: plain first-fit allocation, with wear spread
 * handled entirely by weighted victim scoring.
 */
export class AdaptiveStrategy implements FtlStrategy {
  readonly name = "adaptive" as const;
  readonly config: AdaptiveConfig;
  private state: ControllerState;

  constructor(config?: AdaptiveConfigInput) {
    this.config = resolveAdaptiveConfig(config);
    this.state = createControllerState(this.config);
  }

  get controller(): ControllerState {
    return this.state;
  }

  weights(): ScoringWeights {
    return { ...this.state.weights };
  }

  allocatePage(
    ctx: StrategyContext,
    options?: AllocateOptions,
  ): FtlResult<PhysicalAddress> {
    for (const block of ctx.device.allBlocks()) {
      if (block.id === options?.excludeBlock || block.isFull) continue;
      return ok({ blockId: block.id, pageIndex: block.writeCursor });
    }
    return fail("E_ALLOCATION_EXHAUSTED", "No block has a free page");
  }

  garbageCollect(ctx: StrategyContext): GcOutcome {
    const victim = selectVictim(ctx.device.allBlocks(), this.state.weights);
    if (victim === undefined) {
      return { status: "noop", migrated: 0, reclaimed: 0 };
    }
    return migrateAndErase(this, ctx, victim);
  }

  afterHostWrite(ctx: StrategyContext): AdaptationReport | undefined {
    if (ctx.counters.hostWrites % this.config.adaptInterval !== 0) {
      return undefined;
    }
    this.state = adaptWeights(this.state, ctx.signals(), this.config);
    return {
      round: this.state.rounds,
      action: this.state.lastAction,
      weights: { ...this.state.weights },
      wafAvg: this.state.wafAvg,
      varianceAvg: this.state.varianceAvg,
    };
  }
}
