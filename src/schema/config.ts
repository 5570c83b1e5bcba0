import { z } from "zod";
import { FtlError } from "../errors";

/**
 * Write-path constants shared by every strategy.
 */
export const FTL_DEFAULTS = {
  /** Global invalid ratio that triggers GC at WAF 0 and no wear spread */
  GC_BASE_THRESHOLD: 0.2,
  /** Threshold rises with write amplification... */
  GC_WAF_COEFFICIENT: 0.05,
  /** ...and falls as erase counts spread out */
  GC_VARIANCE_COEFFICIENT: 0.01,
  /** P/E cycles a block survives, used for lifetime projection */
  MAX_ERASE_LIMIT: 10_000,
  /** Host writes between metric checkpoints */
  CHECKPOINT_EVERY: 1_000,
  OVERPROVISION_RATIO: 0.1,
} as const;

export const deviceGeometrySchema = z.object({
  totalBlocks: z.number().int().min(1),
  pagesPerBlock: z.number().int().min(1),
  overprovisionRatio: z
    .number()
    .min(0)
    .lt(1)
    .default(FTL_DEFAULTS.OVERPROVISION_RATIO),
});

const weightSchema = z.number().finite();

export const scoringWeightsSchema = z.object({
  alpha: weightSchema,
  beta: weightSchema,
  gamma: weightSchema,
});

export const adaptiveConfigSchema = z
  .object({
    adaptInterval: z.number().int().positive(),
    emaFactor: z.number().gt(0).max(1),
    targetWaf: z.number().positive(),
    targetVariance: z.number().nonnegative(),
    emergencyWaf: z.number().positive(),
    emergencyWeights: scoringWeightsSchema,
    initialWeights: scoringWeightsSchema,
    step: z.number().nonnegative(),
    smallStep: z.number().nonnegative(),
    minWeight: weightSchema,
    maxWeight: weightSchema,
  })
  .partial()
  .refine(
    cfg =>
      cfg.minWeight === undefined ||
      cfg.maxWeight === undefined ||
      cfg.minWeight <= cfg.maxWeight,
    { message: "minWeight must not exceed maxWeight", path: ["minWeight"] },
  );

export const simulationOptionsSchema = z.object({
  checkpointEvery: z
    .number()
    .int()
    .positive()
    .default(FTL_DEFAULTS.CHECKPOINT_EVERY),
  /** Defaults to the limit the FTL was built with */
  maxEraseLimit: z.number().positive().optional(),
  onExhausted: z.enum(["stop", "skip"]).default("stop"),
});

export type DeviceGeometryInput = z.input<typeof deviceGeometrySchema>;
export type AdaptiveConfigInput = z.input<typeof adaptiveConfigSchema>;
export type SimulationOptionsInput = z.input<typeof simulationOptionsSchema>;
export type SimulationOptions = z.output<typeof simulationOptionsSchema>;

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

/**
 * Parse untrusted input against a schema, raising E_INVALID_CONFIG with
 * every issue listed.
 */
export function parseConfig<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  label: string,
): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new FtlError(
      "E_INVALID_CONFIG",
      `Invalid ${label}: ${describeIssues(parsed.error)}`,
    );
  }
  return parsed.data;
}
