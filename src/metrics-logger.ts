import type { FlashTranslationLayer, FtlEvents } from "./ftl";
import type { MetricsSummary } from "./metrics";

const fmt = (value: number, digits = 3): string =>
  Number.isFinite(value) ? value.toFixed(digits) : "unlimited";

/**
 * Simple console summary logger; call with a MetricsSummary to print one
 * `key=value` line per run.
 */
export const createConsoleMetricsLogger = (prefix = "ftl") => {
  return (summary: MetricsSummary) => {
    const parts = [
      `[${prefix}]`,
      `strategy=${summary.strategy}`,
      `host=${summary.hostWrites}`,
      `nand=${summary.physicalWrites}`,
      `waf=${fmt(summary.waf)}`,
      `var=${fmt(summary.wearVariance)}`,
      `gc=${summary.gcInvocations}`,
      `erase=${summary.minEraseCount}..${summary.maxEraseCount}`,
      `life=${fmt(summary.lifetimeEstimate, 0)}`,
    ];
    if (summary.weights) {
      const { alpha, beta, gamma } = summary.weights;
      parts.push(`w=${fmt(alpha, 2)}/${fmt(beta, 2)}/${fmt(gamma, 2)}`);
    }
    console.log(parts.join(" "));
  };
};

/**
 * Trace GC passes, weight adaptation and rejected writes as they happen.
 * Returns a detach function.
 */
export function attachConsoleLogger(
  ftl: FlashTranslationLayer,
  prefix = "ftl",
  options?: { includeNoopGc?: boolean },
): () => void {
  const onGc = (event: FtlEvents["gc"]) => {
    if (event.status === "noop" && !options?.includeNoopGc) return;
    console.log(
      `[${prefix}] gc reason=${event.reason} status=${event.status} victim=${event.victim ?? "-"} migrated=${event.migrated} reclaimed=${event.reclaimed} host=${event.hostWrites}`,
    );
  };
  const onAdapt = (event: FtlEvents["adapt"]) => {
    const { alpha, beta, gamma } = event.weights;
    console.log(
      `[${prefix}] adapt round=${event.round} action=${event.action} wafAvg=${fmt(event.wafAvg)} varAvg=${fmt(event.varianceAvg)} w=${fmt(alpha, 2)}/${fmt(beta, 2)}/${fmt(gamma, 2)}`,
    );
  };
  const onRejected = (event: FtlEvents["rejected"]) => {
    console.warn(
      `[${prefix}] rejected address=${event.address} host=${event.hostWrites} lostMapping=${event.lostMapping}`,
    );
  };

  ftl.on("gc", onGc);
  ftl.on("adapt", onAdapt);
  ftl.on("rejected", onRejected);
  return () => {
    ftl.off("gc", onGc);
    ftl.off("adapt", onAdapt);
    ftl.off("rejected", onRejected);
  };
}
