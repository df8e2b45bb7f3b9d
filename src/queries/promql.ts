import { isDuration } from "../discovery/duration.js";
import type { BucketCount } from "../metrics/registry.js";
import { isValidMetricName } from "../metrics/labels.js";

function assertMetric(name: string): void {
  if (!isValidMetricName(name)) throw new Error(`Invalid metric name: ${name}`);
}

function assertWindow(window: string): void {
  if (!isDuration(window)) throw new Error(`Invalid range window: ${window}`);
}

/** Per-second increase of a counter over `window`, e.g. `rate(x_total[5m])`. */
export function rateQuery(counter: string, window = "5m"): string {
  assertMetric(counter);
  assertWindow(window);
  return `rate(${counter}[${window}])`;
}

/**
 * Quantile estimate over every series of a histogram, aggregated by bucket
 * bound so the cumulative `le` structure survives the sum.
 */
export function latencyQuantileQuery(p: number, histogram: string, window = "5m"): string {
  if (!(p >= 0 && p <= 1)) throw new Error(`Quantile must be within [0, 1]: ${p}`);
  assertMetric(histogram);
  assertWindow(window);
  return `histogram_quantile(${p}, sum(rate(${histogram}_bucket[${window}])) by (le))`;
}

/**
 * The estimate `histogram_quantile` computes: find the bucket holding rank
 * `p * total` and interpolate linearly inside it. Buckets are cumulative and
 * must end with `+Inf`; a rank in the `+Inf` bucket yields the highest finite
 * bound.
 */
export function histogramQuantile(p: number, buckets: readonly BucketCount[]): number {
  if (Number.isNaN(p)) return Number.NaN;
  if (p < 0) return Number.NEGATIVE_INFINITY;
  if (p > 1) return Number.POSITIVE_INFINITY;

  const sorted = [...buckets].sort((a, b) => a.le - b.le);
  const last = sorted[sorted.length - 1];
  if (sorted.length < 2 || !last || last.le !== Number.POSITIVE_INFINITY) return Number.NaN;
  const total = last.count;
  if (total === 0) return Number.NaN;

  const rank = p * total;
  const idx = sorted.findIndex((b) => b.count >= rank);
  const bucket = sorted[idx];
  if (!bucket) return Number.NaN;

  if (idx === sorted.length - 1) return sorted[sorted.length - 2]?.le ?? Number.NaN;
  const prev = sorted[idx - 1];
  if (!prev && bucket.le <= 0) return bucket.le;

  const start = prev?.le ?? 0;
  const below = prev?.count ?? 0;
  const inBucket = bucket.count - below;
  if (inBucket === 0) return bucket.le;
  return start + (bucket.le - start) * ((rank - below) / inBucket);
}
