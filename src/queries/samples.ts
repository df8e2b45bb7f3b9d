import type { ParsedSample } from "../metrics/exposition.js";
import type { BucketCount } from "../metrics/registry.js";

/**
 * Sums `<histogram>_bucket` samples by their `le` bound across all other
 * labels, the scraped equivalent of `sum(...) by (le)`.
 */
export function bucketsFromSamples(samples: readonly ParsedSample[], histogram: string): BucketCount[] {
  const byLe = new Map<number, number>();
  for (const s of samples) {
    if (s.name !== `${histogram}_bucket`) continue;
    const raw = s.labels.le;
    if (raw === undefined) continue;
    const le = raw === "+Inf" ? Number.POSITIVE_INFINITY : Number(raw);
    if (Number.isNaN(le)) continue;
    byLe.set(le, (byLe.get(le) ?? 0) + s.value);
  }
  return [...byLe.entries()].sort(([a], [b]) => a - b).map(([le, count]) => ({ le, count }));
}
