import client from "prom-client";
import type { ExpositionCollector } from "../metrics/exposition.js";
import type { CounterHandle, HistogramHandle, MetricsRegistry } from "../metrics/registry.js";

export const REQUEST_COUNT_METRIC = "sample_app_request_total";
export const REQUEST_LATENCY_METRIC = "sample_app_request_latency_seconds";

export const DEFAULT_LATENCY_BUCKETS: readonly number[] = [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2, 5];

export type RequestLabel = "method" | "endpoint" | "http_status";

export interface AppMetrics {
  registry: MetricsRegistry;
  requestCount: CounterHandle<RequestLabel>;
  requestLatency: HistogramHandle<never>;
}

export function registerAppMetrics(
  registry: MetricsRegistry,
  opts: { latencyBuckets?: readonly number[] } = {}
): AppMetrics {
  const requestCount = registry.register(REQUEST_COUNT_METRIC, "counter", ["method", "endpoint", "http_status"] as const, {
    help: "Total number of HTTP requests handled"
  });
  const requestLatency = registry.register(REQUEST_LATENCY_METRIC, "histogram", [], {
    help: "Request latency",
    buckets: opts.latencyBuckets ?? DEFAULT_LATENCY_BUCKETS
  });
  return { registry, requestCount, requestLatency };
}

/**
 * Node process metrics (CPU, memory, event loop lag, GC) from prom-client,
 * kept on their own registry and appended to the exposition.
 */
export function createProcessMetricsCollector(prefix = ""): ExpositionCollector {
  const processRegistry = new client.Registry();
  client.collectDefaultMetrics({ register: processRegistry, prefix });
  return () => processRegistry.metrics();
}
