import type { FastifyInstance } from "fastify";
import type { AppMetrics } from "../observability/metrics.js";

declare module "fastify" {
  interface FastifyContextConfig {
    /** Set to false to keep a route out of the request metrics. */
    instrument?: boolean;
  }
}

export const UNMATCHED_ENDPOINT = "unmatched";

export interface RequestSample {
  method: string;
  endpoint: string;
  status: number;
  durationSeconds: number;
}

export function recordRequest(metrics: AppMetrics, sample: RequestSample): void {
  const { registry, requestCount, requestLatency } = metrics;
  // The count goes first so a rejected duration never drops it.
  registry.increment(requestCount, {
    method: sample.method,
    endpoint: sample.endpoint,
    http_status: sample.status
  });
  registry.observe(requestLatency, sample.durationSeconds);
}

/**
 * Records latency and a request count for every response, including the ones
 * produced by the error and not-found handlers. Runs after the response went
 * out, so the status is the one the client actually received.
 */
export function registerRequestInstrumentation(app: FastifyInstance, metrics: AppMetrics): void {
  app.addHook("onResponse", async (req, reply) => {
    if (req.routeOptions.config.instrument === false) return;

    try {
      recordRequest(metrics, {
        method: req.method,
        endpoint: req.is404 ? UNMATCHED_ENDPOINT : (req.routeOptions.url ?? UNMATCHED_ENDPOINT),
        status: reply.statusCode,
        durationSeconds: reply.elapsedTime / 1000
      });
    } catch (err) {
      // Metrics are best-effort; the response has already been sent.
      req.log.warn({ err }, "failed to record request metrics");
    }
  });
}
