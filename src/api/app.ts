import Fastify, { type FastifyInstance } from "fastify";
import type { LogLevel } from "../config/appConfig.js";
import type { ExpositionHandler } from "../metrics/exposition.js";
import type { AppMetrics } from "../observability/metrics.js";
import { registerRequestInstrumentation } from "./instrumentation.js";
import { registerMetricsRoutes } from "./routes/metrics.js";
import { registerRootRoutes } from "./routes/root.js";

export interface AppDeps {
  metrics: AppMetrics;
  exposition: ExpositionHandler;
  metricsPath?: string;
  logLevel?: LogLevel;
}

export function buildApp(deps: AppDeps): FastifyInstance {
  const app = Fastify({
    logger: {
      level: deps.logLevel ?? process.env.LOG_LEVEL ?? "info",
      redact: {
        paths: ["req.headers.authorization"],
        censor: "[REDACTED]"
      }
    }
  });

  registerRequestInstrumentation(app, deps.metrics);

  app.setErrorHandler(async (err, req, reply) => {
    const status = err.statusCode && err.statusCode >= 400 ? err.statusCode : 500;
    if (status >= 500) req.log.error({ err }, "request failed");
    reply.status(status).type("text/plain; charset=utf-8");
    return status >= 500 ? "internal error\n" : `${err.message}\n`;
  });

  app.setNotFoundHandler(async (_req, reply) => {
    reply.status(404).type("text/plain; charset=utf-8");
    return "not found\n";
  });

  registerMetricsRoutes(app, { exposition: deps.exposition, path: deps.metricsPath ?? "/metrics" });
  registerRootRoutes(app);

  return app;
}
