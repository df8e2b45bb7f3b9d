import { buildApp } from "../api/app.js";
import { getAppConfigFromEnv } from "../config/appConfig.js";
import { loadEnv } from "../config/loadEnv.js";
import { createExposition, type ExpositionCollector } from "../metrics/exposition.js";
import { MetricsRegistry } from "../metrics/registry.js";
import { createProcessMetricsCollector, registerAppMetrics } from "../observability/metrics.js";
import { initTracing } from "../observability/tracing.js";

async function main(): Promise<void> {
  loadEnv();
  const config = getAppConfigFromEnv();
  const tracing = await initTracing();

  // Lives for the whole process; a restart starts every series from zero.
  const registry = new MetricsRegistry();
  const metrics = registerAppMetrics(registry, { latencyBuckets: config.latencyBuckets });
  const collectors: ExpositionCollector[] = config.collectDefaultMetrics
    ? [createProcessMetricsCollector(config.defaultMetricsPrefix)]
    : [];

  const app = buildApp({
    metrics,
    exposition: createExposition(registry, { collectors }),
    metricsPath: config.metricsPath,
    logLevel: config.logLevel
  });

  await app.listen({ port: config.port, host: config.host });
  app.log.info({ host: config.host, port: config.port, metricsPath: config.metricsPath }, "Sample app listening");

  const shutdown = async () => {
    try {
      await app.close();
    } finally {
      await tracing?.shutdown();
      process.exit(0);
    }
  };

  process.on("SIGTERM", () => void shutdown());
  process.on("SIGINT", () => void shutdown());
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error(err);
  process.exitCode = 1;
});
