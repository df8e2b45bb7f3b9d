import { getAppConfigFromEnv } from "../config/appConfig.js";
import { loadEnv } from "../config/loadEnv.js";
import { scrapeOnce } from "../discovery/scrape.js";
import { loadScrapeTargetDescriptor, resolveScrapeTargets } from "../discovery/scrapeTarget.js";
import { REQUEST_COUNT_METRIC, REQUEST_LATENCY_METRIC } from "../observability/metrics.js";
import { bucketsFromSamples } from "../queries/samples.js";
import { histogramQuantile } from "../queries/promql.js";

loadEnv();

async function main(): Promise<void> {
  const config = getAppConfigFromEnv();
  const descriptor = loadScrapeTargetDescriptor(config.scrapeTargetFile);

  // A single local endpoint carrying the selector labels stands in for discovery.
  const [target] = resolveScrapeTargets(descriptor, [
    {
      address: process.env.TARGET_HOST ?? "127.0.0.1",
      labels: descriptor.selector,
      ports: [{ name: descriptor.port, port: config.port }]
    }
  ]);
  if (!target) throw new Error("Descriptor resolved no scrape target");

  const outcome = await scrapeOnce(target);
  if (!outcome.ok) {
    // eslint-disable-next-line no-console
    console.log({ url: outcome.url, missed: true, reason: outcome.reason, message: outcome.message });
    process.exitCode = 2;
    return;
  }

  const requests = outcome.samples
    .filter((s) => s.name === REQUEST_COUNT_METRIC)
    .reduce((sum, s) => sum + s.value, 0);
  const buckets = bucketsFromSamples(outcome.samples, REQUEST_LATENCY_METRIC);

  // eslint-disable-next-line no-console
  console.log({
    url: outcome.url,
    samples: outcome.samples.length,
    requests,
    p50_seconds: histogramQuantile(0.5, buckets),
    p95_seconds: histogramQuantile(0.95, buckets),
    duration_ms: outcome.durationMs
  });
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error(err);
  process.exitCode = 1;
});
