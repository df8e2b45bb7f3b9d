import { getAppConfigFromEnv } from "../config/appConfig.js";
import { loadEnv } from "../config/loadEnv.js";
import { toServiceManifest, toServiceMonitorManifest } from "../discovery/manifests.js";
import { loadScrapeTargetDescriptor } from "../discovery/scrapeTarget.js";
import { buildDashboard } from "../queries/dashboard.js";

loadEnv();

try {
  const config = getAppConfigFromEnv();
  const descriptor = loadScrapeTargetDescriptor(config.scrapeTargetFile);
  const name = process.env.APP_NAME ?? "sample-app";
  const namespace = process.env.APP_NAMESPACE ?? "default";
  const release = process.env.MONITOR_RELEASE ?? "prometheus";

  const list = {
    apiVersion: "v1",
    kind: "List",
    items: [
      toServiceManifest(descriptor, { name, namespace, port: config.port }),
      toServiceMonitorManifest(descriptor, { name, namespace, monitorLabels: { release } })
    ]
  };

  // eslint-disable-next-line no-console
  console.log(JSON.stringify(process.argv.includes("--dashboard") ? buildDashboard() : list, null, 2));
} catch (err) {
  // eslint-disable-next-line no-console
  console.error(err);
  process.exitCode = 1;
}
