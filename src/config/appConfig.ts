import { DEFAULT_LATENCY_BUCKETS } from "../observability/metrics.js";

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

const LOG_LEVELS: readonly LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

export interface AppConfig {
  host: string;
  port: number;
  logLevel: LogLevel;
  metricsPath: string;
  latencyBuckets: readonly number[];
  collectDefaultMetrics: boolean;
  defaultMetricsPrefix: string;
  scrapeTargetFile: string;
}

type Env = Readonly<Record<string, string | undefined>>;

function readPort(raw: string | undefined): number {
  const port = Number(raw ?? "8000");
  if (!Number.isInteger(port) || port < 0 || port > 65535) throw new Error(`Invalid PORT: ${raw}`);
  return port;
}

function readLogLevel(raw: string | undefined): LogLevel {
  const level = LOG_LEVELS.find((l) => l === (raw ?? "info"));
  if (!level) throw new Error(`Invalid LOG_LEVEL: ${raw}`);
  return level;
}

function readBool(name: string, raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined || raw === "") return fallback;
  if (raw === "true" || raw === "1") return true;
  if (raw === "false" || raw === "0") return false;
  throw new Error(`Invalid ${name}: ${raw}`);
}

export function parseBuckets(raw: string | undefined): readonly number[] {
  if (!raw || !raw.trim()) return DEFAULT_LATENCY_BUCKETS;
  const buckets = raw.split(",").map((s) => Number(s.trim()));
  buckets.forEach((b, i) => {
    const prev = buckets[i - 1];
    if (!Number.isFinite(b) || b <= 0 || (prev !== undefined && b <= prev)) {
      throw new Error(`Invalid LATENCY_BUCKETS: ${raw}`);
    }
  });
  return buckets;
}

export function getAppConfigFromEnv(env: Env = process.env): AppConfig {
  const metricsPath = env.METRICS_PATH ?? "/metrics";
  if (!metricsPath.startsWith("/")) throw new Error(`METRICS_PATH must start with "/": ${metricsPath}`);

  return {
    host: env.HOST ?? "0.0.0.0",
    port: readPort(env.PORT),
    logLevel: readLogLevel(env.LOG_LEVEL),
    metricsPath,
    latencyBuckets: parseBuckets(env.LATENCY_BUCKETS),
    collectDefaultMetrics: readBool("COLLECT_DEFAULT_METRICS", env.COLLECT_DEFAULT_METRICS, true),
    defaultMetricsPrefix: env.DEFAULT_METRICS_PREFIX ?? "",
    scrapeTargetFile: env.SCRAPE_TARGET_FILE ?? "config/scrape-target.json"
  };
}
