import fs from "node:fs";
import { matchesSelector, type Labels } from "../metrics/labels.js";
import { parseDuration } from "./duration.js";
import { validateScrapeTargetInput } from "./schema.js";

export type ScrapeScheme = "http" | "https";

/**
 * How an external scraper finds and polls the service: every endpoint whose
 * labels carry the selector is polled on the named port.
 */
export interface ScrapeTargetDescriptor {
  selector: Labels;
  port: string;
  path: string;
  interval: string;
  timeout: string;
  scheme: ScrapeScheme;
}

/** A live network endpoint as published by service discovery. */
export interface ServiceEndpoint {
  address: string;
  labels: Labels;
  ports: ReadonlyArray<{ name: string; port: number }>;
}

export interface ScrapeTarget {
  url: string;
  intervalMs: number;
  timeoutMs: number;
  labels: Labels;
}

const DEFAULT_TIMEOUT = "10s";
const DEFAULT_TIMEOUT_MS = parseDuration(DEFAULT_TIMEOUT);

export type DescriptorResult = { ok: true; value: ScrapeTargetDescriptor } | { ok: false; errors: string[] };

export function validateScrapeTargetDescriptor(input: unknown): DescriptorResult {
  const res = validateScrapeTargetInput(input);
  if (!res.ok) {
    return { ok: false, errors: res.errors.map((e) => `${e.instancePath || "/"} ${e.message ?? "is invalid"}`) };
  }

  const interval = res.value.interval ?? "15s";
  const intervalMs = parseDuration(interval);
  if (intervalMs === 0) return { ok: false, errors: ["/interval must be greater than zero"] };

  // Without an explicit timeout, the default is capped at the interval.
  const timeout = res.value.timeout ?? (intervalMs < DEFAULT_TIMEOUT_MS ? interval : DEFAULT_TIMEOUT);
  const timeoutMs = parseDuration(timeout);
  if (timeoutMs === 0) return { ok: false, errors: ["/timeout must be greater than zero"] };
  if (timeoutMs > intervalMs) return { ok: false, errors: ["/timeout must not exceed /interval"] };

  const value: ScrapeTargetDescriptor = {
    selector: { ...res.value.selector },
    port: res.value.port,
    path: res.value.path ?? "/metrics",
    interval,
    timeout,
    scheme: res.value.scheme ?? "http"
  };
  return { ok: true, value };
}

export function loadScrapeTargetDescriptor(file: string): ScrapeTargetDescriptor {
  const raw: unknown = JSON.parse(fs.readFileSync(file, "utf8"));
  const res = validateScrapeTargetDescriptor(raw);
  if (!res.ok) throw new Error(`Invalid scrape target descriptor ${file}: ${res.errors.join("; ")}`);
  return res.value;
}

function formatHost(address: string): string {
  return address.includes(":") && !address.startsWith("[") ? `[${address}]` : address;
}

/** Endpoints that match the selector and publish the named port, as poll targets. */
export function resolveScrapeTargets(
  descriptor: ScrapeTargetDescriptor,
  endpoints: readonly ServiceEndpoint[]
): ScrapeTarget[] {
  const intervalMs = parseDuration(descriptor.interval);
  const timeoutMs = parseDuration(descriptor.timeout);
  const targets: ScrapeTarget[] = [];

  for (const ep of endpoints) {
    if (!matchesSelector(descriptor.selector, ep.labels)) continue;
    const port = ep.ports.find((p) => p.name === descriptor.port);
    if (!port) continue;
    targets.push({
      url: `${descriptor.scheme}://${formatHost(ep.address)}:${port.port}${descriptor.path}`,
      intervalMs,
      timeoutMs,
      labels: ep.labels
    });
  }
  return targets;
}
