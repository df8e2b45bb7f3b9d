import { parseExposition } from "../metrics/exposition.js";
import type { ParsedSample } from "../metrics/exposition.js";
import type { ScrapeTarget } from "./scrapeTarget.js";

export type ScrapeFailureReason = "http_status" | "timeout" | "unreachable" | "malformed_body";

export type ScrapeOutcome =
  | { ok: true; url: string; status: number; samples: ParsedSample[]; durationMs: number }
  | { ok: false; url: string; reason: ScrapeFailureReason; status?: number; message: string; durationMs: number };

export type FetchLike = (url: string, init: { signal: AbortSignal; headers: Record<string, string> }) => Promise<{
  status: number;
  text(): Promise<string>;
}>;

export interface ScrapeOptions {
  fetch?: FetchLike;
  now?: () => number;
}

/**
 * One poll of a target, classified the way a scraper records it. Any non-2xx,
 * network error, timeout or unparseable body is a missed scrape; this never
 * throws.
 */
export async function scrapeOnce(target: ScrapeTarget, opts: ScrapeOptions = {}): Promise<ScrapeOutcome> {
  const doFetch: FetchLike = opts.fetch ?? fetch;
  const now = opts.now ?? Date.now;
  const started = now();
  const elapsed = () => now() - started;

  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), target.timeoutMs);

  try {
    const res = await doFetch(target.url, {
      signal: controller.signal,
      headers: { Accept: "text/plain;version=0.0.4" }
    });
    const body = await res.text();

    if (res.status < 200 || res.status >= 300) {
      return { ok: false, url: target.url, reason: "http_status", status: res.status, message: `HTTP ${res.status}`, durationMs: elapsed() };
    }
    try {
      return { ok: true, url: target.url, status: res.status, samples: parseExposition(body), durationMs: elapsed() };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return { ok: false, url: target.url, reason: "malformed_body", status: res.status, message, durationMs: elapsed() };
    }
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    const reason: ScrapeFailureReason = controller.signal.aborted ? "timeout" : "unreachable";
    return { ok: false, url: target.url, reason, message, durationMs: elapsed() };
  } finally {
    clearTimeout(timer);
  }
}
