import { ExpositionError, ExpositionParseError } from "./errors.js";
import { escapeHelp, formatLabels, type Labels } from "./labels.js";
import type { MetricFamilySnapshot, MetricsSource } from "./registry.js";

// Prometheus text format 0.0.4, identical to prom-client's Registry.contentType.
export const EXPOSITION_CONTENT_TYPE = "text/plain; version=0.0.4; charset=utf-8";

export interface Exposition {
  body: string;
  contentType: string;
}

/** Produces extra exposition text, e.g. prom-client's default process metrics. */
export type ExpositionCollector = () => string | Promise<string>;

export interface ExpositionOptions {
  collectors?: readonly ExpositionCollector[];
}

export interface ExpositionHandler {
  expose(): Promise<Exposition>;
}

export function formatValue(value: number): string {
  if (Number.isNaN(value)) return "NaN";
  if (value === Number.POSITIVE_INFINITY) return "+Inf";
  if (value === Number.NEGATIVE_INFINITY) return "-Inf";
  return String(value);
}

export function renderExposition(families: readonly MetricFamilySnapshot[]): string {
  const lines: string[] = [];
  for (const family of families) {
    lines.push(`# HELP ${family.name} ${escapeHelp(family.help)}`);
    lines.push(`# TYPE ${family.name} ${family.kind}`);

    if (family.kind === "counter") {
      for (const s of family.series) {
        lines.push(`${family.name}${formatLabels(Object.entries(s.labels))} ${formatValue(s.value)}`);
      }
      continue;
    }

    for (const s of family.series) {
      const base = Object.entries(s.labels);
      for (const bucket of s.buckets) {
        const le: [string, string] = ["le", formatValue(bucket.le)];
        lines.push(`${family.name}_bucket${formatLabels([...base, le])} ${formatValue(bucket.count)}`);
      }
      lines.push(`${family.name}_sum${formatLabels(base)} ${formatValue(s.sum)}`);
      lines.push(`${family.name}_count${formatLabels(base)} ${formatValue(s.count)}`);
    }
  }
  return lines.length ? `${lines.join("\n")}\n` : "";
}

/**
 * The snapshot is taken synchronously up front; rendering and the collectors
 * only ever see the copy.
 */
export function createExposition(source: MetricsSource, opts: ExpositionOptions = {}): ExpositionHandler {
  const collectors = opts.collectors ?? [];

  return {
    async expose(): Promise<Exposition> {
      let body: string;
      try {
        body = renderExposition(source.snapshot());
      } catch (err) {
        throw new ExpositionError("Metrics registry could not be read", err);
      }

      for (const collect of collectors) {
        let extra: string;
        try {
          extra = await collect();
        } catch (err) {
          throw new ExpositionError("Metrics collector failed", err);
        }
        if (!extra) continue;
        body += extra.endsWith("\n") ? extra : `${extra}\n`;
      }

      return { body, contentType: EXPOSITION_CONTENT_TYPE };
    }
  };
}

export interface ParsedSample {
  name: string;
  labels: Labels;
  value: number;
}

const SAMPLE_RE = /^([a-zA-Z_:][a-zA-Z0-9_:]*)(?:\{(.*)\})?\s+(\S+)(?:\s+-?\d+)?$/;

/** Reads text exposition back into samples. Comment and blank lines are skipped. */
export function parseExposition(text: string): ParsedSample[] {
  const samples: ParsedSample[] = [];
  const lines = text.split("\n");

  lines.forEach((raw, idx) => {
    const line = raw.trim();
    if (!line || line.startsWith("#")) return;

    const m = SAMPLE_RE.exec(line);
    if (!m) throw new ExpositionParseError(idx + 1, "not a sample line");
    const [, name = "", rawLabels, rawValue = ""] = m;

    const value = parseSampleValue(rawValue);
    if (value === null) throw new ExpositionParseError(idx + 1, `invalid value "${rawValue}"`);

    samples.push({ name, labels: rawLabels ? parseLabels(rawLabels, idx + 1) : {}, value });
  });

  return samples;
}

// Special values are case-insensitive: prom-client writes NaN as "Nan".
function parseSampleValue(raw: string): number | null {
  const lower = raw.toLowerCase();
  if (lower === "+inf" || lower === "inf") return Number.POSITIVE_INFINITY;
  if (lower === "-inf") return Number.NEGATIVE_INFINITY;
  if (lower === "nan") return Number.NaN;
  const n = Number(raw);
  return Number.isNaN(n) ? null : n;
}

function parseLabels(raw: string, line: number): Labels {
  const out: Record<string, string> = {};
  let i = 0;

  while (i < raw.length) {
    const eq = raw.indexOf("=", i);
    if (eq < 0) throw new ExpositionParseError(line, "label without value");
    const key = raw.slice(i, eq).trim();
    if (!/^[a-zA-Z_][a-zA-Z0-9_]*$/.test(key)) throw new ExpositionParseError(line, `invalid label "${key}"`);
    if (raw[eq + 1] !== '"') throw new ExpositionParseError(line, `unquoted value for "${key}"`);

    let value = "";
    let j = eq + 2;
    for (; j < raw.length; j++) {
      const ch = raw.charAt(j);
      if (ch === "\\") {
        const next = raw.charAt(j + 1);
        value += next === "n" ? "\n" : next;
        j++;
        continue;
      }
      if (ch === '"') break;
      value += ch;
    }
    if (j >= raw.length) throw new ExpositionParseError(line, `unterminated value for "${key}"`);
    out[key] = value;

    i = j + 1;
    if (raw[i] === ",") i++;
    while (raw[i] === " ") i++;
  }

  return out;
}
