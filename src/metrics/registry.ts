import {
  DuplicateSeriesError,
  InvalidDeltaError,
  InvalidObservationError,
  InvalidSeriesDefinitionError,
  LabelMismatchError,
  UnknownSeriesError
} from "./errors.js";
import { isValidLabelName, isValidMetricName, labelKey, type LabelValues, type Labels } from "./labels.js";

export type MetricKind = "counter" | "histogram";

// Same defaults as prom-client, in seconds.
export const DEFAULT_BUCKETS: readonly number[] = [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10];

export interface SeriesHandle<K extends MetricKind = MetricKind, L extends string = string> {
  readonly name: string;
  readonly kind: K;
  readonly labelNames: readonly L[];
}

export type CounterHandle<L extends string = string> = SeriesHandle<"counter", L>;
export type HistogramHandle<L extends string = string> = SeriesHandle<"histogram", L>;

export interface RegisterOptions {
  help?: string;
  /** Histogram upper bounds; `+Inf` is always appended. */
  buckets?: readonly number[];
}

export interface CounterSeriesSnapshot {
  labels: Labels;
  value: number;
}

export interface BucketCount {
  /** Upper bound; `Infinity` for the `+Inf` bucket. */
  le: number;
  count: number;
}

export interface HistogramSeriesSnapshot {
  labels: Labels;
  buckets: BucketCount[];
  sum: number;
  count: number;
}

export type MetricFamilySnapshot =
  | {
      name: string;
      help: string;
      kind: "counter";
      labelNames: readonly string[];
      series: CounterSeriesSnapshot[];
    }
  | {
      name: string;
      help: string;
      kind: "histogram";
      labelNames: readonly string[];
      bounds: readonly number[];
      series: HistogramSeriesSnapshot[];
    };

export interface MetricsSource {
  snapshot(): MetricFamilySnapshot[];
}

interface CounterCell {
  values: readonly string[];
  value: number;
}

interface HistogramCell {
  values: readonly string[];
  cumulative: number[];
  sum: number;
  count: number;
}

type SeriesEntry =
  | { kind: "counter"; handle: CounterHandle; help: string; cells: Map<string, CounterCell> }
  | {
      kind: "histogram";
      handle: HistogramHandle;
      help: string;
      bounds: readonly number[];
      cells: Map<string, HistogramCell>;
    };

/**
 * In-process collection of named counter and histogram series.
 *
 * Every mutation is a synchronous read-modify-write on one accumulator, so
 * on the event loop it can never interleave with another mutation or with a
 * snapshot. Rejected calls leave all state untouched.
 */
export class MetricsRegistry implements MetricsSource {
  private readonly entries = new Map<string, SeriesEntry>();

  register<L extends string = never>(
    name: string,
    kind: "counter",
    labelNames?: readonly L[],
    options?: RegisterOptions
  ): CounterHandle<L>;
  register<L extends string = never>(
    name: string,
    kind: "histogram",
    labelNames?: readonly L[],
    options?: RegisterOptions
  ): HistogramHandle<L>;
  register(name: string, kind: MetricKind, labelNames: readonly string[] = [], options: RegisterOptions = {}): SeriesHandle {
    validateDefinition(name, kind, labelNames);
    const bounds = kind === "histogram" ? normalizeBuckets(name, options.buckets ?? DEFAULT_BUCKETS) : [];
    if (kind === "counter" && options.buckets) {
      throw new InvalidSeriesDefinitionError(`Counter "${name}" cannot declare buckets`);
    }

    const existing = this.entries.get(name);
    if (existing) {
      if (existing.kind !== kind) throw new DuplicateSeriesError(name, `kind ${existing.kind}`);
      if (!sameList(existing.handle.labelNames, labelNames)) {
        throw new DuplicateSeriesError(name, `labels [${existing.handle.labelNames.join(", ")}]`);
      }
      if (existing.kind === "histogram" && !sameList(existing.bounds, bounds)) {
        throw new DuplicateSeriesError(name, `buckets [${existing.bounds.join(", ")}]`);
      }
      return existing.handle;
    }

    const help = options.help ?? name;
    const names = Object.freeze([...labelNames]);
    if (kind === "counter") {
      const handle: CounterHandle = Object.freeze({ name, kind, labelNames: names });
      this.entries.set(name, { kind, handle, help, cells: new Map() });
      return handle;
    }
    const handle: HistogramHandle = Object.freeze({ name, kind, labelNames: names });
    this.entries.set(name, { kind, handle, help, bounds, cells: new Map() });
    return handle;
  }

  increment<L extends string>(handle: CounterHandle<L>, labelValues: LabelValues<L>, delta = 1): void {
    const entry = this.counterEntry(handle);
    if (!Number.isFinite(delta) || delta < 0) throw new InvalidDeltaError(handle.name, delta);
    const values = resolveLabelValues(entry.handle, labelValues);
    const key = labelKey(values);

    const cell = entry.cells.get(key);
    if (cell) {
      cell.value += delta;
      return;
    }
    entry.cells.set(key, { values, value: delta });
  }

  observe<L extends string>(handle: HistogramHandle<L>, value: number, labelValues?: LabelValues<L>): void {
    const entry = this.histogramEntry(handle);
    if (!Number.isFinite(value) || value < 0) throw new InvalidObservationError(handle.name, value);
    const input: Readonly<Record<string, string | number>> = labelValues ?? {};
    const values = resolveLabelValues(entry.handle, input);
    const key = labelKey(values);

    let cell = entry.cells.get(key);
    if (!cell) {
      cell = { values, cumulative: entry.bounds.map(() => 0), sum: 0, count: 0 };
      entry.cells.set(key, cell);
    }
    // Bounds are ascending, so every bucket from the first fitting one on counts it.
    for (let i = 0; i < entry.bounds.length; i++) {
      const bound = entry.bounds[i];
      if (bound !== undefined && value <= bound) cell.cumulative[i] = (cell.cumulative[i] ?? 0) + 1;
    }
    cell.sum += value;
    cell.count += 1;
  }

  /**
   * Point-in-time copy of every family, in registration order. Series inside a
   * family are ordered by label values so repeated renders are stable.
   */
  snapshot(): MetricFamilySnapshot[] {
    const out: MetricFamilySnapshot[] = [];
    for (const entry of this.entries.values()) {
      const { name, labelNames } = entry.handle;
      if (entry.kind === "counter") {
        out.push({
          name,
          help: entry.help,
          kind: "counter",
          labelNames,
          series: sortedCells(entry.cells).map((cell) => ({
            labels: toLabels(labelNames, cell.values),
            value: cell.value
          }))
        });
        continue;
      }
      const { bounds } = entry;
      out.push({
        name,
        help: entry.help,
        kind: "histogram",
        labelNames,
        bounds,
        series: sortedCells(entry.cells).map((cell) => ({
          labels: toLabels(labelNames, cell.values),
          buckets: [
            ...bounds.map((le, i) => ({ le, count: cell.cumulative[i] ?? 0 })),
            { le: Number.POSITIVE_INFINITY, count: cell.count }
          ],
          sum: cell.sum,
          count: cell.count
        }))
      });
    }
    return out;
  }

  private counterEntry(handle: SeriesHandle): Extract<SeriesEntry, { kind: "counter" }> {
    const entry = this.lookup(handle);
    if (entry.kind !== "counter") throw new UnknownSeriesError(handle.name, "not a counter");
    return entry;
  }

  private histogramEntry(handle: SeriesHandle): Extract<SeriesEntry, { kind: "histogram" }> {
    const entry = this.lookup(handle);
    if (entry.kind !== "histogram") throw new UnknownSeriesError(handle.name, "not a histogram");
    return entry;
  }

  private lookup(handle: SeriesHandle): SeriesEntry {
    const entry = this.entries.get(handle.name);
    if (!entry || entry.handle !== handle) throw new UnknownSeriesError(handle.name);
    return entry;
  }
}

function validateDefinition(name: string, kind: MetricKind, labelNames: readonly string[]): void {
  if (!isValidMetricName(name)) throw new InvalidSeriesDefinitionError(`Invalid metric name "${name}"`);
  const seen = new Set<string>();
  for (const label of labelNames) {
    if (!isValidLabelName(label)) {
      throw new InvalidSeriesDefinitionError(`Invalid label name "${label}" on "${name}"`);
    }
    if (kind === "histogram" && label === "le") {
      throw new InvalidSeriesDefinitionError(`Histogram "${name}" cannot use the reserved label "le"`);
    }
    if (seen.has(label)) throw new InvalidSeriesDefinitionError(`Duplicate label "${label}" on "${name}"`);
    seen.add(label);
  }
}

function normalizeBuckets(name: string, buckets: readonly number[]): readonly number[] {
  const finite = buckets[buckets.length - 1] === Number.POSITIVE_INFINITY ? buckets.slice(0, -1) : [...buckets];
  if (finite.length === 0) throw new InvalidSeriesDefinitionError(`Histogram "${name}" needs at least one bucket`);
  let previous = Number.NEGATIVE_INFINITY;
  for (const bound of finite) {
    if (!Number.isFinite(bound) || bound <= previous) {
      throw new InvalidSeriesDefinitionError(`Histogram "${name}" buckets must be finite and strictly increasing`);
    }
    previous = bound;
  }
  return Object.freeze(finite);
}

function resolveLabelValues(
  handle: SeriesHandle,
  input: Readonly<Record<string, string | number>>
): readonly string[] {
  const received = Object.keys(input);
  const mismatch = () => new LabelMismatchError(handle.name, handle.labelNames, received);
  if (received.length !== handle.labelNames.length) throw mismatch();

  const values: string[] = [];
  for (const label of handle.labelNames) {
    const value = Object.prototype.hasOwnProperty.call(input, label) ? input[label] : undefined;
    if (value === undefined) throw mismatch();
    values.push(String(value));
  }
  return values;
}

function toLabels(names: readonly string[], values: readonly string[]): Labels {
  return Object.fromEntries(names.map((n, i) => [n, values[i] ?? ""]));
}

function compareTuples(a: readonly string[], b: readonly string[]): number {
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    const x = a[i] ?? "";
    const y = b[i] ?? "";
    if (x !== y) return x < y ? -1 : 1;
  }
  return a.length - b.length;
}

function sortedCells<C extends { values: readonly string[] }>(cells: Map<string, C>): C[] {
  return [...cells.values()].sort((a, b) => compareTuples(a.values, b.values));
}

function sameList<T>(a: readonly T[], b: readonly T[]): boolean {
  return a.length === b.length && a.every((v, i) => v === b[i]);
}
