import { describe, expect, it } from "vitest";
import {
  DuplicateSeriesError,
  InvalidDeltaError,
  InvalidObservationError,
  InvalidSeriesDefinitionError,
  LabelMismatchError,
  UnknownSeriesError
} from "../src/metrics/errors.js";
import { MetricsRegistry, type CounterHandle, type MetricFamilySnapshot } from "../src/metrics/registry.js";

function family(registry: MetricsRegistry, name: string): MetricFamilySnapshot {
  const f = registry.snapshot().find((x) => x.name === name);
  if (!f) throw new Error(`missing family ${name}`);
  return f;
}

function counterValues(registry: MetricsRegistry, name: string): Record<string, number> {
  const f = family(registry, name);
  if (f.kind !== "counter") throw new Error("not a counter");
  return Object.fromEntries(f.series.map((s) => [Object.values(s.labels).join("|"), s.value]));
}

// Small deterministic generator so the property runs are reproducible.
function lcg(seed: number): () => number {
  let state = seed;
  return () => {
    state = (state * 1664525 + 1013904223) % 4294967296;
    return state / 4294967296;
  };
}

describe("MetricsRegistry counters", () => {
  it("sums deltas per label-set regardless of call order", () => {
    const rand = lcg(42);
    const methods = ["GET", "POST", "PUT"];
    const calls = Array.from({ length: 300 }, () => ({
      method: methods[Math.floor(rand() * methods.length)] ?? "GET",
      delta: Math.floor(rand() * 10)
    }));

    const expected: Record<string, number> = {};
    for (const c of calls) expected[c.method] = (expected[c.method] ?? 0) + c.delta;

    const forward = new MetricsRegistry();
    const fh = forward.register("calls_total", "counter", ["method"]);
    calls.forEach((c) => forward.increment(fh, { method: c.method }, c.delta));

    const reversed = new MetricsRegistry();
    const rh = reversed.register("calls_total", "counter", ["method"]);
    [...calls].reverse().forEach((c) => reversed.increment(rh, { method: c.method }, c.delta));

    expect(counterValues(forward, "calls_total")).toEqual(expected);
    expect(counterValues(reversed, "calls_total")).toEqual(expected);
  });

  it("defaults the delta to one and creates label-sets lazily", () => {
    const registry = new MetricsRegistry();
    const h = registry.register("req_total", "counter", ["method", "endpoint", "http_status"]);
    expect(family(registry, "req_total").kind).toBe("counter");
    expect(counterValues(registry, "req_total")).toEqual({});

    for (let i = 0; i < 5; i++) registry.increment(h, { method: "GET", endpoint: "/", http_status: 200 });
    expect(counterValues(registry, "req_total")).toEqual({ "GET|/|200": 5 });
  });

  it("does not lose increments from concurrent callers", async () => {
    const registry = new MetricsRegistry();
    const h = registry.register("parallel_total", "counter", ["worker"]);
    const workers = 20;
    const perWorker = 50;

    await Promise.all(
      Array.from({ length: workers }, async (_, w) => {
        for (let i = 0; i < perWorker; i++) {
          registry.increment(h, { worker: w % 2 === 0 ? "even" : "odd" });
          await Promise.resolve();
        }
      })
    );

    expect(counterValues(registry, "parallel_total")).toEqual({ even: 500, odd: 500 });
  });

  it("rejects negative and non-finite deltas without changing the value", () => {
    const registry = new MetricsRegistry();
    const h = registry.register("neg_total", "counter", ["k"]);
    registry.increment(h, { k: "a" }, 3);

    expect(() => registry.increment(h, { k: "a" }, -1)).toThrow(InvalidDeltaError);
    expect(() => registry.increment(h, { k: "a" }, Number.NaN)).toThrow(InvalidDeltaError);
    expect(() => registry.increment(h, { k: "b" }, Number.POSITIVE_INFINITY)).toThrow(InvalidDeltaError);
    expect(counterValues(registry, "neg_total")).toEqual({ a: 3 });
  });

  it("rejects label values that do not match the schema", () => {
    const registry = new MetricsRegistry();
    const h = registry.register("labels_total", "counter", ["method", "endpoint"]);
    // Widened handle, as a caller building label maps at run time would hold.
    const loose: CounterHandle = h;

    expect(() => registry.increment(h, { method: "GET", endpoint: "/" }, 1)).not.toThrow();
    expect(() => registry.increment(loose, { method: "GET" })).toThrow(LabelMismatchError);
    expect(() => registry.increment(loose, { method: "GET", endpoint: "/", extra: "x" })).toThrow(LabelMismatchError);
    expect(() => registry.increment(loose, { method: "GET", path: "/" })).toThrow(LabelMismatchError);
    expect(counterValues(registry, "labels_total")).toEqual({ "GET|/": 1 });
  });

  it("returns snapshots that later mutation does not change", () => {
    const registry = new MetricsRegistry();
    const h = registry.register("copy_total", "counter");
    registry.increment(h, {}, 2);
    const before = registry.snapshot();
    registry.increment(h, {}, 5);

    const f = before[0];
    expect(f?.kind === "counter" ? f.series[0]?.value : undefined).toBe(2);
    expect(counterValues(registry, "copy_total")).toEqual({ "": 7 });
  });

  it("orders series by label values", () => {
    const registry = new MetricsRegistry();
    const h = registry.register("order_total", "counter", ["method"]);
    registry.increment(h, { method: "POST" });
    registry.increment(h, { method: "DELETE" });
    registry.increment(h, { method: "GET" });

    const f = family(registry, "order_total");
    expect(f.series.map((s) => s.labels.method)).toEqual(["DELETE", "GET", "POST"]);
  });

  it("orders values that need escaping by the raw label value", () => {
    const registry = new MetricsRegistry();
    const h = registry.register("quoted_total", "counter", ["path", "method"]);
    registry.increment(h, { path: "a#", method: "GET" });
    registry.increment(h, { path: 'a"', method: "GET" });
    registry.increment(h, { path: "a", method: "POST" });
    registry.increment(h, { path: "a", method: "GET" });

    const f = family(registry, "quoted_total");
    expect(f.series.map((s) => [s.labels.path, s.labels.method])).toEqual([
      ["a", "GET"],
      ["a", "POST"],
      ['a"', "GET"],
      ["a#", "GET"]
    ]);
  });
});

describe("MetricsRegistry histograms", () => {
  it("keeps cumulative bucket counts, sum and count", () => {
    const registry = new MetricsRegistry();
    const h = registry.register("lat_seconds", "histogram", [], { buckets: [0.1, 0.25, 0.5] });
    for (const v of [0.1, 0.2, 0.4, 0.4, 0.5]) registry.observe(h, v);

    const f = family(registry, "lat_seconds");
    if (f.kind !== "histogram") throw new Error("not a histogram");
    const s = f.series[0];
    expect(s?.buckets).toEqual([
      { le: 0.1, count: 1 },
      { le: 0.25, count: 2 },
      { le: 0.5, count: 5 },
      { le: Number.POSITIVE_INFINITY, count: 5 }
    ]);
    expect(s?.sum).toBeCloseTo(1.6, 10);
    expect(s?.count).toBe(5);
  });

  it("counts each bound as the number of observations at or below it", () => {
    const rand = lcg(7);
    const bounds = [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2, 5];
    const values = Array.from({ length: 500 }, () => Math.round(rand() * 6000) / 1000);

    const registry = new MetricsRegistry();
    const h = registry.register("prop_seconds", "histogram", [], { buckets: bounds });
    values.forEach((v) => registry.observe(h, v));

    const f = family(registry, "prop_seconds");
    if (f.kind !== "histogram") throw new Error("not a histogram");
    const buckets = f.series[0]?.buckets ?? [];
    expect(buckets.map((b) => b.count)).toEqual([
      ...bounds.map((b) => values.filter((v) => v <= b).length),
      values.length
    ]);
    for (let i = 1; i < buckets.length; i++) {
      expect(buckets[i]?.count ?? 0).toBeGreaterThanOrEqual(buckets[i - 1]?.count ?? 0);
    }
  });

  it("rejects invalid observations without touching state", () => {
    const registry = new MetricsRegistry();
    const h = registry.register("bad_seconds", "histogram", [], { buckets: [1] });

    expect(() => registry.observe(h, -0.5)).toThrow(InvalidObservationError);
    expect(family(registry, "bad_seconds").series).toEqual([]);

    registry.observe(h, 0.5);
    expect(() => registry.observe(h, Number.NaN)).toThrow(InvalidObservationError);
    expect(() => registry.observe(h, Number.POSITIVE_INFINITY)).toThrow(InvalidObservationError);

    const f = family(registry, "bad_seconds");
    if (f.kind !== "histogram") throw new Error("not a histogram");
    expect(f.series[0]).toEqual({
      labels: {},
      buckets: [
        { le: 1, count: 1 },
        { le: Number.POSITIVE_INFINITY, count: 1 }
      ],
      sum: 0.5,
      count: 1
    });
  });

  it("supports labelled histograms", () => {
    const registry = new MetricsRegistry();
    const h = registry.register("route_seconds", "histogram", ["route"], { buckets: [1] });
    registry.observe(h, 0.2, { route: "/a" });
    registry.observe(h, 3, { route: "/b" });

    const f = family(registry, "route_seconds");
    if (f.kind !== "histogram") throw new Error("not a histogram");
    expect(f.series.map((s) => [s.labels.route, s.buckets[0]?.count, s.count])).toEqual([
      ["/a", 1, 1],
      ["/b", 0, 1]
    ]);
  });
});

describe("MetricsRegistry registration", () => {
  it("returns the existing handle for an identical definition", () => {
    const registry = new MetricsRegistry();
    const a = registry.register("same_total", "counter", ["k"]);
    const b = registry.register("same_total", "counter", ["k"]);
    expect(b).toBe(a);
  });

  it("throws DuplicateSeriesError on a conflicting definition", () => {
    const registry = new MetricsRegistry();
    registry.register("dup_total", "counter", ["k"]);
    registry.register("dup_seconds", "histogram", [], { buckets: [1, 2] });

    expect(() => registry.register("dup_total", "counter", ["other"])).toThrow(DuplicateSeriesError);
    expect(() => registry.register("dup_total", "histogram")).toThrow(DuplicateSeriesError);
    expect(() => registry.register("dup_seconds", "histogram", [], { buckets: [1, 3] })).toThrow(
      DuplicateSeriesError
    );
  });

  it("validates names, labels and buckets", () => {
    const registry = new MetricsRegistry();
    expect(() => registry.register("1bad", "counter")).toThrow(InvalidSeriesDefinitionError);
    expect(() => registry.register("ok_total", "counter", ["bad-label"])).toThrow(InvalidSeriesDefinitionError);
    expect(() => registry.register("ok_total", "counter", ["__internal"])).toThrow(InvalidSeriesDefinitionError);
    expect(() => registry.register("ok_total", "counter", ["a", "a"])).toThrow(InvalidSeriesDefinitionError);
    expect(() => registry.register("h_seconds", "histogram", ["le"])).toThrow(InvalidSeriesDefinitionError);
    expect(() => registry.register("h_seconds", "histogram", [], { buckets: [] })).toThrow(
      InvalidSeriesDefinitionError
    );
    expect(() => registry.register("h_seconds", "histogram", [], { buckets: [1, 1] })).toThrow(
      InvalidSeriesDefinitionError
    );
    expect(() => registry.register("c_total", "counter", [], { buckets: [1] })).toThrow(InvalidSeriesDefinitionError);
    expect(registry.snapshot()).toEqual([]);
  });

  it("drops an explicit +Inf bound", () => {
    const registry = new MetricsRegistry();
    registry.register("inf_seconds", "histogram", [], { buckets: [1, Number.POSITIVE_INFINITY] });
    const f = family(registry, "inf_seconds");
    expect(f.kind === "histogram" ? f.bounds : null).toEqual([1]);
  });

  it("rejects handles from another registry", () => {
    const a = new MetricsRegistry();
    const b = new MetricsRegistry();
    const h = a.register("foreign_total", "counter");
    b.register("foreign_total", "counter");
    expect(() => b.increment(h, {})).toThrow(UnknownSeriesError);
  });
});
