import { REQUEST_COUNT_METRIC, REQUEST_LATENCY_METRIC } from "../observability/metrics.js";
import { latencyQuantileQuery, rateQuery } from "./promql.js";

export interface DashboardPanel {
  id: number;
  title: string;
  type: "timeseries";
  unit: string;
  gridPos: { x: number; y: number; w: number; h: number };
  targets: Array<{ refId: string; expr: string; legendFormat: string }>;
}

export interface DashboardDefinition {
  title: string;
  uid: string;
  refresh: string;
  time: { from: string; to: string };
  panels: DashboardPanel[];
}

export interface DashboardOptions {
  title?: string;
  uid?: string;
  window?: string;
  counter?: string;
  histogram?: string;
  refresh?: string;
}

export function buildDashboard(opts: DashboardOptions = {}): DashboardDefinition {
  const window = opts.window ?? "5m";
  const counter = opts.counter ?? REQUEST_COUNT_METRIC;
  const histogram = opts.histogram ?? REQUEST_LATENCY_METRIC;

  return {
    title: opts.title ?? "Sample app",
    uid: opts.uid ?? "sample-app",
    refresh: opts.refresh ?? "15s",
    time: { from: "now-1h", to: "now" },
    panels: [
      {
        id: 1,
        title: "Request rate",
        type: "timeseries",
        unit: "reqps",
        gridPos: { x: 0, y: 0, w: 12, h: 8 },
        targets: [{ refId: "A", expr: rateQuery(counter, window), legendFormat: "{{endpoint}} {{http_status}}" }]
      },
      {
        id: 2,
        title: "Request latency",
        type: "timeseries",
        unit: "s",
        gridPos: { x: 12, y: 0, w: 12, h: 8 },
        targets: [
          { refId: "A", expr: latencyQuantileQuery(0.95, histogram, window), legendFormat: "p95" },
          { refId: "B", expr: latencyQuantileQuery(0.5, histogram, window), legendFormat: "p50" }
        ]
      }
    ]
  };
}
