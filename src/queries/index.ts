export * from "./promql.js";
export * from "./samples.js";
export * from "./dashboard.js";
