// Library exports for embedding the registry, exposition and discovery helpers.
export * from "./metrics/errors.js";
export * from "./metrics/labels.js";
export * from "./metrics/registry.js";
export * from "./metrics/exposition.js";
export * from "./observability/metrics.js";
export { buildApp, type AppDeps } from "./api/app.js";
export { recordRequest, registerRequestInstrumentation, type RequestSample } from "./api/instrumentation.js";
export * as discovery from "./discovery/index.js";
export * as queries from "./queries/index.js";
