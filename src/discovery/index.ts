export * from "./duration.js";
export * from "./scrapeTarget.js";
export * from "./manifests.js";
export * from "./scrape.js";
