export * from "./domain.js";
export * from "./errors.js";
export * from "./catalog.js";
export * from "./buckets.js";
export * from "./schedule-policy.js";
export * from "./shuffle.js";
export * from "./bucket-iterator.js";
export * from "./ports.js";
export * from "./config.js";
export * from "./telemetry.js";
