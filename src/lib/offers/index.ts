// /src/lib/offers/index.ts
/**
 * Public exports for offer comparison.
 * - Pure engine (no I/O, no caching)
 * - Headless comparison session
 */

export * from "./compare";
export * from "./compensation";
export * from "./engine";
export * from "./errors";
export * from "./gsa";
export * from "./report";
export * from "./savings";
export * from "./session";
export * from "./validate";
