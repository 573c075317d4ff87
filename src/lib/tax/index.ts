// /src/lib/tax/index.ts
/**
 * Public exports for the tax tables used by offer comparison.
 * - No UI
 * - No offer logic
 */

export * from "./federal";
export * from "./state";
export * from "./stateTables";
