// /src/contracts/index.ts
/**
 * Contracts - Single Source of Truth
 *
 * Engine, session and route modules import shapes from here.
 * DO NOT define duplicate offer or result types elsewhere.
 */

// Offer + tax settings inputs (zod schemas)
export * from "./offers";

// Engine outputs and typed failures
export * from "./results";
