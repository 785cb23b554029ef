/**
 * Barrel re-export for all type definitions.
 */
export * from "./board.js";
export * from "./capability.js";
export * from "./registry.js";
