/**
 * Barrel re-export for all Zod schemas.
 */
export * from "./common.js";
export * from "./board-settings.js";
export * from "./registry.js";
export * from "./capability-args.js";
