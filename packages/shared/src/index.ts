/**
 * @boardlink/shared: the contract layer for the boardlink monorepo.
 *
 * Every other package imports from here. Contains:
 *   - TypeScript types for the board, capabilities and registry records
 *   - Zod schemas for the settings/registry documents and capability arguments
 *   - Capability procedure naming
 *   - Structured error hierarchy
 */

// Type definitions for all domain entities
export * from "./types/index.js";

// Zod schemas for documents and capability arguments
export * from "./schemas/index.js";

// Procedure naming convention
export * from "./procedure.js";

// Structured error classes
export * from "./errors.js";
