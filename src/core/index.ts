/**
 * Core module - reconciliation engine shared by the CLI commands
 */

// Re-export error classes
export * from "./errors.js";

// Re-export all core modules
export * from "./attributes/index.js";
export * from "./config/index.js";
export * from "./diagnostics/index.js";
export * from "./identity/index.js";
export * from "./scheduler/index.js";
export * from "./policy/index.js";
export * from "./resolver/index.js";
export * from "./reconciliation/index.js";
export * from "./emitter/index.js";

// Re-export types
export * from "../types/result.js";
