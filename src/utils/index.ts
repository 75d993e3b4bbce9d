/**
 * Shared utilities
 */

// Re-export logger module
export * from "./logger.js";

// Re-export command execution
export * from "./exec.js";
