/**
 * Diagnostics Module
 */

export * from "./diagnostics.js";
