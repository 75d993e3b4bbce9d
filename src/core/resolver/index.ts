/**
 * Resolver Module
 */

export * from "./settings-resolver.js";
