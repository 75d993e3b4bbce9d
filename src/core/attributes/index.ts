/**
 * Attributes Module
 */

export * from "./attributes.js";
