/**
 * Policy Module
 */

export * from "./policy-reader.js";
