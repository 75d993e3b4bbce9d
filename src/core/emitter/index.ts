/**
 * Emitter Module
 */

export * from "./command-emitter.js";
