/**
 * Reconciliation Module
 *
 * Diffs resolved policy against scheduler state and plans the sacctmgr
 * commands that bring the scheduler in line.
 */

// Interfaces
export * from "./interfaces/IReconciliation.js";

// Implementation
export * from "./impl/DiffEngine.js";
export * from "./impl/AccountReconciler.js";
