/**
 * Scheduler Module
 *
 * Current association state from the Slurm accounting store.
 */

export * from "./interfaces/ISchedulerStateSource.js";
export * from "./association-parser.js";
export * from "./impl/SacctmgrStateSource.js";
