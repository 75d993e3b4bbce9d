/**
 * Identity Module
 *
 * UNIX users and groups as seen by the name service switch.
 */

export * from "./interfaces/IIdentitySource.js";
export * from "./parsers.js";
export * from "./eligibility.js";
export * from "./impl/GetentIdentitySource.js";
