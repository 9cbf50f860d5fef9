/**
 * @bytelevel/core -- shared errors, ports and defaults.
 */
export * from "./errors.js";
export * from "./interfaces.js";
export * from "./types.js";
