/**
 * @fileoverview Domain barrel exports
 *
 * All file-domain implementations for filekit.
 *
 * @module domain
 */

export * from "./entities/index.js";
export * from "./providers/index.js";
export * from "./planners/index.js";
export * from "./actions/index.js";
export * from "./blocklist/index.js";
export * from "./albumArt/index.js";
export * from "./utils/index.js";
