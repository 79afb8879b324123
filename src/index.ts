/**
 * Library entry point: the functional toolkit, the snippet catalog,
 * verification and formatting.
 */

export * from "./types/index.js";
export * from "./snippet/index.js";
export * from "./orchestration/index.js";
export * from "./formatter/index.js";
export { VERSION } from "./version.js";
