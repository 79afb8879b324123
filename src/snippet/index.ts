export { SnippetRegistry } from "./registry.js";
export { ALL_SNIPPETS, createDefaultRegistry } from "./catalog.js";
export * as discriminatedUnions from "./discriminated-unions.js";
export * as patternGuards from "./pattern-guards.js";
export * as composition from "./composition.js";
export * as pipelines from "./pipelines.js";
export * as optionResult from "./option-result.js";
export * as activePatterns from "./active-patterns.js";
