/**
 * The built-in snippet catalog.
 */

import type { Snippet } from "../types/snippet.js";
import { SnippetRegistry } from "./registry.js";
import { DISCRIMINATED_UNION_SNIPPETS } from "./discriminated-unions.js";
import { PATTERN_MATCHING_SNIPPETS } from "./pattern-guards.js";
import { COMPOSITION_SNIPPETS } from "./composition.js";
import { PIPELINE_SNIPPETS } from "./pipelines.js";
import { OPTION_RESULT_SNIPPETS } from "./option-result.js";
import { ACTIVE_PATTERN_SNIPPETS } from "./active-patterns.js";

export const ALL_SNIPPETS: readonly Snippet[] = [
  ...DISCRIMINATED_UNION_SNIPPETS,
  ...PATTERN_MATCHING_SNIPPETS,
  ...COMPOSITION_SNIPPETS,
  ...PIPELINE_SNIPPETS,
  ...OPTION_RESULT_SNIPPETS,
  ...ACTIVE_PATTERN_SNIPPETS,
];

export function createDefaultRegistry(): SnippetRegistry {
  const registry = new SnippetRegistry();
  registry.registerAll(ALL_SNIPPETS);
  return registry;
}
