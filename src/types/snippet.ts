/**
 * Snippet contract.
 *
 * A snippet is a self-contained teaching example. It documents the
 * output it is expected to print (`expected`) and can be run to produce
 * the actual output, one string per line.
 */

import type { TopicId } from "./topic.js";

export interface Snippet {
  /** Unique identifier across the catalog (e.g., "safe-divide"). */
  readonly id: string;
  readonly title: string;
  readonly topic: TopicId;
  /** One or two sentences on what the snippet demonstrates. */
  readonly description: string;
  /** Documented output, one entry per line. */
  readonly expected: readonly string[];
  /** Runs the example and returns its output lines. May throw. */
  run(): readonly string[];
}

/**
 * Snippet metadata without its behavior, as shown in listings.
 */
export interface SnippetSummary {
  readonly id: string;
  readonly title: string;
  readonly topic: TopicId;
  readonly description: string;
}

export function summarizeSnippet(snippet: Snippet): SnippetSummary {
  return {
    id: snippet.id,
    title: snippet.title,
    topic: snippet.topic,
    description: snippet.description,
  };
}
