/**
 * Snippet registry.
 *
 * Central lookup for snippets by id and by topic. Snippets are
 * registered once at startup; the verification layer queries the
 * registry to resolve what a run should execute.
 */

import type { TopicId } from "../types/topic.js";
import type { Snippet } from "../types/snippet.js";

export class SnippetRegistry {
  private readonly snippets: Map<string, Snippet> = new Map();

  /**
   * Register a snippet. Throws if a snippet with the same id
   * is already registered (programmer error).
   */
  register(snippet: Snippet): void {
    if (this.snippets.has(snippet.id)) {
      throw new Error(
        `Snippet with id "${snippet.id}" is already registered`,
      );
    }
    this.snippets.set(snippet.id, snippet);
  }

  registerAll(snippets: readonly Snippet[]): void {
    for (const snippet of snippets) {
      this.register(snippet);
    }
  }

  /**
   * Get a specific snippet by its id.
   * Returns undefined if not found.
   */
  getSnippet(id: string): Snippet | undefined {
    return this.snippets.get(id);
  }

  /**
   * All snippets of a topic, in registration order.
   */
  getSnippetsForTopic(topic: TopicId): readonly Snippet[] {
    return this.getAll().filter((snippet) => snippet.topic === topic);
  }

  getAll(): readonly Snippet[] {
    return [...this.snippets.values()];
  }

  getRegisteredIds(): readonly string[] {
    return [...this.snippets.keys()];
  }
}
