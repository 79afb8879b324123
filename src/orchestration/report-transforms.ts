/**
 * Pure transformations on VerificationReport.
 *
 * These functions post-process a report without mutating the original.
 * They are used by the CLI runner, the MCP server handler and the
 * formatters.
 *
 * Dependencies: Types layer only.
 */

import type { TopicId } from "../types/topic.js";
import type { SnippetVerification, VerificationReport } from "../types/report.js";
import { TOPIC_IDS } from "../types/topic.js";

/**
 * Returns a new report keeping only failed and crashed snippets.
 * Totals still describe the whole run.
 */
export function onlyFailures(report: VerificationReport): VerificationReport {
  return {
    ...report,
    results: report.results.filter((r) => r.outcome.status !== "passed"),
  };
}

export interface TopicGroup {
  readonly topic: TopicId;
  readonly results: readonly SnippetVerification[];
}

/**
 * Groups results by topic in catalog topic order, skipping empty topics.
 * Within a topic the original order is kept.
 */
export function groupByTopic(
  results: readonly SnippetVerification[],
): readonly TopicGroup[] {
  const groups: TopicGroup[] = [];
  for (const topic of TOPIC_IDS) {
    const matching = results.filter((r) => r.snippet.topic === topic);
    if (matching.length > 0) {
      groups.push({ topic, results: matching });
    }
  }
  return groups;
}
