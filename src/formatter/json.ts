/**
 * JSON formatter: serializes a VerificationReport to a JSON string.
 *
 * Each result is flattened and enriched with its topic name so that
 * consumers can read the report without the topic registry.
 */

import type { SnippetVerification, VerificationReport } from "../types/report.js";
import { topicName } from "./topic-helpers.js";

function serializeResult(result: SnippetVerification): Record<string, unknown> {
  const base = {
    id: result.snippet.id,
    title: result.snippet.title,
    topic: result.snippet.topic,
    topicName: topicName(result.snippet.topic),
    description: result.snippet.description,
    status: result.outcome.status,
    expected: result.expected,
  };
  const { outcome } = result;
  switch (outcome.status) {
    case "passed":
      return { ...base, output: outcome.output };
    case "failed":
      return {
        ...base,
        output: outcome.output,
        // JSON has no undefined; a missing line is null.
        mismatches: outcome.mismatches.map((m) => ({
          line: m.line,
          expected: m.expected ?? null,
          actual: m.actual ?? null,
        })),
      };
    case "crashed":
      return { ...base, message: outcome.message };
  }
}

/**
 * Formats a VerificationReport as a pretty-printed JSON string.
 */
export function formatJson(report: VerificationReport): string {
  const serialized = {
    timestamp: report.timestamp,
    totals: report.totals,
    results: report.results.map(serializeResult),
    warnings: report.warnings,
  };
  return JSON.stringify(serialized, null, 2);
}
