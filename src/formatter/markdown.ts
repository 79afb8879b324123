/**
 * Markdown formatter: regenerates the snippet documentation from a
 * VerificationReport: one section per topic, one subsection per
 * snippet, with the output each snippet actually printed.
 *
 * Snippets whose output drifted from their documentation are flagged
 * and show both versions.
 */

import type { SnippetVerification, VerificationReport } from "../types/report.js";
import { groupByTopic } from "../orchestration/report-transforms.js";
import { topicName, topicDescription, formatTotals } from "./topic-helpers.js";

function fence(lines: readonly string[]): string[] {
  return ["```text", ...lines, "```"];
}

function snippetSection(result: SnippetVerification): string[] {
  const lines: string[] = [
    `### ${result.snippet.title}`,
    "",
    `\`${result.snippet.id}\`: ${result.snippet.description}`,
    "",
  ];
  const { outcome } = result;
  switch (outcome.status) {
    case "passed":
      lines.push(...fence(outcome.output));
      break;
    case "failed":
      lines.push("> **Output differs from the documented output.**");
      lines.push("");
      lines.push("Documented:");
      lines.push("");
      lines.push(...fence(result.expected));
      lines.push("");
      lines.push("Actual:");
      lines.push("");
      lines.push(...fence(outcome.output));
      break;
    case "crashed":
      lines.push(`> **Snippet threw:** ${outcome.message}`);
      lines.push("");
      lines.push("Documented:");
      lines.push("");
      lines.push(...fence(result.expected));
      break;
  }
  lines.push("");
  return lines;
}

export function formatMarkdown(report: VerificationReport): string {
  const lines: string[] = [
    "# Idiomatic TypeScript snippets",
    "",
    `Verified ${report.timestamp}: ${formatTotals(report.totals)}.`,
    "",
  ];

  for (const group of groupByTopic(report.results)) {
    lines.push(`## ${topicName(group.topic)}`);
    lines.push("");
    lines.push(topicDescription(group.topic));
    lines.push("");
    for (const result of group.results) {
      lines.push(...snippetSection(result));
    }
  }

  if (report.warnings.length > 0) {
    lines.push("## Warnings");
    lines.push("");
    for (const warning of report.warnings) {
      lines.push(`- ${warning}`);
    }
    lines.push("");
  }

  return lines.join("\n");
}
