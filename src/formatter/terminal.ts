/**
 * Terminal formatter: renders a VerificationReport as a status list
 * grouped by topic, with mismatch details under failing snippets.
 *
 * Depends only on the Types layer and report transforms.
 */

import type { SnippetVerification, VerificationReport } from "../types/report.js";
import type { FormatterOptions } from "./formatter.js";
import { groupByTopic } from "../orchestration/report-transforms.js";
import {
  topicName,
  statusLabel,
  colorizeStatus,
  quoteLine,
  formatTotals,
} from "./topic-helpers.js";

const LABEL_WIDTH = 5;
const DETAIL_INDENT = " ".repeat(2 + LABEL_WIDTH + 2);

function detailLines(result: SnippetVerification): string[] {
  const { outcome } = result;
  switch (outcome.status) {
    case "passed":
      return [];
    case "failed":
      return outcome.mismatches.map(
        (m) =>
          `${DETAIL_INDENT}line ${m.line}: expected ${quoteLine(m.expected)} but got ${quoteLine(m.actual)}`,
      );
    case "crashed":
      return [`${DETAIL_INDENT}threw: ${outcome.message}`];
  }
}

/**
 * Formats a VerificationReport for a terminal.
 *
 * Output is deterministic for identical input.
 */
export function formatTerminal(
  report: VerificationReport,
  options?: FormatterOptions,
): string {
  const noColor = options?.noColor ?? false;
  const lines: string[] = [];

  lines.push(`idiomkit verification: ${report.timestamp}`);
  lines.push("");

  if (report.results.length === 0) {
    lines.push("No snippets to show.");
  } else {
    const idWidth = Math.max(...report.results.map((r) => r.snippet.id.length));

    for (const group of groupByTopic(report.results)) {
      lines.push(topicName(group.topic));
      for (const result of group.results) {
        const { status } = result.outcome;
        const label = statusLabel(status);
        const paddedLabel =
          colorizeStatus(label, status, noColor) + " ".repeat(LABEL_WIDTH - label.length);
        lines.push(
          `  ${paddedLabel}  ${result.snippet.id.padEnd(idWidth)}  ${result.snippet.title}`,
        );
        lines.push(...detailLines(result));
      }
      lines.push("");
    }
    lines.pop();
  }

  lines.push("");
  lines.push(formatTotals(report.totals));

  if (report.warnings.length > 0) {
    lines.push("");
    lines.push("Warnings:");
    for (const warning of report.warnings) {
      lines.push(`  ${warning}`);
    }
  }

  return lines.join("\n");
}
