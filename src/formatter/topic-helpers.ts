/**
 * Shared helpers for topic metadata, status labels and line rendering.
 * Depends only on the Types layer.
 */

import type { TopicId } from "../types/topic.js";
import type { OutcomeStatus, VerificationTotals } from "../types/report.js";
import { TOPICS } from "../types/topic.js";

/**
 * Returns the human-readable topic name, falling back to the raw id.
 */
export function topicName(topic: TopicId): string {
  const descriptor = TOPICS.get(topic);
  return descriptor !== undefined ? descriptor.name : topic;
}

export function topicDescription(topic: TopicId): string {
  const descriptor = TOPICS.get(topic);
  return descriptor !== undefined ? descriptor.description : "";
}

const STATUS_LABELS: Readonly<Record<OutcomeStatus, string>> = {
  passed: "PASS",
  failed: "FAIL",
  crashed: "CRASH",
};

export function statusLabel(status: OutcomeStatus): string {
  return STATUS_LABELS[status];
}

const ANSI_RESET = "\x1b[0m";
const ANSI_GREEN = "\x1b[32m";
const ANSI_RED = "\x1b[31m";
const ANSI_YELLOW = "\x1b[33m";

const STATUS_COLORS: Readonly<Record<OutcomeStatus, string>> = {
  passed: ANSI_GREEN,
  failed: ANSI_RED,
  crashed: ANSI_YELLOW,
};

/**
 * Wraps text in the ANSI color for the given status.
 * Returns the text unchanged when color is disabled.
 */
export function colorizeStatus(text: string, status: OutcomeStatus, noColor = false): string {
  if (noColor) {
    return text;
  }
  return `${STATUS_COLORS[status]}${text}${ANSI_RESET}`;
}

/**
 * Renders one side of a line mismatch: the quoted line, or
 * "(missing)" when that side ran out of lines.
 */
export function quoteLine(line: string | undefined): string {
  return line === undefined ? "(missing)" : JSON.stringify(line);
}

export function formatTotals(totals: VerificationTotals): string {
  return `${totals.passed} passed, ${totals.failed} failed, ${totals.crashed} crashed`;
}
