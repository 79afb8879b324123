/**
 * Verification result types.
 *
 * A verification run executes snippets and compares what they print
 * with what they document.
 */

import type { SnippetSummary } from "./snippet.js";

/**
 * A single line where documented and actual output disagree.
 * A side that ran out of lines is undefined.
 */
export interface LineMismatch {
  /** 1-based line number. */
  readonly line: number;
  readonly expected: string | undefined;
  readonly actual: string | undefined;
}

export type SnippetOutcome =
  | { readonly status: "passed"; readonly output: readonly string[] }
  | {
      readonly status: "failed";
      readonly output: readonly string[];
      readonly mismatches: readonly LineMismatch[];
    }
  | { readonly status: "crashed"; readonly message: string };

export type OutcomeStatus = SnippetOutcome["status"];

export interface SnippetVerification {
  readonly snippet: SnippetSummary;
  readonly expected: readonly string[];
  readonly outcome: SnippetOutcome;
}

export interface VerificationTotals {
  readonly passed: number;
  readonly failed: number;
  readonly crashed: number;
}

export interface VerificationReport {
  /** ISO-8601 timestamp of the run. */
  readonly timestamp: string;
  readonly results: readonly SnippetVerification[];
  /** Counts over every snippet that ran, even if results were filtered later. */
  readonly totals: VerificationTotals;
  readonly warnings: readonly string[];
}
