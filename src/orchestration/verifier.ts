/**
 * Verifier: runs snippets and checks their output against the
 * documented output.
 *
 * The verifier accepts a RunConfig, resolves which snippets to run from
 * the registry, executes each one, and assembles the outcomes into a
 * VerificationReport.
 *
 * Dependencies flow downward only: Orchestration → Snippet, Types.
 */

import type { RunConfig } from "../types/config.js";
import type {
  LineMismatch,
  SnippetOutcome,
  SnippetVerification,
  VerificationReport,
  VerificationTotals,
} from "../types/report.js";
import type { Result } from "../types/result.js";
import type { Snippet } from "../types/snippet.js";
import type { SnippetRegistry } from "../snippet/registry.js";
import { summarizeSnippet } from "../types/snippet.js";
import { ok, err, tryCatch } from "../types/result.js";

/**
 * Error produced when a verification run has nothing to verify.
 */
export interface VerificationError {
  readonly message: string;
  readonly unknownSnippetIds: readonly string[];
}

export interface VerifyOptions {
  /** When provided, generates the timestamp for the report. */
  readonly timestampFn?: () => string;
}

type RunSelection = Pick<RunConfig, "topics" | "snippetIds">;

/**
 * Determines which snippets to run, in registry order.
 *
 * Topics and ids add up; with neither given, every registered snippet
 * runs. Ids that are not registered are returned separately.
 */
function resolveSnippets(
  selection: RunSelection,
  registry: SnippetRegistry,
): { snippets: readonly Snippet[]; unknownIds: readonly string[] } {
  const all = registry.getAll();
  if (selection.topics.length === 0 && selection.snippetIds.length === 0) {
    return { snippets: all, unknownIds: [] };
  }

  const unknownIds = selection.snippetIds.filter(
    (id) => registry.getSnippet(id) === undefined,
  );
  const snippets = all.filter(
    (snippet) =>
      selection.topics.includes(snippet.topic) ||
      selection.snippetIds.includes(snippet.id),
  );
  return { snippets, unknownIds };
}

/**
 * Compares documented and actual output line by line.
 * Returns an empty array when they are identical.
 */
export function compareLines(
  expected: readonly string[],
  actual: readonly string[],
): readonly LineMismatch[] {
  const mismatches: LineMismatch[] = [];
  const length = Math.max(expected.length, actual.length);
  for (let i = 0; i < length; i++) {
    const expectedLine = expected[i];
    const actualLine = actual[i];
    if (expectedLine !== actualLine) {
      mismatches.push({ line: i + 1, expected: expectedLine, actual: actualLine });
    }
  }
  return mismatches;
}

function describeThrown(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * Runs one snippet. A snippet that throws is reported as crashed
 * rather than aborting the run.
 */
export function verifySnippet(snippet: Snippet): SnippetVerification {
  const ran = tryCatch(() => snippet.run(), describeThrown);

  let outcome: SnippetOutcome;
  if (!ran.ok) {
    outcome = { status: "crashed", message: ran.error };
  } else {
    const mismatches = compareLines(snippet.expected, ran.value);
    outcome = mismatches.length === 0
      ? { status: "passed", output: ran.value }
      : { status: "failed", output: ran.value, mismatches };
  }

  return {
    snippet: summarizeSnippet(snippet),
    expected: snippet.expected,
    outcome,
  };
}

export function countOutcomes(
  results: readonly SnippetVerification[],
): VerificationTotals {
  let passed = 0;
  let failed = 0;
  let crashed = 0;
  for (const result of results) {
    switch (result.outcome.status) {
      case "passed":
        passed++;
        break;
      case "failed":
        failed++;
        break;
      case "crashed":
        crashed++;
        break;
    }
  }
  return { passed, failed, crashed };
}

/**
 * Run a verification pass according to the given config.
 *
 * Behavior:
 * - Unknown snippet ids produce a warning in the report
 *   (partial results are preferred over total failure).
 * - If nothing resolves, returns a VerificationError.
 * - Failed and crashed snippets are reported, never thrown.
 */
export function verify(
  config: RunSelection,
  registry: SnippetRegistry,
  options?: VerifyOptions,
): Result<VerificationReport, VerificationError> {
  const { snippets, unknownIds } = resolveSnippets(config, registry);

  if (snippets.length === 0) {
    return err({
      message:
        unknownIds.length > 0
          ? `No snippets matched; unknown snippet ids: ${unknownIds.join(", ")}`
          : "No snippets matched the requested topics",
      unknownSnippetIds: unknownIds,
    });
  }

  const results = snippets.map(verifySnippet);
  const warnings = unknownIds.map((id) => `Unknown snippet id "${id}"`);
  const timestampFn = options?.timestampFn ?? (() => new Date().toISOString());

  return ok({
    timestamp: timestampFn(),
    results,
    totals: countOutcomes(results),
    warnings,
  });
}

/**
 * True when every verified snippet passed.
 */
export function allPassed(report: VerificationReport): boolean {
  return report.totals.failed === 0 && report.totals.crashed === 0;
}
