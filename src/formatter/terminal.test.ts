/**
 * Tests for the terminal formatter.
 */

import { describe, it, expect } from "vitest";
import type { VerificationReport } from "../types/report.js";
import { formatTerminal } from "./terminal.js";

function makeReport(overrides?: Partial<VerificationReport>): VerificationReport {
  return {
    timestamp: "2025-01-15T10:00:00.000Z",
    results: [
      {
        snippet: {
          id: "safe-divide",
          title: "Converting exceptions to results",
          topic: "option-result",
          description: "Division.",
        },
        expected: ["Ok(1)"],
        outcome: { status: "passed", output: ["Ok(1)"] },
      },
      {
        snippet: {
          id: "validate-password",
          title: "Validating a password",
          topic: "option-result",
          description: "Passwords.",
        },
        expected: ["Ok(1)"],
        outcome: {
          status: "failed",
          output: ["Ok(2)"],
          mismatches: [{ line: 1, expected: "Ok(1)", actual: "Ok(2)" }],
        },
      },
      {
        snippet: { id: "parity", title: "Even or odd", topic: "active-patterns", description: "" },
        expected: ["7 is odd"],
        outcome: { status: "crashed", message: "kaboom" },
      },
      {
        snippet: {
          id: "shape-area",
          title: "Area of a shape",
          topic: "discriminated-unions",
          description: "",
        },
        expected: ["circle: 3.14"],
        outcome: { status: "passed", output: ["circle: 3.14"] },
      },
    ],
    totals: { passed: 2, failed: 1, crashed: 1 },
    warnings: [],
    ...overrides,
  };
}

describe("formatTerminal", () => {
  it("groups results by topic in catalog order with aligned columns", () => {
    const output = formatTerminal(makeReport(), { noColor: true });
    expect(output.split("\n")).toEqual([
      "idiomkit verification: 2025-01-15T10:00:00.000Z",
      "",
      "Discriminated Unions",
      "  PASS   shape-area         Area of a shape",
      "",
      "Option and Result",
      "  PASS   safe-divide        Converting exceptions to results",
      "  FAIL   validate-password  Validating a password",
      '         line 1: expected "Ok(1)" but got "Ok(2)"',
      "",
      "Active Patterns",
      "  CRASH  parity             Even or odd",
      "         threw: kaboom",
      "",
      "2 passed, 1 failed, 1 crashed",
    ]);
  });

  it("colors status labels unless color is disabled", () => {
    const output = formatTerminal(makeReport());
    expect(output).toContain("  \x1b[32mPASS\x1b[0m   shape-area");
    expect(output).toContain("  \x1b[33mCRASH\x1b[0m  parity");
  });

  it("shows a missing actual line", () => {
    const report = makeReport({
      results: [
        {
          snippet: { id: "short", title: "Short", topic: "pipelines", description: "" },
          expected: ["a", "b"],
          outcome: {
            status: "failed",
            output: ["a"],
            mismatches: [{ line: 2, expected: "b", actual: undefined }],
          },
        },
      ],
    });
    const output = formatTerminal(report, { noColor: true });
    expect(output.split("\n")).toContain('         line 2: expected "b" but got (missing)');
  });

  it("says so when there is nothing to show", () => {
    const output = formatTerminal(
      makeReport({ results: [], totals: { passed: 3, failed: 0, crashed: 0 } }),
      { noColor: true },
    );
    expect(output.split("\n")).toEqual([
      "idiomkit verification: 2025-01-15T10:00:00.000Z",
      "",
      "No snippets to show.",
      "",
      "3 passed, 0 failed, 0 crashed",
    ]);
  });

  it("lists warnings at the end", () => {
    const output = formatTerminal(
      makeReport({ warnings: ['Unknown snippet id "nope"'] }),
      { noColor: true },
    );
    const lines = output.split("\n");
    expect(lines.slice(-3)).toEqual(["", "Warnings:", '  Unknown snippet id "nope"']);
  });
});
