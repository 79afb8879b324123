import { describe, it, expect } from "vitest";
import { onlyFailures, groupByTopic } from "./report-transforms.js";
import type { SnippetOutcome, SnippetVerification, VerificationReport } from "../types/report.js";
import type { TopicId } from "../types/topic.js";

function createVerification(
  id: string,
  topic: TopicId,
  outcome: SnippetOutcome,
): SnippetVerification {
  return {
    snippet: { id, title: id, topic, description: "" },
    expected: ["line"],
    outcome,
  };
}

const passed: SnippetOutcome = { status: "passed", output: ["line"] };
const crashed: SnippetOutcome = { status: "crashed", message: "boom" };
const failed: SnippetOutcome = {
  status: "failed",
  output: ["other"],
  mismatches: [{ line: 1, expected: "line", actual: "other" }],
};

function createReport(results: readonly SnippetVerification[]): VerificationReport {
  return {
    timestamp: "2025-01-01T00:00:00.000Z",
    results,
    totals: { passed: 1, failed: 1, crashed: 1 },
    warnings: [],
  };
}

describe("onlyFailures", () => {
  it("drops passing snippets and keeps totals", () => {
    const report = createReport([
      createVerification("a", "composition", passed),
      createVerification("b", "composition", failed),
      createVerification("c", "pipelines", crashed),
    ]);

    const filtered = onlyFailures(report);

    expect(filtered.results.map((r) => r.snippet.id)).toEqual(["b", "c"]);
    expect(filtered.totals).toEqual(report.totals);
  });

  it("does not mutate the original report", () => {
    const report = createReport([createVerification("a", "composition", passed)]);
    onlyFailures(report);
    expect(report.results).toHaveLength(1);
  });
});

describe("groupByTopic", () => {
  it("orders groups by catalog topic order and skips empty topics", () => {
    const groups = groupByTopic([
      createVerification("p1", "pipelines", passed),
      createVerification("d1", "discriminated-unions", passed),
      createVerification("p2", "pipelines", failed),
    ]);

    expect(groups.map((g) => g.topic)).toEqual(["discriminated-unions", "pipelines"]);
    expect(groups[1]?.results.map((r) => r.snippet.id)).toEqual(["p1", "p2"]);
  });

  it("returns no groups for no results", () => {
    expect(groupByTopic([])).toEqual([]);
  });
});
