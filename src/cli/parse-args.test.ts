/**
 * Tests for CLI argument parsing.
 *
 * The argument parser translates process.argv-style string arrays
 * into a validated RunConfig or returns a structured error.
 */

import { describe, it, expect } from "vitest";
import { parseArgs } from "./parse-args.js";
import { VERSION } from "../version.js";

describe("parseArgs", () => {
  describe("defaults", () => {
    it("selects everything with terminal output when no flags are given", () => {
      const result = parseArgs([]);
      expect(result).toEqual({
        ok: true,
        value: {
          topics: [],
          snippetIds: [],
          outputFormat: "terminal",
          outputPath: undefined,
          noColor: false,
          failuresOnly: false,
        },
      });
    });

    it("rejects positional arguments", () => {
      const result = parseArgs(["safe-divide"]);
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toEqual({
        kind: "error",
        message: 'Unexpected argument "safe-divide". Use --snippet to select a snippet',
      });
    });
  });

  describe("--format flag", () => {
    it("accepts --format json", () => {
      const result = parseArgs(["--format", "json"]);
      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.outputFormat).toBe("json");
    });

    it("accepts -f markdown", () => {
      const result = parseArgs(["-f", "markdown"]);
      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.outputFormat).toBe("markdown");
    });

    it("returns an error for unknown format", () => {
      const result = parseArgs(["--format", "xml"]);
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.message).toBe(
        'Unknown format "xml". Valid formats: terminal, json, markdown',
      );
    });

    it("returns an error when --format is last with no value", () => {
      const result = parseArgs(["--format"]);
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toEqual({ kind: "error", message: "--format requires a value" });
    });

    it("names the short flag in the missing-value error", () => {
      const result = parseArgs(["-f"]);
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.message).toBe("-f requires a value");
    });
  });

  describe("--topic flag", () => {
    it("accepts multiple topics and deduplicates them", () => {
      const result = parseArgs([
        "--topic", "pipelines",
        "-t", "option-result",
        "--topic", "pipelines",
      ]);
      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.topics).toEqual(["pipelines", "option-result"]);
    });

    it("returns an error for unknown topic", () => {
      const result = parseArgs(["--topic", "monads"]);
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.message).toContain('Unknown topic "monads"');
    });
  });

  describe("--snippet flag", () => {
    it("collects snippet ids without validating them", () => {
      const result = parseArgs(["--snippet", "safe-divide", "-s", "whatever", "-s", "safe-divide"]);
      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.snippetIds).toEqual(["safe-divide", "whatever"]);
    });
  });

  describe("--output flag", () => {
    it("infers json from a .json extension", () => {
      const result = parseArgs(["--output", "out/report.json"]);
      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.outputPath).toBe("out/report.json");
      expect(result.value.outputFormat).toBe("json");
    });

    it("infers markdown from .md and .markdown extensions", () => {
      for (const path of ["IDIOMS.md", "idioms.MARKDOWN"]) {
        const result = parseArgs(["-o", path]);
        expect(result.ok).toBe(true);
        if (!result.ok) return;
        expect(result.value.outputFormat).toBe("markdown");
      }
    });

    it("keeps an explicit --format over the extension", () => {
      const result = parseArgs(["--format", "terminal", "--output", "report.json"]);
      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.outputFormat).toBe("terminal");
    });

    it("keeps the default for unknown extensions", () => {
      const result = parseArgs(["--output", "report.txt"]);
      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.outputFormat).toBe("terminal");
    });
  });

  describe("boolean flags", () => {
    it("sets noColor and failuresOnly", () => {
      const result = parseArgs(["--no-color", "--failures-only"]);
      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.noColor).toBe(true);
      expect(result.value.failuresOnly).toBe(true);
    });

    it("rejects unknown flags", () => {
      const result = parseArgs(["--verbose"]);
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.message).toBe('Unknown flag "--verbose"');
    });
  });

  describe("informational flags", () => {
    it("returns help text for -h even alongside errors", () => {
      const result = parseArgs(["--format", "xml", "-h"]);
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe("help");
      expect(result.error.message.split("\n")[0]).toBe("Usage: idiomkit [options]");
    });

    it("returns the version for -V", () => {
      const result = parseArgs(["-V"]);
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toEqual({ kind: "version", message: `idiomkit ${VERSION}` });
    });

    it("distinguishes --list from --list-topics", () => {
      const list = parseArgs(["--list"]);
      const listTopics = parseArgs(["--list-topics"]);
      expect(list.ok ? undefined : list.error.kind).toBe("list");
      expect(listTopics.ok ? undefined : listTopics.error.kind).toBe("list-topics");
    });

    it("lists every topic with its description", () => {
      const result = parseArgs(["--list-topics"]);
      expect(result.ok).toBe(false);
      if (result.ok) return;
      const lines = result.error.message.split("\n");
      expect(lines[0]).toBe("Available topics:");
      expect(lines).toContain(
        `  ${"pipelines".padEnd(22)} Threading a value through a sequence of steps`,
      );
      expect(lines).toHaveLength(2 + 6);
    });

    it("requests MCP mode", () => {
      const result = parseArgs(["--mcp"]);
      expect(result.ok ? undefined : result.error.kind).toBe("mcp");
    });
  });
});
