/**
 * CLI argument parser.
 *
 * Translates a process.argv-style string array into a RunConfig
 * or a structured error. Uses only Node.js built-ins: no external
 * argument-parsing libraries.
 *
 * Dependencies: Types layer only.
 */

import type { TopicId } from "../types/topic.js";
import type { OutputFormat, RunConfig } from "../types/config.js";
import { TOPIC_IDS, TOPICS, isTopicId } from "../types/topic.js";
import { VERSION } from "../version.js";

/**
 * Non-config results from parsing: help, version, listings, MCP mode or error.
 */
export interface ParseError {
  readonly kind: "error" | "help" | "version" | "mcp" | "list" | "list-topics";
  readonly message: string;
}

export type ParseResult =
  | { readonly ok: true; readonly value: RunConfig }
  | { readonly ok: false; readonly error: ParseError };

const OUTPUT_FORMATS: readonly OutputFormat[] = ["terminal", "json", "markdown"];

function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

/**
 * Maps short flag aliases to their long equivalents.
 */
const SHORT_TO_LONG: ReadonlyMap<string, string> = new Map([
  ["-f", "--format"],
  ["-t", "--topic"],
  ["-s", "--snippet"],
  ["-o", "--output"],
  ["-h", "--help"],
  ["-V", "--version"],
]);

/**
 * Parse a CLI argument array into a RunConfig.
 *
 * Expected usage:
 *   idiomkit [options]
 */
export function parseArgs(argv: readonly string[]): ParseResult {
  // Expand short flags to their long equivalents before parsing.
  const expandedArgv = argv.map((arg) => SHORT_TO_LONG.get(arg) ?? arg);

  // Informational flags short-circuit.
  if (expandedArgv.includes("--help")) {
    return { ok: false, error: { kind: "help", message: helpText() } };
  }

  if (expandedArgv.includes("--version")) {
    return { ok: false, error: { kind: "version", message: `idiomkit ${VERSION}` } };
  }

  if (expandedArgv.includes("--mcp")) {
    return { ok: false, error: { kind: "mcp", message: "Starting MCP server" } };
  }

  if (expandedArgv.includes("--list-topics")) {
    return { ok: false, error: { kind: "list-topics", message: listTopicsText() } };
  }

  if (expandedArgv.includes("--list")) {
    return { ok: false, error: { kind: "list", message: "" } };
  }

  let format: OutputFormat = "terminal";
  let formatExplicit = false;
  const topics: TopicId[] = [];
  const snippetIds: string[] = [];
  let outputPath: string | undefined;
  let noColor = false;
  let failuresOnly = false;

  const fail = (message: string): ParseResult => ({
    ok: false,
    error: { kind: "error", message },
  });

  let i = 0;
  while (i < expandedArgv.length) {
    const arg = expandedArgv[i] ?? "";
    const originalArg = argv[i] ?? arg;
    const value = expandedArgv[i + 1];

    switch (arg) {
      case "--format": {
        if (value === undefined) {
          return fail(`${originalArg} requires a value`);
        }
        if (!isOutputFormat(value)) {
          return fail(
            `Unknown format "${value}". Valid formats: ${OUTPUT_FORMATS.join(", ")}`,
          );
        }
        format = value;
        formatExplicit = true;
        i += 2;
        continue;
      }

      case "--topic": {
        if (value === undefined) {
          return fail(`${originalArg} requires a value`);
        }
        if (!isTopicId(value)) {
          return fail(
            `Unknown topic "${value}". Valid topics: ${TOPIC_IDS.join(", ")}`,
          );
        }
        if (!topics.includes(value)) {
          topics.push(value);
        }
        i += 2;
        continue;
      }

      case "--snippet": {
        if (value === undefined) {
          return fail(`${originalArg} requires a value`);
        }
        if (!snippetIds.includes(value)) {
          snippetIds.push(value);
        }
        i += 2;
        continue;
      }

      case "--output": {
        if (value === undefined) {
          return fail(`${originalArg} requires a value`);
        }
        outputPath = value;
        i += 2;
        continue;
      }

      case "--no-color":
        noColor = true;
        i += 1;
        continue;

      case "--failures-only":
        failuresOnly = true;
        i += 1;
        continue;
    }

    if (arg.startsWith("-")) {
      return fail(`Unknown flag "${originalArg}"`);
    }
    return fail(`Unexpected argument "${originalArg}". Use --snippet to select a snippet`);
  }

  // Infer output format from --output file extension when --format was not explicit.
  if (!formatExplicit && outputPath !== undefined) {
    const inferred = inferFormatFromExtension(outputPath);
    if (inferred !== undefined) {
      format = inferred;
    }
  }

  return {
    ok: true,
    value: {
      topics,
      snippetIds,
      outputFormat: format,
      outputPath,
      noColor,
      failuresOnly,
    },
  };
}

const EXTENSION_FORMAT_MAP: ReadonlyMap<string, OutputFormat> = new Map([
  [".json", "json"],
  [".md", "markdown"],
  [".markdown", "markdown"],
]);

/**
 * Infers an output format from a file path's extension.
 * Returns undefined if the extension is not recognized.
 */
function inferFormatFromExtension(filePath: string): OutputFormat | undefined {
  const dotIndex = filePath.lastIndexOf(".");
  if (dotIndex === -1) {
    return undefined;
  }
  const ext = filePath.slice(dotIndex).toLowerCase();
  return EXTENSION_FORMAT_MAP.get(ext);
}

function listTopicsText(): string {
  return [
    "Available topics:",
    "",
    ...[...TOPICS.values()].map(
      (t) => `  ${t.id.padEnd(22)} ${t.description}`,
    ),
  ].join("\n");
}

function helpText(): string {
  return [
    "Usage: idiomkit [options]",
    "",
    "Run the idiom snippets and check each one prints its documented output.",
    "",
    "Options:",
    "  -f, --format <format>   Output format (terminal, json, markdown)",
    "  -t, --topic <topic>     Only run snippets of this topic (repeatable)",
    "  -s, --snippet <id>      Only run this snippet (repeatable)",
    "  -o, --output <path>     Write output to file instead of stdout",
    "                          (format is inferred from .json/.md extension if --format is omitted)",
    "      --failures-only     Leave passing snippets out of the report",
    "      --no-color          Disable ANSI color codes in terminal output (also honors NO_COLOR env var)",
    "      --list              List available snippets",
    "      --list-topics       List available topics",
    "      --mcp               Start as MCP server (stdio transport)",
    "  -h, --help              Show this help message",
    "  -V, --version           Show version number",
  ].join("\n");
}
