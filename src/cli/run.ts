/**
 * CLI runner: the top-level entry point that wires everything together.
 *
 * Responsibilities:
 *   1. Parse arguments into a RunConfig
 *   2. Verify the selected snippets from the provided registry
 *   3. Format the report using the appropriate formatter
 *   4. Write output to stdout or a file
 *
 * Dependencies: All layers (Types, Snippet, Orchestration, Formatter).
 */

import type { SnippetRegistry } from "../snippet/registry.js";
import type { OutputFormat } from "../types/config.js";
import type { VerificationReport } from "../types/report.js";
import type { Formatter, FormatterOptions } from "../formatter/formatter.js";
import { verify, allPassed } from "../orchestration/verifier.js";
import { onlyFailures } from "../orchestration/report-transforms.js";
import { formatJson } from "../formatter/json.js";
import { formatTerminal } from "../formatter/terminal.js";
import { formatMarkdown } from "../formatter/markdown.js";
import { parseArgs } from "./parse-args.js";

/**
 * Injectable dependencies for testability.
 * Production code provides real I/O; tests provide fakes.
 */
export interface CliDeps {
  readonly stdout: (text: string) => void;
  readonly stderr: (text: string) => void;
  readonly registry: SnippetRegistry;
  readonly timestampFn?: () => string;
  readonly writeFn?: (path: string, content: string) => Promise<void>;
  readonly startMcpServer?: () => Promise<void>;
  /** When true, suppresses ANSI color codes (mirrors the NO_COLOR env var). */
  readonly noColorEnv?: boolean;
}

function selectFormatter(format: OutputFormat): Formatter {
  switch (format) {
    case "json":
      return formatJson;
    case "terminal":
      return formatTerminal;
    case "markdown":
      return formatMarkdown;
  }
}

function listSnippetsText(registry: SnippetRegistry): string {
  const snippets = registry.getAll();
  if (snippets.length === 0) {
    return "No snippets registered.";
  }
  const idWidth = Math.max(...snippets.map((s) => s.id.length));
  return [
    "Available snippets:",
    "",
    ...snippets.map(
      (s) => `  ${s.id.padEnd(idWidth)}  ${s.topic.padEnd(22)}${s.title}`,
    ),
  ].join("\n");
}

/**
 * Run the CLI with the given argument array and dependencies.
 * Returns a process exit code (0 = every snippet passed, 1 = error or failure).
 */
export async function run(
  argv: readonly string[],
  deps: CliDeps,
): Promise<number> {
  const parseResult = parseArgs(argv);

  if (!parseResult.ok) {
    const { kind, message } = parseResult.error;
    switch (kind) {
      case "help":
      case "version":
      case "list-topics":
        deps.stdout(message);
        return 0;
      case "list":
        deps.stdout(listSnippetsText(deps.registry));
        return 0;
      case "mcp":
        if (deps.startMcpServer === undefined) {
          deps.stderr("MCP server is not available");
          return 1;
        }
        await deps.startMcpServer();
        return 0;
      default:
        deps.stderr(message);
        return 1;
    }
  }

  const config = parseResult.value;

  const options = deps.timestampFn !== undefined
    ? { timestampFn: deps.timestampFn }
    : undefined;

  const verifyResult = verify(config, deps.registry, options);

  if (!verifyResult.ok) {
    deps.stderr(verifyResult.error.message);
    return 1;
  }

  const fullReport: VerificationReport = verifyResult.value;
  const report = config.failuresOnly ? onlyFailures(fullReport) : fullReport;
  const formatter = selectFormatter(config.outputFormat);
  const noColor = config.noColor || deps.noColorEnv === true;
  const formatterOptions: FormatterOptions = { noColor };
  const output = formatter(report, formatterOptions);

  if (config.outputPath !== undefined && deps.writeFn !== undefined) {
    try {
      await deps.writeFn(config.outputPath, output);
    } catch (cause: unknown) {
      const message = cause instanceof Error ? cause.message : String(cause);
      deps.stderr(`Failed to write report: ${message}`);
      return 1;
    }
    deps.stdout(`Report written to ${config.outputPath}`);
  } else {
    deps.stdout(output);
  }

  return allPassed(fullReport) ? 0 : 1;
}
