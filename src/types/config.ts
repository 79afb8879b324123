/**
 * Configuration schema for a verification run.
 */

import type { TopicId } from "./topic.js";

/**
 * Supported output formats.
 */
export type OutputFormat = "terminal" | "json" | "markdown";

export interface RunConfig {
  /** Topics to include. If empty and no snippet ids are given, every snippet runs. */
  readonly topics: readonly TopicId[];
  /** Individual snippet ids to include, in addition to whole topics. */
  readonly snippetIds: readonly string[];
  readonly outputFormat: OutputFormat;
  /** Optional output file path. If omitted, output goes to stdout. */
  readonly outputPath?: string | undefined;
  /** Disable ANSI color codes in terminal output. */
  readonly noColor: boolean;
  /** Drop passing snippets from the rendered report. */
  readonly failuresOnly: boolean;
}
