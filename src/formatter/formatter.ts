/**
 * Formatter interface for transforming VerificationReports into output strings.
 *
 * Each output format (terminal, JSON, Markdown) is implemented as a
 * function conforming to this type.
 */

import type { VerificationReport } from "../types/report.js";

/**
 * Options that control formatter output behavior.
 */
export interface FormatterOptions {
  /** Disable ANSI color codes in terminal output. */
  readonly noColor?: boolean;
}

/**
 * A Formatter takes a VerificationReport and produces a formatted string
 * suitable for output to stdout or a file.
 */
export type Formatter = (report: VerificationReport, options?: FormatterOptions) => string;
