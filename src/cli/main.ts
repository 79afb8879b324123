#!/usr/bin/env node

/**
 * idiomkit CLI entry point.
 *
 * This file is the bin target. It wires together real dependencies
 * (process I/O, filesystem, snippet catalog) and delegates to the
 * runner.
 */

import * as node_process from "node:process";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createDefaultRegistry } from "../snippet/catalog.js";
import { createMcpServer } from "../mcp/server.js";
import { writeFileCreatingDirs } from "./write-file.js";
import { run } from "./run.js";
import type { CliDeps } from "./run.js";

const registry = createDefaultRegistry();

const deps: CliDeps = {
  stdout: (text: string) => node_process.stdout.write(text + "\n"),
  stderr: (text: string) => node_process.stderr.write(text + "\n"),
  registry,
  writeFn: writeFileCreatingDirs,
  startMcpServer: async () => {
    const server = createMcpServer({ registry });
    const transport = new StdioServerTransport();
    await server.connect(transport);
  },
  noColorEnv: node_process.env["NO_COLOR"] !== undefined && node_process.env["NO_COLOR"] !== "",
};

// Strip the first two entries (node binary, script path).
const argv = node_process.argv.slice(2);

run(argv, deps).then(
  (code) => {
    // MCP mode keeps serving on stdio; everything else exits with the run's code.
    if (!argv.includes("--mcp")) {
      node_process.exit(code);
    }
  },
  (cause: unknown) => {
    const message = cause instanceof Error ? cause.message : String(cause);
    node_process.stderr.write(`idiomkit: ${message}\n`);
    node_process.exit(1);
  },
);
