/**
 * Production file writer for --output.
 * Creates missing parent directories so nested output paths work.
 */

import * as node_fs from "node:fs/promises";
import * as node_path from "node:path";

export async function writeFileCreatingDirs(path: string, content: string): Promise<void> {
  await node_fs.mkdir(node_path.dirname(path), { recursive: true });
  await node_fs.writeFile(path, content, "utf-8");
}
