/**
 * Centralized version constant for idiomkit.
 *
 * Reads the version from package.json so there is a single source of
 * truth. All modules that need the version string import it from here
 * instead of hardcoding it.
 */

import { createRequire } from "node:module";

const require = createRequire(import.meta.url);
const pkg: unknown = require("../package.json");

function readVersion(manifest: unknown): string {
  if (
    typeof manifest === "object" &&
    manifest !== null &&
    "version" in manifest &&
    typeof manifest.version === "string"
  ) {
    return manifest.version;
  }
  throw new Error("package.json has no version field");
}

export const VERSION: string = readVersion(pkg);
