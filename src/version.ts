import { createRequire } from "node:module";

// src/version.ts runs from the repo root's src/, the build from dist/src/
const PACKAGE_JSON_CANDIDATES = ["../package.json", "../../package.json"];

function readVersionFromPackageJson(): string | null {
  const require = createRequire(import.meta.url);
  for (const candidate of PACKAGE_JSON_CANDIDATES) {
    try {
      const pkg: unknown = require(candidate);
      if (typeof pkg === "object" && pkg !== null && "name" in pkg && pkg.name === "azure-vnet-topology") {
        return "version" in pkg && typeof pkg.version === "string" ? pkg.version : null;
      }
    } catch {
      // not at this location
    }
  }
  return null;
}

export const VERSION = process.env.VNET_TOPOLOGY_VERSION || readVersionFromPackageJson() || "0.0.0";
