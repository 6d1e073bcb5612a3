import { readFileSync } from "node:fs";

function readVersionFromPackageJson(): string | null {
  try {
    const pkg: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf8"));
    if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
      return pkg.version;
    }
    return null;
  } catch {
    return null;
  }
}

// Single source of truth for the CLI version.
// - Bundled builds: env var.
// - Dev/npm builds: package.json.
export const VERSION = process.env.AWS_OPS_BUNDLED_VERSION || readVersionFromPackageJson() || "0.0.0";
