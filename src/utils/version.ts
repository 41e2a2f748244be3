import { readFileSync } from "node:fs";

import { getPackageAssetPath } from "./package-root.js";

let cachedVersion: string | undefined;

export function getProxyVersion(): string {
  if (cachedVersion) {
    return cachedVersion;
  }

  try {
    const packageJsonPath = getPackageAssetPath("package.json");
    const packageJson: unknown = JSON.parse(
      readFileSync(packageJsonPath, "utf-8"),
    );

    if (
      typeof packageJson === "object" &&
      packageJson !== null &&
      "version" in packageJson &&
      typeof packageJson.version === "string"
    ) {
      const normalizedVersion = packageJson.version.trim();
      if (normalizedVersion) {
        cachedVersion = normalizedVersion;
        return cachedVersion;
      }
    }
  } catch {
    // Unreadable package metadata only affects --version output.
  }

  cachedVersion = "unknown";
  return cachedVersion;
}
