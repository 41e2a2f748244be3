import { existsSync } from "node:fs";
import { dirname, resolve as resolveNative } from "node:path";

const PACKAGE_JSON_FILENAME = "package.json" as const;
const PACKAGE_ROOT_ERROR_MESSAGE =
  "Unable to locate the native messaging proxy package root." as const;

let cachedPackageRoot: string | undefined;

export function resolvePackageRoot(start: string = __dirname): string {
  if (cachedPackageRoot) {
    return cachedPackageRoot;
  }

  const derivedRoot = ascendToPackageRoot(start);
  if (derivedRoot) {
    cachedPackageRoot = derivedRoot;
    return cachedPackageRoot;
  }

  throw new Error(
    `${PACKAGE_ROOT_ERROR_MESSAGE} Attempted discovery starting from "${start}".`,
  );
}

export function getPackageAssetPath(...segments: string[]): string {
  return resolveNative(resolvePackageRoot(), ...segments);
}

function ascendToPackageRoot(start: string): string | undefined {
  let current = start;

  while (true) {
    if (existsSync(resolveNative(current, PACKAGE_JSON_FILENAME))) {
      return current;
    }

    const parent = dirname(current);
    if (parent === current) {
      return undefined;
    }
    current = parent;
  }
}
