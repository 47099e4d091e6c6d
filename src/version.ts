import { createRequire } from "node:module";

const CORE_PACKAGE_NAME = "nanobot-entrypoint";

const PACKAGE_JSON_CANDIDATES = ["../package.json", "../../package.json", "./package.json"] as const;

function readVersionFromPackageJson(moduleUrl: string): string | null {
  const require = createRequire(moduleUrl);
  for (const candidate of PACKAGE_JSON_CANDIDATES) {
    let parsed: unknown;
    try {
      parsed = require(candidate);
    } catch {
      // missing or unreadable candidate
      continue;
    }
    if (typeof parsed !== "object" || parsed === null) continue;
    const name: unknown = Reflect.get(parsed, "name");
    const version: unknown = Reflect.get(parsed, "version");
    if (name !== CORE_PACKAGE_NAME || typeof version !== "string" || !version.trim()) {
      continue;
    }
    return version.trim();
  }
  return null;
}

export const VERSION = readVersionFromPackageJson(import.meta.url) ?? "0.0.0";
