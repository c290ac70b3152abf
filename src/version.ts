import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

const PACKAGE_NAME = "qr-styler";

function readPackageVersion(file: string): string | null {
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(file, "utf-8"));
    if (!parsed || typeof parsed !== "object") {
      return null;
    }
    if (!("name" in parsed) || parsed.name !== PACKAGE_NAME) {
      return null;
    }
    return "version" in parsed && typeof parsed.version === "string" ? parsed.version : null;
  } catch {
    return null;
  }
}

/** Walks up from the module looking for this package's package.json. */
export function readVersionFromPackageJsonForModuleUrl(moduleUrl: string): string | null {
  let dir = path.dirname(fileURLToPath(moduleUrl));
  for (;;) {
    const version = readPackageVersion(path.join(dir, "package.json"));
    if (version) {
      return version;
    }
    const parent = path.dirname(dir);
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
}

export const VERSION = readVersionFromPackageJsonForModuleUrl(import.meta.url) ?? "0.0.0";
