import fs from "node:fs/promises";
import path from "node:path";
import { pathToFileURL } from "node:url";
import { describe, expect, it } from "vitest";
import { withTempDir } from "../test/helpers/temp-dir.js";
import { readVersionFromPackageJsonForModuleUrl } from "./version.js";

function moduleUrlFrom(root: string, relativePath: string): string {
  return pathToFileURL(path.join(root, relativePath)).href;
}

describe("version resolution", () => {
  it("resolves package version from a nested dist module URL", async () => {
    await withTempDir(async (root) => {
      await fs.mkdir(path.join(root, "dist", "cli"), { recursive: true });
      await fs.writeFile(
        path.join(root, "package.json"),
        JSON.stringify({ name: "qr-styler", version: "1.2.3" }),
        "utf-8",
      );

      const moduleUrl = moduleUrlFrom(root, "dist/cli/program.js");
      expect(readVersionFromPackageJsonForModuleUrl(moduleUrl)).toBe("1.2.3");
    });
  });

  it("ignores unrelated nearby package.json files", async () => {
    await withTempDir(async (root) => {
      await fs.mkdir(path.join(root, "dist", "cli"), { recursive: true });
      await fs.writeFile(
        path.join(root, "package.json"),
        JSON.stringify({ name: "qr-styler", version: "2.3.4" }),
        "utf-8",
      );
      await fs.writeFile(
        path.join(root, "dist", "package.json"),
        JSON.stringify({ name: "other-package", version: "9.9.9" }),
        "utf-8",
      );

      const moduleUrl = moduleUrlFrom(root, "dist/cli/program.js");
      expect(readVersionFromPackageJsonForModuleUrl(moduleUrl)).toBe("2.3.4");
    });
  });
});
