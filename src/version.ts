/**
 * Package version, read from the nearest levelog package.json above this
 * module (works from both src/ and dist/).
 */
import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

const PACKAGE_NAME = "levelog";

function readManifest(manifestPath: string): unknown {
  try {
    return JSON.parse(fs.readFileSync(manifestPath, "utf-8"));
  } catch {
    return null;
  }
}

export function findPackageVersion(startDir: string): string | null {
  let dir = path.resolve(startDir);
  for (;;) {
    const manifest = readManifest(path.join(dir, "package.json"));
    if (
      typeof manifest === "object" &&
      manifest !== null &&
      "name" in manifest &&
      "version" in manifest
    ) {
      const { name, version } = manifest;
      if (name === PACKAGE_NAME && typeof version === "string" && version.trim()) {
        return version.trim();
      }
    }
    const parent = path.dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

export const VERSION =
  findPackageVersion(path.dirname(fileURLToPath(import.meta.url))) ?? "0.0.0";
