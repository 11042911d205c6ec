/**
 * Package version, looked up from the nearest todo-progress package.json
 */
import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

const PACKAGE_NAME = "todo-progress";

const PackageManifestSchema = z.object({
  name: z.string().optional(),
  version: z.string(),
});

function readVersion(dir: string): string | undefined {
  let content: string;
  try {
    content = readFileSync(join(dir, "package.json"), "utf-8");
  } catch {
    return undefined; // no manifest here
  }
  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch {
    return undefined;
  }
  const manifest = PackageManifestSchema.safeParse(json);
  return manifest.success && manifest.data.name === PACKAGE_NAME
    ? manifest.data.version
    : undefined;
}

function findVersion(): string {
  // src/ or dist/cli/ sit at most a few levels below the package root
  let dir = dirname(fileURLToPath(import.meta.url));
  for (let depth = 0; depth < 5; depth++) {
    const version = readVersion(dir);
    if (version) return version;
    dir = dirname(dir);
  }
  return "0.0.0";
}

export const VERSION: string = findVersion();
