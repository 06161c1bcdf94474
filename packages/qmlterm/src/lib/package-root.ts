import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

/**
 * Nearest directory above the calling module that holds a package.json.
 * Works from both src/ and the bundled dist/ layout.
 */
export function resolvePackageRoot(metaUrl: string): string {
  const start = path.dirname(fileURLToPath(metaUrl));
  let current = start;

  while (true) {
    if (fs.existsSync(path.join(current, "package.json"))) {
      return current;
    }
    const parent = path.dirname(current);
    if (parent === current) {
      return path.resolve(start, "..");
    }
    current = parent;
  }
}
