import fs from "node:fs";
import path from "node:path";

import { resolvePackageRoot } from "./package-root.js";

export const CONFIG_FILENAME = "qmlterm.config.json";
export const DEFAULT_DOCUMENT = path.join("qml", "Main.qml");
export const DOCUMENT_ENV = "QMLTERM_DOCUMENT";

export function resolveConfigPath(cwd: string): string | null {
  const candidate = path.join(cwd, CONFIG_FILENAME);
  return fs.existsSync(candidate) ? candidate : null;
}

/**
 * Picks the markup document to load. An explicit path wins, then the
 * environment, then `qml/Main.qml` under the working directory and under this
 * package. When none exist the relative default is returned so the caller
 * reports a read error for it.
 */
export function resolveDocumentPath(params: {
  cwd: string;
  explicit?: string;
  env?: NodeJS.ProcessEnv;
  packageRoot?: string;
}): string {
  if (params.explicit) {
    return path.resolve(params.cwd, params.explicit);
  }

  const fromEnv = (params.env ?? process.env)[DOCUMENT_ENV];
  if (fromEnv) {
    return path.resolve(params.cwd, fromEnv);
  }

  const local = path.join(params.cwd, DEFAULT_DOCUMENT);
  if (fs.existsSync(local)) {
    return local;
  }

  const bundled = path.join(params.packageRoot ?? resolvePackageRoot(import.meta.url), DEFAULT_DOCUMENT);
  if (fs.existsSync(bundled)) {
    return bundled;
  }

  return DEFAULT_DOCUMENT;
}
