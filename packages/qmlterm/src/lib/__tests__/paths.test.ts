import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import os from "node:os";
import path from "node:path";

import { DEFAULT_DOCUMENT, resolveConfigPath, resolveDocumentPath } from "../paths.js";

describe("resolveDocumentPath", () => {
  let cwd: string;
  let packageRoot: string;

  beforeEach(() => {
    cwd = mkdtempSync(path.join(os.tmpdir(), "qmlterm-cwd-"));
    packageRoot = mkdtempSync(path.join(os.tmpdir(), "qmlterm-pkg-"));
  });

  afterEach(() => {
    rmSync(cwd, { recursive: true, force: true });
    rmSync(packageRoot, { recursive: true, force: true });
  });

  const writeDocument = (root: string) => {
    mkdirSync(path.join(root, "qml"), { recursive: true });
    writeFileSync(path.join(root, DEFAULT_DOCUMENT), "ApplicationWindow {\n}\n");
  };

  it("resolves an explicit path against the working directory", () => {
    expect(resolveDocumentPath({ cwd, explicit: "ui/App.qml", env: {}, packageRoot })).toBe(
      path.join(cwd, "ui", "App.qml"),
    );
  });

  it("uses the environment before looking on disk", () => {
    writeDocument(cwd);

    expect(resolveDocumentPath({ cwd, env: { QMLTERM_DOCUMENT: "env.qml" }, packageRoot })).toBe(
      path.join(cwd, "env.qml"),
    );
  });

  it("prefers qml/Main.qml in the working directory", () => {
    writeDocument(cwd);
    writeDocument(packageRoot);

    expect(resolveDocumentPath({ cwd, env: {}, packageRoot })).toBe(path.join(cwd, DEFAULT_DOCUMENT));
  });

  it("falls back to the bundled document", () => {
    writeDocument(packageRoot);

    expect(resolveDocumentPath({ cwd, env: {}, packageRoot })).toBe(
      path.join(packageRoot, DEFAULT_DOCUMENT),
    );
  });

  it("returns the relative default when nothing exists", () => {
    expect(resolveDocumentPath({ cwd, env: {}, packageRoot })).toBe(DEFAULT_DOCUMENT);
  });
});

describe("resolveConfigPath", () => {
  it("finds qmlterm.config.json only when present", () => {
    const cwd = mkdtempSync(path.join(os.tmpdir(), "qmlterm-cfg-"));
    try {
      expect(resolveConfigPath(cwd)).toBeNull();
      writeFileSync(path.join(cwd, "qmlterm.config.json"), "{}");
      expect(resolveConfigPath(cwd)).toBe(path.join(cwd, "qmlterm.config.json"));
    } finally {
      rmSync(cwd, { recursive: true, force: true });
    }
  });
});
