import { describe, it, expect, vi, beforeEach } from "vitest";
import fs from "node:fs/promises";

import { fileExists, readJsonFile } from "../fs-utils.js";

vi.mock("node:fs/promises");

describe("fs-utils", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe("fileExists", () => {
    it("returns true when file exists", async () => {
      vi.mocked(fs.access).mockResolvedValue(undefined);

      const result = await fileExists("/test/Main.qml");

      expect(result).toBe(true);
      expect(fs.access).toHaveBeenCalledWith("/test/Main.qml");
    });

    it("returns false when file does not exist", async () => {
      vi.mocked(fs.access).mockRejectedValue(new Error("ENOENT"));

      const result = await fileExists("/nonexistent/Main.qml");

      expect(result).toBe(false);
    });
  });

  describe("readJsonFile", () => {
    it("parses and returns JSON content", async () => {
      const testData = { renderer: "cli", screen: { rows: 10 } };
      vi.mocked(fs.readFile).mockResolvedValue(JSON.stringify(testData));

      const result = await readJsonFile("/test/qmlterm.config.json");

      expect(result).toEqual({ ok: true, value: testData });
      expect(fs.readFile).toHaveBeenCalledWith("/test/qmlterm.config.json", "utf8");
    });

    it("reports unreadable files", async () => {
      const failure = new Error("EACCES");
      vi.mocked(fs.readFile).mockRejectedValue(failure);

      const result = await readJsonFile("/forbidden.json");

      expect(result).toEqual({ ok: false, reason: "unreadable", error: failure });
    });

    it("reports invalid JSON", async () => {
      vi.mocked(fs.readFile).mockResolvedValue("{ invalid json }");

      const result = await readJsonFile("/invalid.json");

      expect(result.ok).toBe(false);
      expect(result.ok === false && result.reason).toBe("invalid-json");
    });

    it("preserves null values", async () => {
      vi.mocked(fs.readFile).mockResolvedValue(JSON.stringify({ document: null }));

      const result = await readJsonFile("/test.json");

      expect(result).toEqual({ ok: true, value: { document: null } });
    });
  });
});
