import fs from "node:fs/promises";

export type JsonReadResult =
  | { ok: true; value: unknown }
  | { ok: false; reason: "unreadable" | "invalid-json"; error: unknown };

export async function fileExists(path: string): Promise<boolean> {
  try {
    await fs.access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Reads and parses a JSON file without validating its shape
 */
export async function readJsonFile(path: string): Promise<JsonReadResult> {
  let raw: string;
  try {
    raw = await fs.readFile(path, "utf8");
  } catch (error) {
    return { ok: false, reason: "unreadable", error };
  }

  try {
    return { ok: true, value: JSON.parse(raw) };
  } catch (error) {
    return { ok: false, reason: "invalid-json", error };
  }
}
