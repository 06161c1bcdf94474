/**
 * Configuration loader
 */

import path from "node:path";

import { ConfigError } from "../errors.js";
import { fileExists, readJsonFile } from "../lib/fs-utils.js";
import { resolveConfigPath } from "../lib/paths.js";
import { DEFAULT_CONFIG } from "./defaults.js";
import { configSchema, type QmltermConfig, type ResolvedConfig } from "./schema.js";

/**
 * Load and validate qmlterm configuration. Without an explicit path a missing
 * qmlterm.config.json simply yields the defaults.
 */
export async function loadConfig(cwd: string, configPath?: string): Promise<ResolvedConfig> {
  const configFilePath = configPath ? path.resolve(cwd, configPath) : resolveConfigPath(cwd);
  if (!configFilePath) {
    return mergeConfig(DEFAULT_CONFIG, {});
  }

  if (!(await fileExists(configFilePath))) {
    throw new ConfigError(configFilePath, "file not found");
  }

  const raw = await readJsonFile(configFilePath);
  if (!raw.ok) {
    const detail = raw.reason === "invalid-json" ? "invalid JSON" : "file is not readable";
    throw new ConfigError(configFilePath, detail, raw.error);
  }

  const parsed = configSchema.safeParse(raw.value);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(configFilePath, issues, parsed.error);
  }

  return mergeConfig(DEFAULT_CONFIG, parsed.data);
}

/**
 * Merge user config with defaults
 */
export function mergeConfig(defaults: ResolvedConfig, user: QmltermConfig): ResolvedConfig {
  return {
    document: user.document ?? defaults.document,
    renderer: user.renderer ?? defaults.renderer,
    screen: {
      rows: user.screen?.rows ?? defaults.screen.rows,
      cols: user.screen?.cols ?? defaults.screen.cols,
    },
    bindings: { ...defaults.bindings, ...user.bindings },
    greeter: user.greeter ?? defaults.greeter,
    kinds: { ...defaults.kinds, ...user.kinds },
  };
}
