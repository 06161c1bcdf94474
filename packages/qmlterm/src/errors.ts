import { QmltermError } from "qmlterm-core";

/**
 * Configuration file could not be read or did not match the schema
 */
export class ConfigError extends QmltermError {
  readonly path: string;

  constructor(path: string, detail: string, cause?: unknown) {
    super(`Failed to load config from ${path}: ${detail}`, { cause });
    this.name = "ConfigError";
    this.path = path;
  }
}
