/**
 * Default configuration values
 */

import type { ResolvedConfig } from "./schema.js";

export const DEFAULT_SCREEN = { rows: 24, cols: 80 };

export const DEFAULT_CONFIG: ResolvedConfig = {
  renderer: "cli",
  screen: DEFAULT_SCREEN,
  bindings: {},
  greeter: true,
  kinds: {},
};
