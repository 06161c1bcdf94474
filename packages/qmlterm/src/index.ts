export { loadConfig, mergeConfig } from "./config/loader.js";
export { DEFAULT_CONFIG } from "./config/defaults.js";
export { configSchema, type QmltermConfig, type RendererMode, type ResolvedConfig } from "./config/schema.js";
export { ConfigError } from "./errors.js";
export {
  chainResolvers,
  createRecordResolver,
  greeterResolver,
  parseBindingArgs,
  type BindingRecord,
} from "./lib/bindings.js";
export { createGreeter, type Greeter } from "./lib/greeter.js";
export { resolveDocumentPath } from "./lib/paths.js";
export { BlessedScreen, type ContentTarget, type TerminalHost } from "./renderers/blessed-screen.js";
export { renderCli } from "./renderers/cli.js";
export { PLAIN_FRAME, drawFrame, type FrameStyle, type Paint } from "./renderers/frame.js";
export { TextGridScreen } from "./renderers/grid-screen.js";
export { renderTui } from "./renderers/tui.js";
export { buildResolver, renderDocumentCommand } from "./commands/render.js";
export { describeTree, inspectDocumentCommand, previewLayout } from "./commands/inspect.js";
