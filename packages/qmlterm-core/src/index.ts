export type {
  BindingResolver,
  MarkupDocument,
  MarkupNode,
  RenderKinds,
  RenderOptions,
  RenderResult,
  Screen,
} from "./types.js";

export {
  createNode,
  findById,
  findDescendantById,
  findDescendantByKind,
  findFirstOfKind,
  getProperty,
  walkNodes,
} from "./node.js";

export { parseMarkup, parseMarkupFile, parseMarkupFileSync, stripQuotes } from "./parser.js";

export {
  DEFAULT_BUTTON_LABEL,
  DEFAULT_KINDS,
  DEFAULT_SPACING,
  centerColumn,
  layoutLines,
  parseIntOr,
  renderDocument,
  resolveKinds,
  resolveValue,
} from "./layout.js";

export { MarkupReadError, QmltermError } from "./errors.js";
