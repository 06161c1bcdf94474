/**
 * Layout / render engine
 *
 * Projects the first ApplicationWindow of a document onto a character grid:
 * the window title centered on row 0, then one line per supported child of
 * the window's first Column. Column lines are centered as a block (using the
 * widest line) and each line is centered again inside that block.
 */

import { findDescendantByKind, findFirstOfKind, getProperty } from "./node.js";
import type {
  BindingResolver,
  MarkupDocument,
  MarkupNode,
  RenderKinds,
  RenderOptions,
  RenderResult,
  Screen,
} from "./types.js";

export const DEFAULT_KINDS: Readonly<RenderKinds> = Object.freeze({
  window: "ApplicationWindow",
  column: "Column",
  text: Object.freeze(["Text", "Label"]),
  textField: "TextField",
  button: "Button",
});

export const DEFAULT_SPACING = 1;
export const DEFAULT_BUTTON_LABEL = "Button";
const TITLE_GAP = 2;
const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;
const INTEGER_PATTERN = /^\s*[+-]?\d+$/;

export function resolveKinds(overrides: Partial<RenderKinds> = {}): RenderKinds {
  return {
    window: overrides.window ?? DEFAULT_KINDS.window,
    column: overrides.column ?? DEFAULT_KINDS.column,
    text: [...(overrides.text ?? DEFAULT_KINDS.text)],
    textField: overrides.textField ?? DEFAULT_KINDS.textField,
    button: overrides.button ?? DEFAULT_KINDS.button,
  };
}

export function resolveValue(value: string, resolver?: BindingResolver): string {
  if (resolver) {
    const resolved = resolver(value);
    if (resolved) {
      return resolved;
    }
  }
  return value;
}

/**
 * Whole-string integer parse; anything with trailing text, no digits or out
 * of 32-bit range yields the fallback.
 */
export function parseIntOr(text: string, fallback: number): number {
  if (!INTEGER_PATTERN.test(text)) {
    return fallback;
  }
  const value = Number(text.trim());
  if (!Number.isSafeInteger(value) || value < INT32_MIN || value > INT32_MAX) {
    return fallback;
  }
  return value;
}

export function centerColumn(screenCols: number, paddingWidth: number, length: number): number {
  const width = paddingWidth > 0 ? paddingWidth : length;
  const leftPadding = Math.max(0, Math.floor((screenCols - width) / 2));
  const offset = Math.max(0, Math.floor((width - length) / 2));
  return leftPadding + offset;
}

function wrapControl(value: string): string {
  return `[ ${value} ]`;
}

function describeChild(
  child: MarkupNode,
  kinds: RenderKinds,
  resolver?: BindingResolver,
): string | null {
  if (kinds.text.includes(child.kind)) {
    return resolveValue(getProperty(child, "text"), resolver);
  }

  if (child.kind === kinds.textField) {
    let content = resolveValue(getProperty(child, "text"), resolver);
    if (!content) {
      content = resolveValue(getProperty(child, "placeholderText"), resolver);
    }
    return wrapControl(content || " ");
  }

  if (child.kind === kinds.button) {
    // The default label is subject to resolution like an authored one.
    const label = getProperty(child, "text", DEFAULT_BUTTON_LABEL);
    return wrapControl(resolveValue(label, resolver));
  }

  return null;
}

/**
 * Display lines for the direct children of a column, in source order
 */
export function layoutLines(
  column: MarkupNode,
  resolver?: BindingResolver,
  kinds: RenderKinds = DEFAULT_KINDS,
): string[] {
  const lines: string[] = [];
  for (const child of column.children) {
    const line = describeChild(child, kinds, resolver);
    if (line !== null) {
      lines.push(line);
    }
  }
  return lines;
}

export function renderDocument(
  document: MarkupDocument,
  screen: Screen,
  resolver?: BindingResolver,
  options: RenderOptions = {},
): RenderResult {
  const kinds = resolveKinds(options.kinds);
  const result: RenderResult = { drawn: 0, truncated: false, nextRow: 0 };

  const drawCentered = (row: number, text: string, paddingWidth = 0) => {
    if (!text) {
      return;
    }
    screen.drawText(row, centerColumn(screen.cols(), paddingWidth, text.length), text);
    result.drawn += 1;
  };

  screen.clear();

  const window = findFirstOfKind(document, kinds.window);
  if (!window) {
    screen.refresh();
    return result;
  }

  let row = 0;
  const title = resolveValue(getProperty(window, "title"), resolver);
  if (title) {
    drawCentered(row, title);
    row += TITLE_GAP;
  }
  result.nextRow = row;

  const column = findDescendantByKind(window, kinds.column);
  if (!column) {
    screen.refresh();
    return result;
  }

  const spacing = parseIntOr(getProperty(column, "spacing", String(DEFAULT_SPACING)), DEFAULT_SPACING);
  const lines = layoutLines(column, resolver, kinds);
  const paddingWidth = lines.reduce((widest, line) => Math.max(widest, line.length), 0);

  for (const line of lines) {
    if (row >= screen.rows()) {
      result.truncated = true;
      break;
    }
    drawCentered(row, line, paddingWidth);
    row += 1 + spacing;
  }
  result.nextRow = row;

  screen.refresh();
  return result;
}
