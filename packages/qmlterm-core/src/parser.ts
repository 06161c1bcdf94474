/**
 * Markup parser
 *
 * Builds a MarkupDocument from QML-like text in a single pass over its lines,
 * keeping the currently open elements on an explicit stack:
 *
 *   ApplicationWindow {
 *       title: "Demo"
 *       Column {
 *           Text { id: hello; text: "Hello" }
 *       }
 *   }
 *
 * The grammar is tolerant. Lines that match nothing are dropped, stray closing
 * braces are ignored and the result is always a document.
 */

import { readFileSync } from "node:fs";
import fs from "node:fs/promises";

import { MarkupReadError } from "./errors.js";
import { createNode } from "./node.js";
import type { MarkupDocument, MarkupNode } from "./types.js";

const COMMENT_PREFIX = "//";

export function stripQuotes(value: string): string {
  if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
    return value.slice(1, -1);
  }
  return value;
}

function assignProperty(node: MarkupNode, key: string, value: string): void {
  node.properties[key] = value;
  if (key === "id") {
    node.id = value;
  }
}

/**
 * Splits off a trailing `}` so a line can both carry content and close the
 * element it belongs to.
 */
function takeClosingBrace(text: string): { text: string; closes: boolean } {
  if (text.endsWith("}")) {
    return { text: text.slice(0, -1).trim(), closes: true };
  }
  return { text, closes: false };
}

function parseInlineProperties(propertiesText: string, node: MarkupNode): void {
  for (const segment of propertiesText.split(";")) {
    const trimmed = segment.trim();
    if (!trimmed) {
      continue;
    }

    const colonIndex = trimmed.indexOf(":");
    if (colonIndex === -1) {
      continue;
    }

    const key = trimmed.slice(0, colonIndex).trim();
    const value = stripQuotes(trimmed.slice(colonIndex + 1).trim());
    assignProperty(node, key, value);
  }
}

export function parseMarkup(source: string): MarkupDocument {
  const document: MarkupDocument = { roots: [] };
  const stack: MarkupNode[] = [];

  const pushNode = (kind: string): MarkupNode => {
    const node = createNode(kind);
    const parent = stack[stack.length - 1];
    if (parent) {
      parent.children.push(node);
    } else {
      document.roots.push(node);
    }
    stack.push(node);
    return node;
  };

  for (const line of source.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith(COMMENT_PREFIX)) {
      continue;
    }

    const braceIndex = trimmed.indexOf("{");
    if (braceIndex !== -1) {
      const kind = trimmed.slice(0, braceIndex).trim();
      if (!kind) {
        continue;
      }

      const node = pushNode(kind);
      const remainder = takeClosingBrace(trimmed.slice(braceIndex + 1).trim());
      if (remainder.text) {
        parseInlineProperties(remainder.text, node);
      }
      if (remainder.closes) {
        stack.pop();
      }
      continue;
    }

    if (trimmed === "}") {
      stack.pop();
      continue;
    }

    const colonIndex = trimmed.indexOf(":");
    const current = stack[stack.length - 1];
    if (colonIndex === -1 || !current) {
      continue;
    }

    const key = trimmed.slice(0, colonIndex).trim();
    const rawValue = takeClosingBrace(trimmed.slice(colonIndex + 1).trim());
    assignProperty(current, key, stripQuotes(rawValue.text));

    if (rawValue.closes) {
      stack.pop();
    }
  }

  return document;
}

export async function parseMarkupFile(path: string): Promise<MarkupDocument> {
  let source: string;
  try {
    source = await fs.readFile(path, "utf8");
  } catch (error) {
    throw new MarkupReadError(path, error);
  }
  return parseMarkup(source);
}

export function parseMarkupFileSync(path: string): MarkupDocument {
  let source: string;
  try {
    source = readFileSync(path, "utf8");
  } catch (error) {
    throw new MarkupReadError(path, error);
  }
  return parseMarkup(source);
}
