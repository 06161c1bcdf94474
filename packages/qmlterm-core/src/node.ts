import type { MarkupDocument, MarkupNode } from "./types.js";

export function createNode(kind: string): MarkupNode {
  // Null prototype so keys such as `__proto__` are stored like any other.
  const properties: Record<string, string> = Object.create(null);
  return { kind, properties, children: [] };
}

export function getProperty(node: MarkupNode, name: string, defaultValue = ""): string {
  if (!Object.hasOwn(node.properties, name)) {
    return defaultValue;
  }
  return node.properties[name] ?? defaultValue;
}

function findDescendant(
  node: MarkupNode,
  predicate: (candidate: MarkupNode) => boolean,
): MarkupNode | undefined {
  for (const child of node.children) {
    if (predicate(child)) {
      return child;
    }
    const nested = findDescendant(child, predicate);
    if (nested) {
      return nested;
    }
  }
  return undefined;
}

function findInDocument(
  document: MarkupDocument,
  predicate: (candidate: MarkupNode) => boolean,
): MarkupNode | undefined {
  for (const root of document.roots) {
    if (predicate(root)) {
      return root;
    }
    const nested = findDescendant(root, predicate);
    if (nested) {
      return nested;
    }
  }
  return undefined;
}

/**
 * Depth-first, pre-order search of a node's descendants. The node itself is
 * not a candidate.
 */
export function findDescendantByKind(node: MarkupNode, kind: string): MarkupNode | undefined {
  return findDescendant(node, (candidate) => candidate.kind === kind);
}

export function findDescendantById(node: MarkupNode, id: string): MarkupNode | undefined {
  return findDescendant(node, (candidate) => candidate.id === id);
}

/**
 * First node of the given kind across the document, checking each root before
 * its subtree.
 */
export function findFirstOfKind(document: MarkupDocument, kind: string): MarkupNode | undefined {
  return findInDocument(document, (candidate) => candidate.kind === kind);
}

export function findById(document: MarkupDocument, id: string): MarkupNode | undefined {
  return findInDocument(document, (candidate) => candidate.id === id);
}

export function walkNodes(
  document: MarkupDocument,
  visit: (node: MarkupNode, depth: number) => void,
): void {
  const walk = (node: MarkupNode, depth: number) => {
    visit(node, depth);
    for (const child of node.children) {
      walk(child, depth + 1);
    }
  };

  for (const root of document.roots) {
    walk(root, 0);
  }
}
