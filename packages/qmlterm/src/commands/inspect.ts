import chalk from "chalk";
import {
  findDescendantByKind,
  findFirstOfKind,
  layoutLines,
  resolveKinds,
  walkNodes,
  type BindingResolver,
  type MarkupDocument,
  type RenderKinds,
} from "qmlterm-core";

import { loadConfig } from "../config/loader.js";
import { buildResolver, loadDocument } from "./render.js";

export type TreeLine = {
  depth: number;
  kind: string;
  id?: string;
  properties: string;
};

export function describeTree(document: MarkupDocument): TreeLine[] {
  const lines: TreeLine[] = [];
  walkNodes(document, (node, depth) => {
    const properties = Object.entries(node.properties)
      .filter(([key]) => key !== "id")
      .map(([key, value]) => `${key}=${JSON.stringify(value)}`)
      .join(" ");
    lines.push({ depth, kind: node.kind, id: node.id, properties });
  });
  return lines;
}

/**
 * Layout lines of the column that would be rendered, or null when the
 * document has no window or no column
 */
export function previewLayout(
  document: MarkupDocument,
  resolver?: BindingResolver,
  kinds: RenderKinds = resolveKinds(),
): string[] | null {
  const window = findFirstOfKind(document, kinds.window);
  const column = window && findDescendantByKind(window, kinds.column);
  return column ? layoutLines(column, resolver, kinds) : null;
}

export async function inspectDocumentCommand(params: {
  cwd: string;
  document?: string;
  configPath?: string;
  bind?: string[];
}): Promise<void> {
  const config = await loadConfig(params.cwd, params.configPath);
  const loaded = await loadDocument(params, config);
  if (!loaded) {
    return;
  }

  console.log(chalk.dim(loaded.path));
  const tree = describeTree(loaded.document);
  if (tree.length === 0) {
    console.log(chalk.yellow("No elements found."));
    return;
  }

  for (const line of tree) {
    const id = line.id ? chalk.magenta(` #${line.id}`) : "";
    const properties = line.properties ? `  ${chalk.dim(line.properties)}` : "";
    console.log(`${"  ".repeat(line.depth)}${chalk.cyan(line.kind)}${id}${properties}`);
  }

  const preview = previewLayout(loaded.document, buildResolver(config, params.bind), resolveKinds(config.kinds));
  if (!preview) {
    console.log(chalk.yellow("Nothing to lay out."));
    return;
  }

  console.log("");
  console.log(chalk.cyan("Layout"));
  for (const line of preview) {
    console.log(`  ${line}`);
  }
}
