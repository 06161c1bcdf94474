import path from "node:path";

import chalk from "chalk";
import {
  MarkupReadError,
  parseMarkupFile,
  renderDocument,
  type BindingResolver,
  type MarkupDocument,
} from "qmlterm-core";

import { loadConfig } from "../config/loader.js";
import type { RendererMode, ResolvedConfig } from "../config/schema.js";
import { chainResolvers, createRecordResolver, greeterResolver, parseBindingArgs } from "../lib/bindings.js";
import { createGreeter } from "../lib/greeter.js";
import { resolveDocumentPath } from "../lib/paths.js";
import { renderCli } from "../renderers/cli.js";
import { TextGridScreen } from "../renderers/grid-screen.js";
import { renderTui } from "../renderers/tui.js";

export type RenderCommandParams = {
  cwd: string;
  document?: string;
  configPath?: string;
  renderer?: RendererMode;
  bind?: string[];
  rows?: number;
  cols?: number;
  raw?: boolean;
  greeter?: boolean;
};

/**
 * Resolver for a render: --bind values, then config bindings, then the greeter.
 */
export function buildResolver(config: ResolvedConfig, bindArgs: string[] = [], useGreeter = config.greeter): BindingResolver {
  const resolvers = [
    createRecordResolver(parseBindingArgs(bindArgs)),
    createRecordResolver(config.bindings),
  ];
  if (useGreeter) {
    resolvers.push(greeterResolver(createGreeter()));
  }
  return chainResolvers(...resolvers);
}

/**
 * Loads the document named by the params or the config. Read failures are
 * reported and mark the process as failed.
 */
export async function loadDocument(
  params: Pick<RenderCommandParams, "cwd" | "document">,
  config: ResolvedConfig,
): Promise<{ path: string; document: MarkupDocument } | null> {
  const documentPath = resolveDocumentPath({ cwd: params.cwd, explicit: params.document ?? config.document });
  try {
    return { path: documentPath, document: await parseMarkupFile(documentPath) };
  } catch (error) {
    if (error instanceof MarkupReadError) {
      console.error(chalk.red(`Failed to load ${documentPath}: ${error.message}`));
      process.exitCode = 1;
      return null;
    }
    throw error;
  }
}

export async function renderDocumentCommand(params: RenderCommandParams): Promise<void> {
  const config = await loadConfig(params.cwd, params.configPath);
  const loaded = await loadDocument(params, config);
  if (!loaded) {
    return;
  }

  const resolver = params.raw ? undefined : buildResolver(config, params.bind, params.greeter ?? config.greeter);
  const title = path.basename(loaded.path);
  const renderer = params.renderer ?? config.renderer;

  if (renderer === "tui") {
    await renderTui(loaded.document, resolver, { title, kinds: config.kinds });
    return;
  }

  const screen = new TextGridScreen(params.rows ?? config.screen.rows, params.cols ?? config.screen.cols);
  const result = renderDocument(loaded.document, screen, resolver, { kinds: config.kinds });
  console.log(renderCli(screen.visibleLines(), title));

  if (result.truncated) {
    console.log(chalk.yellow(`Output truncated to ${screen.rows()} rows.`));
  }
}
