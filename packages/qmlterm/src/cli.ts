import chalk from "chalk";
import { Command, InvalidArgumentError } from "commander";
import { QmltermError } from "qmlterm-core";

import { inspectDocumentCommand } from "./commands/inspect.js";
import { renderDocumentCommand } from "./commands/render.js";

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

function parseRenderer(value: string): "cli" | "tui" {
  if (value !== "cli" && value !== "tui") {
    throw new InvalidArgumentError("Renderer must be cli or tui.");
  }
  return value;
}

type RenderOptions = {
  renderer?: "cli" | "tui";
  bind: string[];
  rows?: number;
  cols?: number;
  raw?: boolean;
  greeter: boolean;
};

const program = new Command();

program
  .name("qmlterm")
  .description("Render QML-style markup in the terminal")
  .option("-c, --config <path>", "Config file (defaults to ./qmlterm.config.json)");

program
  .command("render")
  .description("Render a document")
  .argument("[document]", "Markup document (defaults to qml/Main.qml)")
  .option("-r, --renderer <mode>", "Renderer: cli or tui", parseRenderer)
  .option("-b, --bind <key=value>", "Binding value, repeatable", collect, [])
  .option("--rows <n>", "Grid rows for the cli renderer", parsePositiveInt)
  .option("--cols <n>", "Grid columns for the cli renderer", parsePositiveInt)
  .option("--raw", "Skip binding resolution")
  .option("--no-greeter", "Do not resolve greeter bindings")
  .action(async (document: string | undefined, options: RenderOptions) => {
    await renderDocumentCommand({
      cwd: process.cwd(),
      document,
      configPath: program.opts<{ config?: string }>().config,
      renderer: options.renderer,
      bind: options.bind,
      rows: options.rows,
      cols: options.cols,
      raw: Boolean(options.raw),
      greeter: options.greeter ? undefined : false,
    });
  });

program
  .command("inspect")
  .description("Print the parsed element tree and column layout")
  .argument("[document]", "Markup document (defaults to qml/Main.qml)")
  .option("-b, --bind <key=value>", "Binding value, repeatable", collect, [])
  .action(async (document: string | undefined, options: { bind: string[] }) => {
    await inspectDocumentCommand({
      cwd: process.cwd(),
      document,
      configPath: program.opts<{ config?: string }>().config,
      bind: options.bind,
    });
  });

program.parseAsync().catch((error: unknown) => {
  if (error instanceof QmltermError) {
    console.error(chalk.red(error.message));
  } else {
    console.error(chalk.red(error instanceof Error ? error.stack ?? error.message : String(error)));
  }
  process.exitCode = 1;
});
