import chalk from "chalk";

import { drawFrame, type FrameStyle } from "./frame.js";

const CLI_FRAME: FrameStyle = {
  border: (text) => chalk.cyan(text),
  title: (text) => chalk.cyan.bold(text),
  body: (text) => chalk.white(text),
};

/**
 * Frames rendered grid rows for stdout
 */
export function renderCli(lines: string[], title?: string): string {
  return drawFrame(lines, title, CLI_FRAME);
}
