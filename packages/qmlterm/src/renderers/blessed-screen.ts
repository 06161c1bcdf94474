import type { Screen } from "qmlterm-core";

import { TextGridScreen } from "./grid-screen.js";

/** The parts of a blessed screen this adapter touches */
export interface TerminalHost {
  readonly width: number | string;
  readonly height: number | string;
  render(): void;
}

/** Element that displays the grid (a full-size blessed box) */
export interface ContentTarget {
  setContent(content: string): void;
}

function toCells(size: number | string): number {
  return typeof size === "number" && Number.isFinite(size) ? Math.max(0, Math.floor(size)) : 0;
}

/**
 * Screen adapter over blessed. Draw calls land in a grid buffer sized to the
 * terminal at the last clear(); refresh() pushes the buffer into the box and
 * repaints.
 */
export class BlessedScreen implements Screen {
  private buffer: TextGridScreen;

  constructor(
    private readonly host: TerminalHost,
    private readonly target: ContentTarget,
  ) {
    this.buffer = new TextGridScreen(this.rows(), this.cols());
  }

  clear(): void {
    this.buffer = new TextGridScreen(this.rows(), this.cols());
  }

  drawText(row: number, col: number, text: string): void {
    this.buffer.drawText(row, col, text);
  }

  refresh(): void {
    this.target.setContent(this.buffer.toLines().join("\n"));
    this.host.render();
  }

  rows(): number {
    return toCells(this.host.height);
  }

  cols(): number {
    return toCells(this.host.width);
  }
}
