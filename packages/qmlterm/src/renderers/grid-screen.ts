import type { Screen } from "qmlterm-core";

/**
 * In-memory character grid. Text is clipped at the grid edges the way a
 * terminal window clips it.
 */
export class TextGridScreen implements Screen {
  refreshCount = 0;
  private cells: string[][];

  constructor(
    private readonly rowCount: number,
    private readonly colCount: number,
  ) {
    this.cells = this.blankCells();
  }

  clear(): void {
    this.cells = this.blankCells();
  }

  drawText(row: number, col: number, text: string): void {
    const line = this.cells[row];
    if (!line) {
      return;
    }

    for (let index = 0; index < text.length; index += 1) {
      const target = col + index;
      if (target >= this.colCount) {
        break;
      }
      const char = text[index];
      if (target >= 0 && char !== undefined) {
        line[target] = char;
      }
    }
  }

  refresh(): void {
    this.refreshCount += 1;
  }

  rows(): number {
    return this.rowCount;
  }

  cols(): number {
    return this.colCount;
  }

  /** Every row, padded to the full grid width */
  toLines(): string[] {
    return this.cells.map((line) => line.join(""));
  }

  /** Rows up to the last one with content, padded to the full grid width */
  visibleLines(): string[] {
    const lines = this.toLines();
    let end = lines.length;
    while (end > 0 && !lines[end - 1]?.trim()) {
      end -= 1;
    }
    return lines.slice(0, end);
  }

  toText(): string {
    return this.visibleLines()
      .map((line) => line.trimEnd())
      .join("\n");
  }

  private blankCells(): string[][] {
    return Array.from({ length: Math.max(0, this.rowCount) }, () =>
      Array.from({ length: Math.max(0, this.colCount) }, () => " "),
    );
  }
}
