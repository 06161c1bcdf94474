export type Paint = (text: string) => string;

/**
 * Colouring hooks for the frame parts. Each one receives the exact text of
 * its part, padding included.
 */
export type FrameStyle = {
  border: Paint;
  title: Paint;
  body: Paint;
};

const unstyled: Paint = (text) => text;

export const PLAIN_FRAME: FrameStyle = {
  border: unstyled,
  title: unstyled,
  body: unstyled,
};

/**
 * Boxes grid rows in an ASCII frame, with an optional title bar. The box is
 * as wide as the widest row or the padded title.
 */
export function drawFrame(rows: string[], title?: string, style: FrameStyle = PLAIN_FRAME): string {
  const titleWidth = title ? title.length + 2 : 0;
  const innerWidth = rows.reduce((widest, row) => Math.max(widest, row.length), titleWidth);
  const rule = style.border(`+${"-".repeat(innerWidth + 2)}+`);

  const out = [rule];
  if (title) {
    const bar = ` ${title} `.padEnd(innerWidth + 2, " ");
    out.push(style.border("|") + style.title(bar) + style.border("|"), rule);
  }
  for (const row of rows) {
    out.push(style.border("| ") + style.body(row.padEnd(innerWidth, " ")) + style.border(" |"));
  }
  out.push(rule);
  return out.join("\n");
}
