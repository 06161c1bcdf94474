import blessed from "blessed";
import { renderDocument, type BindingResolver, type MarkupDocument, type RenderKinds } from "qmlterm-core";

import { BlessedScreen } from "./blessed-screen.js";

export const EXIT_HINT = "Press any key to exit";

export async function renderTui(
  document: MarkupDocument,
  resolver?: BindingResolver,
  options: { title?: string; kinds?: Partial<RenderKinds> } = {},
): Promise<void> {
  return new Promise((resolve) => {
    const screen = blessed.screen({
      smartCSR: true,
      title: options.title ?? "qmlterm",
    });

    const box = blessed.box({
      top: 0,
      left: 0,
      width: "100%",
      height: "100%",
      tags: false,
    });

    screen.append(box);
    const surface = new BlessedScreen(screen, box);

    const draw = () => {
      renderDocument(document, surface, resolver, { kinds: options.kinds });
      surface.drawText(Math.max(0, surface.rows() - 1), 1, EXIT_HINT);
      surface.refresh();
    };

    screen.on("resize", draw);
    screen.once("keypress", () => {
      screen.destroy();
      resolve();
    });

    draw();
  });
}
