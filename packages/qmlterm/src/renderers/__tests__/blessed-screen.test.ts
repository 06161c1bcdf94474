import { describe, expect, it, vi } from "vitest";

import { BlessedScreen } from "../blessed-screen.js";

function createHost(width: number | string, height: number | string) {
  return { width, height, render: vi.fn() };
}

describe("BlessedScreen", () => {
  it("reports the terminal size", () => {
    const screen = new BlessedScreen(createHost(80, 24), { setContent: vi.fn() });

    expect(screen.rows()).toBe(24);
    expect(screen.cols()).toBe(80);
  });

  it("treats non-numeric sizes as empty", () => {
    const screen = new BlessedScreen(createHost("100%", "50%"), { setContent: vi.fn() });

    expect(screen.rows()).toBe(0);
    expect(screen.cols()).toBe(0);
  });

  it("pushes the buffer into the target and repaints on refresh", () => {
    const host = createHost(6, 2);
    const target = { setContent: vi.fn() };
    const screen = new BlessedScreen(host, target);

    screen.clear();
    screen.drawText(0, 1, "hey");
    screen.refresh();

    expect(target.setContent).toHaveBeenCalledWith(" hey  \n      ");
    expect(host.render).toHaveBeenCalledTimes(1);
  });

  it("resizes the buffer on clear", () => {
    const host = createHost(3, 1);
    const target = { setContent: vi.fn() };
    const screen = new BlessedScreen(host, target);

    host.width = 5;
    screen.clear();
    screen.drawText(0, 0, "abcde");
    screen.refresh();

    expect(target.setContent).toHaveBeenLastCalledWith("abcde");
  });
});
