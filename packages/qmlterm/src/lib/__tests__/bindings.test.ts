import { describe, expect, it } from "vitest";

import { chainResolvers, createRecordResolver, greeterResolver, parseBindingArgs } from "../bindings.js";
import { createGreeter } from "../greeter.js";

describe("createRecordResolver", () => {
  const resolve = createRecordResolver({
    actionLabel: "Run",
    "flat.key": "flat",
    count: 3,
    enabled: false,
    user: { name: "Ada", tags: ["a", "b"] },
    empty: null,
  });

  it("resolves top-level and dotted keys", () => {
    expect(resolve("actionLabel")).toBe("Run");
    expect(resolve("user.name")).toBe("Ada");
    expect(resolve("flat.key")).toBe("flat");
  });

  it("stringifies scalars and encodes objects", () => {
    expect(resolve("count")).toBe("3");
    expect(resolve("enabled")).toBe("false");
    expect(resolve("user.tags")).toBe('["a","b"]');
  });

  it("returns an empty string for unknown bindings", () => {
    expect(resolve("missing")).toBe("");
    expect(resolve("user.missing.deeper")).toBe("");
    expect(resolve("empty")).toBe("");
    expect(resolve("toString")).toBe("");
    expect(resolve("__proto__")).toBe("");
    expect(resolve("user.__proto__")).toBe("");
  });
});

describe("greeterResolver", () => {
  const resolve = greeterResolver(createGreeter());

  it("maps greeter bindings", () => {
    expect(resolve("greeter.message")).toBe("Hello from qmlterm");
    expect(resolve("greeter.greet")).toBe("Hello, terminal!");
    expect(resolve("greeter.greet()")).toBe("Hello, terminal!");
  });

  it("echoes anything else", () => {
    expect(resolve("actionLabel")).toBe("actionLabel");
  });
});

describe("chainResolvers", () => {
  it("returns the first useful answer", () => {
    const resolve = chainResolvers(
      createRecordResolver({ "greeter.message": "Override" }),
      greeterResolver(createGreeter()),
    );

    expect(resolve("greeter.message")).toBe("Override");
    expect(resolve("greeter.greet")).toBe("Hello, terminal!");
  });

  it("returns an empty string when nothing resolves", () => {
    const resolve = chainResolvers(greeterResolver(createGreeter()), createRecordResolver({}));

    expect(resolve("unknownToken")).toBe("");
  });
});

describe("parseBindingArgs", () => {
  it("splits on the first equals sign", () => {
    expect(parseBindingArgs(["actionLabel=Run", "url=a=b", " spaced =x"])).toEqual({
      actionLabel: "Run",
      url: "a=b",
      spaced: "x",
    });
  });

  it("ignores malformed entries", () => {
    expect(parseBindingArgs(["novalue", "=orphan"])).toEqual({});
  });

  it("keeps keys that collide with object internals", () => {
    const bindings = parseBindingArgs(["__proto__=x", "constructor=y"]);

    expect(Object.keys(bindings)).toEqual(["__proto__", "constructor"]);
    expect(createRecordResolver(bindings)("__proto__")).toBe("x");
    expect(createRecordResolver(bindings)("constructor")).toBe("y");
  });
});
