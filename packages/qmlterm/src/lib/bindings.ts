import type { BindingResolver } from "qmlterm-core";

import type { Greeter } from "./greeter.js";

export type BindingRecord = Record<string, unknown>;

function isRecord(value: unknown): value is BindingRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function ownValue(record: BindingRecord, key: string): unknown {
  return Object.hasOwn(record, key) ? record[key] : undefined;
}

function resolvePath(data: BindingRecord, key: string): unknown {
  if (Object.hasOwn(data, key) || !key.includes(".")) {
    return ownValue(data, key);
  }
  return key
    .split(".")
    .reduce<unknown>((acc, segment) => (isRecord(acc) ? ownValue(acc, segment) : undefined), data);
}

function stringifyBinding(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") {
    return String(value);
  }
  if (typeof value === "object" && value !== null) {
    return JSON.stringify(value);
  }
  return "";
}

/**
 * Looks bindings up in a data record, following dotted paths into nested
 * objects. Unknown bindings resolve to "" so the raw text is shown.
 */
export function createRecordResolver(data: BindingRecord): BindingResolver {
  return (binding) => stringifyBinding(resolvePath(data, binding));
}

export function greeterResolver(greeter: Greeter): BindingResolver {
  return (binding) => {
    if (binding === "greeter.message") {
      return greeter.message();
    }
    if (binding === "greeter.greet" || binding === "greeter.greet()") {
      return greeter.greet("");
    }
    return binding;
  };
}

/**
 * First resolver that produces something other than "" or its own input wins.
 */
export function chainResolvers(...resolvers: BindingResolver[]): BindingResolver {
  return (binding) => {
    for (const resolver of resolvers) {
      const resolved = resolver(binding);
      if (resolved && resolved !== binding) {
        return resolved;
      }
    }
    return "";
  };
}

/**
 * Turns repeated `--bind key=value` flags into a record. Entries without `=`
 * or with an empty key are ignored.
 */
export function parseBindingArgs(args: string[]): Record<string, string> {
  const bindings: Record<string, string> = Object.create(null);
  for (const arg of args) {
    const separator = arg.indexOf("=");
    const key = separator === -1 ? "" : arg.slice(0, separator).trim();
    if (!key) {
      continue;
    }
    bindings[key] = arg.slice(separator + 1);
  }
  return bindings;
}
