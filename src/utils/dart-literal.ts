/**
 * Dart literal printing for the generated catalog
 *
 * Dart string literals treat `$` as the start of an interpolation, so every
 * literal `$` in translated text must be written as `\$`.
 */

import type { JsonValue } from "./json-parser.js";

/**
 * Escape every interpolation sigil in serialized text
 */
export function escapeSigil(text: string): string {
  return text.replace(/\$/g, "\\$");
}

const SIMPLE_ESCAPES: Record<string, string> = {
  "\\": "\\\\",
  "\n": "\\n",
  "\r": "\\r",
  "\t": "\\t",
  "\b": "\\b",
  "\f": "\\f",
  "\v": "\\v",
  $: "\\$",
};

/**
 * Quote a string as a Dart literal
 *
 * Single quotes are preferred. A value containing an apostrophe is written in
 * double quotes instead, so it never needs an escaped `\'`.
 *
 * @example
 * quoteDartString("Hello") // 'Hello'
 * quoteDartString("it's") // "it's"
 * quoteDartString("$5") // '\$5'
 */
export function quoteDartString(value: string): string {
  const quote = value.includes("'") ? '"' : "'";
  let body = "";

  for (const char of value) {
    if (char === quote) {
      body += `\\${char}`;
    } else if (Object.hasOwn(SIMPLE_ESCAPES, char)) {
      body += SIMPLE_ESCAPES[char];
    } else if (char < " " || char === "\u007f") {
      body += `\\u${char.charCodeAt(0).toString(16).padStart(4, "0")}`;
    } else {
      body += char;
    }
  }

  return `${quote}${body}${quote}`;
}

/**
 * Print a JSON value as an indented Dart literal
 *
 * Layout follows `JSON.stringify(value, null, indent)`: one entry per line,
 * empty collections as `{}` / `[]`, no trailing commas.
 */
export function printDartLiteral(
  value: JsonValue,
  indent = "  ",
  depth = 0
): string {
  if (value === null) return "null";
  if (typeof value === "string") return quoteDartString(value);
  if (typeof value === "number" || typeof value === "boolean") {
    return JSON.stringify(value);
  }

  const inner = indent.repeat(depth + 1);
  const outer = indent.repeat(depth);

  if (Array.isArray(value)) {
    if (value.length === 0) return "[]";
    const items = value.map(
      (item) => `${inner}${printDartLiteral(item, indent, depth + 1)}`
    );
    return `[\n${items.join(",\n")}\n${outer}]`;
  }

  const entries = Object.entries(value);
  if (entries.length === 0) return "{}";
  const lines = entries.map(
    ([key, item]) =>
      `${inner}${quoteDartString(key)}: ${printDartLiteral(item, indent, depth + 1)}`
  );
  return `{\n${lines.join(",\n")}\n${outer}}`;
}
