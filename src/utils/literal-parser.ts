/**
 * Literal-only parser for the generated Dart catalog
 *
 * Reads the data part of `const crowdin = { ... };` back into memory.
 * Only literal syntax is accepted:
 * - Maps with string keys: {'key': value, "other": value,}
 * - Lists: [value, value,]
 * - Single- or double-quoted strings (adjacent strings concatenate)
 * - Numbers, true, false, null
 * - Line and block comments, trailing commas
 *
 * Anything else (identifiers, calls, string interpolation) is rejected.
 * Nothing is ever evaluated.
 */

import { ParseError } from "../errors.js";
import type { JsonObject, JsonValue } from "./json-parser.js";

interface Cursor {
  text: string;
  pos: number;
}

/**
 * Parse a complete literal
 *
 * @param text - Literal source, e.g. `{'de-de': {'hello': 'Hallo'}}`
 * @throws ParseError on any syntax outside the literal grammar
 */
export function parseLiteral(text: string): JsonValue {
  const cursor: Cursor = { text, pos: 0 };
  const value = parseValue(cursor);

  skipTrivia(cursor);
  if (cursor.pos < text.length) {
    fail(cursor, `Unexpected '${text[cursor.pos]}' after literal`);
  }
  return value;
}

function fail(cursor: Cursor, message: string): never {
  const { line, column } = locate(cursor.text, cursor.pos);
  throw new ParseError(`${message} at line ${line}, column ${column}`, cursor.pos);
}

function locate(text: string, pos: number): { line: number; column: number } {
  const before = text.slice(0, pos);
  const lastNewline = before.lastIndexOf("\n");
  return {
    line: before.split("\n").length,
    column: pos - lastNewline,
  };
}

/**
 * Skip whitespace and comments
 */
function skipTrivia(cursor: Cursor): void {
  const { text } = cursor;

  while (cursor.pos < text.length) {
    const char = text[cursor.pos];

    if (/\s/.test(char)) {
      cursor.pos++;
      continue;
    }

    if (text.startsWith("//", cursor.pos)) {
      const lineEnd = text.indexOf("\n", cursor.pos);
      cursor.pos = lineEnd === -1 ? text.length : lineEnd + 1;
      continue;
    }

    if (text.startsWith("/*", cursor.pos)) {
      const commentEnd = text.indexOf("*/", cursor.pos + 2);
      if (commentEnd === -1) {
        fail(cursor, "Unterminated block comment");
      }
      cursor.pos = commentEnd + 2;
      continue;
    }

    break;
  }
}

function parseValue(cursor: Cursor): JsonValue {
  skipTrivia(cursor);
  const char = cursor.text[cursor.pos];

  if (char === undefined) {
    fail(cursor, "Unexpected end of input");
  }
  if (char === "{") return parseMap(cursor);
  if (char === "[") return parseList(cursor);
  if (char === "'" || char === '"') return parseStrings(cursor);
  if (char === "-" || (char >= "0" && char <= "9")) return parseNumber(cursor);

  const word = /^[A-Za-z_$][\w$]*/.exec(cursor.text.slice(cursor.pos));
  if (word) {
    switch (word[0]) {
      case "true":
        cursor.pos += 4;
        return true;
      case "false":
        cursor.pos += 5;
        return false;
      case "null":
        cursor.pos += 4;
        return null;
    }
    fail(cursor, `Unsupported identifier '${word[0]}'`);
  }

  fail(cursor, `Unexpected '${char}'`);
}

function parseMap(cursor: Cursor): JsonObject {
  cursor.pos++; // {
  const entries: Array<[string, JsonValue]> = [];

  for (;;) {
    skipTrivia(cursor);
    if (cursor.text[cursor.pos] === "}") {
      cursor.pos++;
      break;
    }

    const quote = cursor.text[cursor.pos];
    if (quote !== "'" && quote !== '"') {
      fail(cursor, "Expected a quoted map key");
    }
    const key = parseStrings(cursor);

    skipTrivia(cursor);
    if (cursor.text[cursor.pos] !== ":") {
      fail(cursor, "Expected ':' after map key");
    }
    cursor.pos++;

    entries.push([key, parseValue(cursor)]);

    skipTrivia(cursor);
    const next = cursor.text[cursor.pos];
    if (next === ",") {
      cursor.pos++;
    } else if (next !== "}") {
      fail(cursor, "Expected ',' or '}' in map");
    }
  }

  // fromEntries defines own properties, so keys like "__proto__" stay data
  return Object.fromEntries(entries);
}

function parseList(cursor: Cursor): JsonValue[] {
  cursor.pos++; // [
  const items: JsonValue[] = [];

  for (;;) {
    skipTrivia(cursor);
    if (cursor.text[cursor.pos] === "]") {
      cursor.pos++;
      break;
    }

    items.push(parseValue(cursor));

    skipTrivia(cursor);
    const next = cursor.text[cursor.pos];
    if (next === ",") {
      cursor.pos++;
    } else if (next !== "]") {
      fail(cursor, "Expected ',' or ']' in list");
    }
  }

  return items;
}

function parseNumber(cursor: Cursor): number {
  const match = /^-?\d+(\.\d+)?([eE][+-]?\d+)?/.exec(cursor.text.slice(cursor.pos));
  if (!match) {
    fail(cursor, "Invalid number");
  }
  cursor.pos += match[0].length;
  return Number(match[0]);
}

/**
 * Parse one or more adjacent string literals and concatenate them
 */
function parseStrings(cursor: Cursor): string {
  let value = parseQuotedString(cursor);

  for (;;) {
    const save = cursor.pos;
    skipTrivia(cursor);
    const next = cursor.text[cursor.pos];
    if (next !== "'" && next !== '"') {
      cursor.pos = save;
      return value;
    }
    value += parseQuotedString(cursor);
  }
}

/**
 * Parse a single quoted string, resolving escape sequences
 */
function parseQuotedString(cursor: Cursor): string {
  const { text } = cursor;
  const quote = text[cursor.pos];
  const start = cursor.pos;
  cursor.pos++;
  let value = "";

  while (cursor.pos < text.length) {
    const char = text[cursor.pos];

    if (char === quote) {
      cursor.pos++;
      return value;
    }

    if (char === "\n" || char === "\r") {
      fail(cursor, "Unterminated string");
    }

    if (char === "$") {
      fail(cursor, "String interpolation is not supported; escape '$' as '\\$'");
    }

    if (char === "\\") {
      cursor.pos++;
      value += parseEscape(cursor);
      continue;
    }

    value += char;
    cursor.pos++;
  }

  cursor.pos = start;
  fail(cursor, "Unterminated string");
}

/**
 * Resolve the escape sequence after a backslash
 */
function parseEscape(cursor: Cursor): string {
  const { text } = cursor;
  const escaped = text[cursor.pos];

  if (escaped === undefined) {
    fail(cursor, "Unterminated escape sequence");
  }

  switch (escaped) {
    case "n":
      cursor.pos++;
      return "\n";
    case "r":
      cursor.pos++;
      return "\r";
    case "t":
      cursor.pos++;
      return "\t";
    case "b":
      cursor.pos++;
      return "\b";
    case "f":
      cursor.pos++;
      return "\f";
    case "v":
      cursor.pos++;
      return "\v";
    case "x": {
      const hex = /^[0-9a-fA-F]{2}/.exec(text.slice(cursor.pos + 1));
      if (!hex) fail(cursor, "Invalid \\x escape");
      cursor.pos += 3;
      return String.fromCharCode(parseInt(hex[0], 16));
    }
    case "u": {
      const braced = /^\{([0-9a-fA-F]{1,6})\}/.exec(text.slice(cursor.pos + 1));
      if (braced) {
        const codePoint = parseInt(braced[1], 16);
        if (codePoint > 0x10ffff) fail(cursor, "Invalid code point");
        cursor.pos += 1 + braced[0].length;
        return String.fromCodePoint(codePoint);
      }
      const hex = /^[0-9a-fA-F]{4}/.exec(text.slice(cursor.pos + 1));
      if (!hex) fail(cursor, "Invalid \\u escape");
      cursor.pos += 5;
      return String.fromCharCode(parseInt(hex[0], 16));
    }
    case "\n":
    case "\r":
      fail(cursor, "Unterminated string");
    default:
      // \\, \', \", \$ and any other escaped character stand for themselves
      cursor.pos++;
      return escaped;
  }
}
