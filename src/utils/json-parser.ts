/**
 * JSON utilities for locale bundles and the aggregate catalog
 */

import { ParseError } from "../errors.js";

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

/** Translation key → display string for one locale */
export type LocaleBundle = JsonObject;

/** App locale code → locale bundle */
export type AggregateCatalog = Record<string, LocaleBundle>;

/**
 * Check that a value is a plain JSON object (not null, not an array)
 */
export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parse text that must hold a JSON object
 *
 * @param content - Raw JSON text
 * @param source - Name used in error messages (entry or file name)
 * @throws ParseError if the text is not JSON or its root is not an object
 */
export function parseJsonObject(content: string, source: string): JsonObject {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ParseError(`Invalid JSON in '${source}': ${reason}`, null, {
      cause: error,
    });
  }

  if (!isJsonObject(parsed)) {
    throw new ParseError(`Expected a JSON object at the root of '${source}'`);
  }
  return parsed;
}

/**
 * Count the number of translation keys in a JSON object (recursively)
 */
export function countKeys(obj: JsonObject): number {
  let count = 0;

  for (const value of Object.values(obj)) {
    if (isJsonObject(value)) {
      count += countKeys(value);
    } else {
      count++;
    }
  }

  return count;
}

/**
 * Count translation keys across every locale of a catalog
 */
export function countCatalogKeys(catalog: AggregateCatalog): number {
  return Object.values(catalog).reduce((sum, bundle) => sum + countKeys(bundle), 0);
}

/**
 * Serialize a locale bundle the way Crowdin expects to import it:
 * two-space indent, non-ASCII characters as-is, no trailing newline
 */
export function stringifyBundle(bundle: LocaleBundle): string {
  return JSON.stringify(bundle, null, 2);
}
