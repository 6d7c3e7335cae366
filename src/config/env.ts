/**
 * Environment variable configuration for the catalog converters
 *
 * Path defaults are relative to the translations directory the scripts run
 * in, which sits beside `lib/` in the app repository.
 */

export type QuoteStyle = "single" | "double";
export type UnmappedLocalePolicy = "error" | "skip";

/** Translations directory relative to the app repository root */
export const TRANSLATIONS_DIR = "translations";

/** Crowdin export downloaded into the translations directory */
export const DEFAULT_ARCHIVE_PATH = "Saturn (translations).zip";

/** Generated Dart catalog consumed by the app */
export const DEFAULT_DART_PATH = "../lib/languages/crowdin.dart";

/** Working directory the reverse direction fills before zipping */
export const DEFAULT_EXPORT_ROOT = "./saturn";

export const DEFAULT_EXPORT_ARCHIVE = "saturn.zip";

/** File name every locale bundle carries inside the Crowdin export */
export const MARKER_FILENAME = "saturn.json";

/** Name of the Dart constant holding the catalog */
export const CATALOG_IDENTIFIER = "crowdin";

export function getArchivePath(): string {
  return process.env.CROWDIN_ARCHIVE_PATH || DEFAULT_ARCHIVE_PATH;
}

export function getDartPath(): string {
  return process.env.CROWDIN_DART_PATH || DEFAULT_DART_PATH;
}

export function getExportRoot(): string {
  return process.env.CROWDIN_EXPORT_ROOT || DEFAULT_EXPORT_ROOT;
}

export function getExportArchivePath(): string {
  return process.env.CROWDIN_EXPORT_ARCHIVE || DEFAULT_EXPORT_ARCHIVE;
}

/**
 * Get the quote style for generated Dart (defaults to single quotes)
 */
export function getQuoteStyle(): QuoteStyle {
  const value = process.env.CROWDIN_QUOTE_STYLE;
  if (!value) return "single";
  if (value === "single" || value === "double") return value;
  console.error(`[CONFIG] Ignoring CROWDIN_QUOTE_STYLE='${value}', using 'single'`);
  return "single";
}

/**
 * Get the policy for vendor locales missing from the locale map
 */
export function getUnmappedLocalePolicy(): UnmappedLocalePolicy {
  const value = process.env.CROWDIN_UNMAPPED_LOCALES;
  if (!value) return "error";
  if (value === "error" || value === "skip") return value;
  console.error(`[CONFIG] Ignoring CROWDIN_UNMAPPED_LOCALES='${value}', using 'error'`);
  return "error";
}
