/**
 * Crowdin archive → generated Dart catalog
 *
 * Produces a single statement:
 *   const crowdin = { 'de-de': { 'hello': 'Hallo' }, ... };
 */

import { mkdir, writeFile } from "fs/promises";
import { dirname } from "path";
import {
  CATALOG_IDENTIFIER,
  type QuoteStyle,
  type UnmappedLocalePolicy,
} from "../config/env.js";
import {
  LOCALE_MAP,
  lookupAppLocale,
  mapVendorLocale,
  type LocaleMap,
} from "../config/locale-map.js";
import {
  readLocaleArchive,
  type ArchiveLocaleEntry,
  type ReadArchiveOptions,
} from "../archive/reader.js";
import { escapeSigil, printDartLiteral } from "../utils/dart-literal.js";
import { countCatalogKeys, type AggregateCatalog } from "../utils/json-parser.js";

export interface BuildCatalogOptions {
  localeMap?: LocaleMap;
  /** What to do with a vendor locale missing from the map (default: error) */
  unmappedLocales?: UnmappedLocalePolicy;
}

export interface BuildCatalogResult {
  catalog: AggregateCatalog;
  /** Vendor locales dropped under the "skip" policy */
  skipped: string[];
}

export interface RenderOptions {
  /** single: Dart literal with single quotes; double: JSON (default: single) */
  quoteStyle?: QuoteStyle;
  /** Name of the generated constant (default: crowdin) */
  identifier?: string;
}

export interface ForwardConversionOptions
  extends BuildCatalogOptions,
    RenderOptions,
    ReadArchiveOptions {
  archivePath: string;
  outputPath: string;
  /** Build and render without writing the output file */
  dryRun?: boolean;
}

export interface ForwardConversionResult {
  /** App locales in output order */
  locales: string[];
  skipped: string[];
  keyCount: number;
  outputPath: string;
  /** Size of the generated source, written or not */
  bytes: number;
  written: boolean;
  source: string;
}

/**
 * Aggregate archive entries into a catalog keyed by app locale
 *
 * Locale order follows entry order. When two vendor locales map onto the
 * same app locale, the later bundle replaces the earlier one in place.
 *
 * @throws MissingMappingError for an unmapped vendor locale under the "error" policy
 */
export function buildCatalog(
  entries: ArchiveLocaleEntry[],
  options: BuildCatalogOptions = {}
): BuildCatalogResult {
  const map = options.localeMap ?? LOCALE_MAP;
  const policy = options.unmappedLocales ?? "error";
  const catalog: AggregateCatalog = {};
  const skipped: string[] = [];

  for (const entry of entries) {
    const appLocale =
      policy === "error"
        ? mapVendorLocale(entry.vendorLocale, map)
        : lookupAppLocale(entry.vendorLocale, map);

    if (appLocale === null) {
      console.error(`[FORWARD] Skipping unmapped locale '${entry.vendorLocale}' (${entry.entryName})`);
      skipped.push(entry.vendorLocale);
      continue;
    }

    if (Object.hasOwn(catalog, appLocale)) {
      console.error(`[FORWARD] '${entry.vendorLocale}' replaces earlier bundle for '${appLocale}'`);
    }
    catalog[appLocale] = entry.bundle;
  }

  return { catalog, skipped };
}

/**
 * Serialize a catalog literal in the requested quote style, sigils escaped
 */
export function renderCatalogLiteral(
  catalog: AggregateCatalog,
  quoteStyle: QuoteStyle = "single"
): string {
  if (quoteStyle === "double") {
    return escapeSigil(JSON.stringify(catalog, null, 2));
  }
  // The printer escapes sigils itself
  return printDartLiteral(catalog);
}

/**
 * Render the generated Dart source for a catalog
 */
export function renderCatalogSource(
  catalog: AggregateCatalog,
  options: RenderOptions = {}
): string {
  const identifier = options.identifier ?? CATALOG_IDENTIFIER;
  const literal = renderCatalogLiteral(catalog, options.quoteStyle);
  return `const ${identifier} = ${literal};`;
}

/**
 * Convert a Crowdin archive into the generated Dart catalog file
 */
export async function convertArchiveToSource(
  options: ForwardConversionOptions
): Promise<ForwardConversionResult> {
  const entries = await readLocaleArchive(options.archivePath, options);
  const { catalog, skipped } = buildCatalog(entries, options);
  const source = renderCatalogSource(catalog, options);
  const locales = Object.keys(catalog);
  const bytes = Buffer.byteLength(source, "utf-8");

  console.error(`[FORWARD] ${locales.length} locales, ${countCatalogKeys(catalog)} keys`);

  if (!options.dryRun) {
    await mkdir(dirname(options.outputPath), { recursive: true });
    await writeFile(options.outputPath, source, "utf-8");
    console.error(`[FORWARD] Wrote ${bytes} bytes to ${options.outputPath}`);
  }

  return {
    locales,
    skipped,
    keyCount: countCatalogKeys(catalog),
    outputPath: options.outputPath,
    bytes,
    written: !options.dryRun,
    source,
  };
}
