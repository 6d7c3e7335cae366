/**
 * Generated Dart catalog → Crowdin upload archive
 *
 * Splits `const crowdin = { ... };` into `<root>/<locale>/saturn.json`,
 * zips the root and removes it again.
 */

import { mkdir, readFile, rm, stat, writeFile } from "fs/promises";
import { dirname, join, resolve } from "path";
import { CATALOG_IDENTIFIER, MARKER_FILENAME } from "../config/env.js";
import { MarkerNotFoundError, OutputConflictError, ParseError } from "../errors.js";
import { zipDirectory } from "../archive/writer.js";
import { parseLiteral } from "../utils/literal-parser.js";
import {
  isJsonObject,
  stringifyBundle,
  type AggregateCatalog,
} from "../utils/json-parser.js";
import { isPathWithinProject, isSafeLocaleDirectory } from "../utils/validation.js";

/** Closing delimiter of the generated statement */
export const END_MARKER = "};";

export interface ReverseConversionOptions {
  sourcePath: string;
  /** Working directory for the per-locale files; must not exist yet, removed afterwards */
  outputRoot: string;
  archivePath: string;
  identifier?: string;
  markerFilename?: string;
  /** Parse and report without writing anything */
  dryRun?: boolean;
}

export interface ReverseConversionResult {
  locales: string[];
  /** Archive entry names, relative to the output root */
  files: string[];
  archivePath: string;
  written: boolean;
}

/**
 * Get the start marker of the generated statement
 */
export function startMarker(identifier: string = CATALOG_IDENTIFIER): string {
  return `const ${identifier} = `;
}

/**
 * Cut the catalog literal out of generated source
 *
 * The literal runs from the first start marker to the last `};`, closing
 * brace included.
 *
 * @throws MarkerNotFoundError if either marker is missing
 */
export function extractCatalogLiteral(
  source: string,
  identifier: string = CATALOG_IDENTIFIER
): string {
  const marker = startMarker(identifier);
  const start = source.indexOf(marker);
  if (start === -1) {
    throw new MarkerNotFoundError(marker);
  }

  const end = source.lastIndexOf(END_MARKER);
  if (end < start + marker.length) {
    throw new MarkerNotFoundError(END_MARKER);
  }

  return source.slice(start + marker.length, end + 1);
}

/**
 * Parse generated Dart source back into a catalog
 *
 * @throws ParseError if the literal is malformed or not a map of maps
 */
export function parseCatalogSource(
  source: string,
  identifier: string = CATALOG_IDENTIFIER
): AggregateCatalog {
  const literal = parseLiteral(extractCatalogLiteral(source, identifier));

  if (!isJsonObject(literal)) {
    throw new ParseError(`'${identifier}' must be a map of locales`);
  }

  const locales = Object.entries(literal).map(([locale, bundle]) => {
    if (!isJsonObject(bundle)) {
      throw new ParseError(`Locale '${locale}' must map to a map of translations`);
    }
    return [locale, bundle] as const;
  });
  return Object.fromEntries(locales);
}

/**
 * Write one `<root>/<locale>/<marker>` file per locale
 *
 * @returns Written paths relative to `outputRoot`
 * @throws ParseError if a locale name is not a single directory name
 */
export async function writeLocaleFiles(
  catalog: AggregateCatalog,
  outputRoot: string,
  markerFilename: string = MARKER_FILENAME
): Promise<string[]> {
  const written: string[] = [];

  for (const [locale, bundle] of Object.entries(catalog)) {
    const relativePath = `${locale}/${markerFilename}`;
    if (!isSafeLocaleDirectory(locale)) {
      throw new ParseError(`Locale '${locale}' is not a valid directory name`);
    }

    const localeDir = join(outputRoot, locale);
    await mkdir(localeDir, { recursive: true });
    await writeFile(join(localeDir, markerFilename), stringifyBundle(bundle), "utf-8");
    written.push(relativePath);
  }

  return written;
}

function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (error) {
    if (hasErrorCode(error, "ENOENT")) {
      return false;
    }
    throw error;
  }
}

/**
 * Check that the working directory belongs to this run alone
 *
 * @throws OutputConflictError if the directory already exists or would contain the archive
 */
export async function checkOutputRoot(outputRoot: string, archivePath: string): Promise<void> {
  if (isPathWithinProject(resolve(archivePath), resolve(outputRoot))) {
    throw new OutputConflictError(
      outputRoot,
      `Archive '${archivePath}' must not be inside the working directory '${outputRoot}'`
    );
  }
  if (await pathExists(outputRoot)) {
    throw new OutputConflictError(
      outputRoot,
      `Working directory '${outputRoot}' already exists. Remove it or choose another export root.`
    );
  }
}

/**
 * Create the working directory, failing if anything else created it first
 */
async function acquireOutputRoot(outputRoot: string): Promise<void> {
  await mkdir(dirname(outputRoot), { recursive: true });
  try {
    await mkdir(outputRoot);
  } catch (error) {
    if (hasErrorCode(error, "EEXIST")) {
      throw new OutputConflictError(outputRoot, `Working directory '${outputRoot}' already exists`);
    }
    throw error;
  }
}

/**
 * Convert the generated Dart catalog into a zip of per-locale JSON files
 *
 * The working directory is created by this run and removed on every exit
 * path after that, so a failed run leaves no partial tree behind.
 */
export async function convertSourceToArchive(
  options: ReverseConversionOptions
): Promise<ReverseConversionResult> {
  console.error(`[REVERSE] Reading ${options.sourcePath}`);
  const source = await readFile(options.sourcePath, "utf-8");
  const catalog = parseCatalogSource(source, options.identifier);
  const locales = Object.keys(catalog);
  const markerFilename = options.markerFilename ?? MARKER_FILENAME;

  console.error(`[REVERSE] Parsed ${locales.length} locales`);
  await checkOutputRoot(options.outputRoot, options.archivePath);

  if (options.dryRun) {
    return {
      locales,
      files: locales.map((locale) => `${locale}/${markerFilename}`),
      archivePath: options.archivePath,
      written: false,
    };
  }

  await acquireOutputRoot(options.outputRoot);
  try {
    await writeLocaleFiles(catalog, options.outputRoot, markerFilename);
    const files = await zipDirectory(options.outputRoot, options.archivePath);
    return { locales, files, archivePath: options.archivePath, written: true };
  } finally {
    await rm(options.outputRoot, { recursive: true, force: true });
    console.error(`[REVERSE] Removed ${options.outputRoot}`);
  }
}
