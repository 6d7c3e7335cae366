/**
 * Crowdin export archive reader
 *
 * A Crowdin export is a zip laid out as `<vendor-locale>/.../saturn.json`.
 * Only entries whose name contains the marker filename are read.
 */

import { readFile } from "fs/promises";
import JSZip from "jszip";
import { ArchiveError, DecodeError } from "../errors.js";
import { MARKER_FILENAME } from "../config/env.js";
import { parseJsonObject, type LocaleBundle } from "../utils/json-parser.js";

export interface ArchiveLocaleEntry {
  /** Full entry path inside the zip */
  entryName: string;
  /** Locale code from the first path segment, as Crowdin names it */
  vendorLocale: string;
  /** Parsed saturn.json content */
  bundle: LocaleBundle;
}

export interface ReadArchiveOptions {
  /** File name an entry must contain to be read (default: saturn.json) */
  markerFilename?: string;
}

/**
 * Get the vendor locale of an entry (text before the first "/")
 */
export function localeFromEntryName(entryName: string): string {
  return entryName.split("/")[0];
}

/**
 * Decode bytes as UTF-8, rejecting malformed sequences
 * @throws DecodeError if the bytes are not valid UTF-8
 */
export function decodeUtf8(data: Uint8Array, entryName: string): string {
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(data);
  } catch (error) {
    throw new DecodeError(entryName, { cause: error });
  }
}

/**
 * Read every locale bundle from an in-memory Crowdin archive
 *
 * Entry names are sorted before filtering so the result does not depend on
 * the order the archiving tool wrote the entries in.
 */
export async function readLocaleArchiveFromBuffer(
  data: Uint8Array,
  options: ReadArchiveOptions = {}
): Promise<ArchiveLocaleEntry[]> {
  const marker = options.markerFilename ?? MARKER_FILENAME;

  let zip: JSZip;
  try {
    zip = await JSZip.loadAsync(data);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ArchiveError(`Could not open archive: ${reason}`, { cause: error });
  }

  const names = Object.keys(zip.files).sort();
  const entries: ArchiveLocaleEntry[] = [];

  for (const entryName of names) {
    const file = zip.files[entryName];
    if (file.dir || !entryName.includes(marker)) continue;

    const bytes = await file.async("uint8array");
    const text = decodeUtf8(bytes, entryName);
    entries.push({
      entryName,
      vendorLocale: localeFromEntryName(entryName),
      bundle: parseJsonObject(text, entryName),
    });
  }

  console.error(`[ARCHIVE] Read ${entries.length} of ${names.length} entries matching '${marker}'`);
  return entries;
}

/**
 * Read every locale bundle from a Crowdin archive on disk
 */
export async function readLocaleArchive(
  archivePath: string,
  options: ReadArchiveOptions = {}
): Promise<ArchiveLocaleEntry[]> {
  console.error(`[ARCHIVE] Opening ${archivePath}`);
  const data = await readFile(archivePath);
  return readLocaleArchiveFromBuffer(data, options);
}
