/**
 * Zip a directory tree for upload to Crowdin
 */

import { glob } from "glob";
import { mkdir, readFile, writeFile } from "fs/promises";
import { dirname, join } from "path";
import JSZip from "jszip";
import { ArchiveError } from "../errors.js";

/**
 * Build a zip of every file under `root`
 *
 * Entry names are relative to `root`, use "/" separators and are added in
 * sorted order, so the same tree always produces the same entry list.
 *
 * @returns Entry names written to the archive
 */
export async function zipDirectory(
  root: string,
  archivePath: string
): Promise<string[]> {
  const files = await glob("**/*", {
    cwd: root,
    nodir: true,
    dot: true,
    posix: true,
  });
  files.sort();

  const zip = new JSZip();
  for (const file of files) {
    zip.file(file, await readFile(join(root, file)));
  }

  let data: Uint8Array;
  try {
    data = await zip.generateAsync({
      type: "uint8array",
      compression: "DEFLATE",
      compressionOptions: { level: 9 },
    });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ArchiveError(`Could not build archive: ${reason}`, { cause: error });
  }

  await mkdir(dirname(archivePath), { recursive: true });
  await writeFile(archivePath, data);
  console.error(`[ARCHIVE] Wrote ${files.length} files to ${archivePath}`);

  return files;
}
