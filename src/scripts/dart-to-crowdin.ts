#!/usr/bin/env node
/**
 * Build saturn.zip from lib/languages/crowdin.dart for upload to Crowdin
 */

import { getDartPath, getExportArchivePath, getExportRoot } from "../config/env.js";
import { convertSourceToArchive } from "../converters/reverse.js";

async function main(): Promise<void> {
  const result = await convertSourceToArchive({
    sourcePath: getDartPath(),
    outputRoot: getExportRoot(),
    archivePath: getExportArchivePath(),
  });

  console.error(`Created ${result.archivePath} with ${result.locales.length} locales`);
}

main().catch((error) => {
  console.error("Failed to export Dart catalog:", error);
  process.exit(1);
});
