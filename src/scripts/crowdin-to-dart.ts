#!/usr/bin/env node
/**
 * Generate lib/languages/crowdin.dart from the Crowdin export
 *
 * Run from the translations directory after downloading "Saturn (translations).zip".
 */

import {
  getArchivePath,
  getDartPath,
  getQuoteStyle,
  getUnmappedLocalePolicy,
} from "../config/env.js";
import { convertArchiveToSource } from "../converters/forward.js";

async function main(): Promise<void> {
  const result = await convertArchiveToSource({
    archivePath: getArchivePath(),
    outputPath: getDartPath(),
    quoteStyle: getQuoteStyle(),
    unmappedLocales: getUnmappedLocalePolicy(),
  });

  if (result.skipped.length > 0) {
    console.error(`Skipped unmapped locales: ${result.skipped.join(", ")}`);
  }
  console.error(`Generated ${result.outputPath} with ${result.locales.length} locales`);
}

main().catch((error) => {
  console.error("Failed to generate Dart catalog:", error);
  process.exit(1);
});
