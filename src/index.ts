#!/usr/bin/env node
/**
 * Crowdin catalog MCP Server Entry Point
 *
 * Exposes the Crowdin ⇄ Dart catalog conversions to AI assistants.
 *
 * Tools available:
 * - list_archive_locales: Inspect a Crowdin export and its locale mapping
 * - convert_archive_to_dart: Generate lib/languages/crowdin.dart from the export
 * - convert_dart_to_archive: Zip the Dart catalog back into per-locale JSON
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createServer } from "./server.js";

async function main(): Promise<void> {
  const server = createServer();
  const transport = new StdioServerTransport();

  await server.connect(transport);
}

main().catch((error) => {
  console.error("Failed to start crowdin catalog MCP server:", error);
  process.exit(1);
});
