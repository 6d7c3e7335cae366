/**
 * MCP Server setup for the catalog converters
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { registerListArchiveLocales } from "./tools/list-archive-locales.js";
import { registerConvertArchiveToDart } from "./tools/convert-archive-to-dart.js";
import { registerConvertDartToArchive } from "./tools/convert-dart-to-archive.js";

/**
 * Create and configure the MCP server
 */
export function createServer(): McpServer {
  const server = new McpServer({
    name: "crowdin-catalog-converter",
    version: "1.0.0",
  });

  // Register all tools
  registerListArchiveLocales(server);
  registerConvertArchiveToDart(server);
  registerConvertDartToArchive(server);

  return server;
}
