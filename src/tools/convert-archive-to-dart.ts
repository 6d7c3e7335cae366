/**
 * convert_archive_to_dart MCP Tool
 * Generate the Dart catalog from a Crowdin export zip
 */

import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import {
  getArchivePath,
  getDartPath,
  getQuoteStyle,
  getUnmappedLocalePolicy,
} from "../config/env.js";
import { convertArchiveToSource } from "../converters/forward.js";
import { quoteStyleSchema, unmappedLocalePolicySchema } from "../utils/validation.js";
import {
  errorOutput,
  resolveToolArgument,
  toToolResponse,
  type ToolErrorOutput,
  type ToolResponse,
} from "./tool-output.js";

// Input schema
export const ConvertArchiveToDartSchema = z.object({
  project_path: z
    .string()
    .optional()
    .describe("Root path of the app repository. Defaults to current working directory."),
  archive_path: z
    .string()
    .optional()
    .describe("Crowdin export zip, relative to project_path. Defaults to \"translations/Saturn (translations).zip\"."),
  output_path: z
    .string()
    .optional()
    .describe("Generated Dart file, relative to project_path. Defaults to lib/languages/crowdin.dart."),
  quote_style: quoteStyleSchema
    .optional()
    .describe("'single' for single-quoted Dart literals, 'double' for JSON. Defaults to CROWDIN_QUOTE_STYLE or 'single'."),
  unmapped_locales: unmappedLocalePolicySchema
    .optional()
    .describe("'error' to fail on locales missing from the locale map, 'skip' to drop them."),
  dry_run: z
    .boolean()
    .default(true)
    .describe("If true, only report what would be generated. Default: true (safe mode)"),
});

export type ConvertArchiveToDartInput = z.infer<typeof ConvertArchiveToDartSchema>;

// Output type
interface ConvertArchiveToDartOutput {
  success: true;
  dry_run: boolean;
  output_path: string;
  locales: string[];
  skipped_locales: string[];
  key_count: number;
  bytes: number;
  message: string;
}

/**
 * Run the forward conversion for the tool
 */
export async function convertArchiveToDart(
  input: ConvertArchiveToDartInput
): Promise<ConvertArchiveToDartOutput | ToolErrorOutput> {
  const projectPath = input.project_path || process.cwd();

  try {
    const archivePath = resolveToolArgument(projectPath, input.archive_path, getArchivePath());
    const outputPath = resolveToolArgument(projectPath, input.output_path, getDartPath());

    const result = await convertArchiveToSource({
      archivePath,
      outputPath,
      quoteStyle: input.quote_style ?? getQuoteStyle(),
      unmappedLocales: input.unmapped_locales ?? getUnmappedLocalePolicy(),
      dryRun: input.dry_run,
    });

    return {
      success: true,
      dry_run: input.dry_run,
      output_path: result.outputPath,
      locales: result.locales,
      skipped_locales: result.skipped,
      key_count: result.keyCount,
      bytes: result.bytes,
      message: result.written
        ? `Wrote ${result.locales.length} locales (${result.keyCount} keys) to ${result.outputPath}.`
        : `Would write ${result.locales.length} locales (${result.keyCount} keys) to ${result.outputPath}. Set dry_run=false to write.`,
    };
  } catch (error) {
    return errorOutput(error);
  }
}

/**
 * Register the convert_archive_to_dart tool with the MCP server
 */
export function registerConvertArchiveToDart(server: McpServer): void {
  server.tool(
    "convert_archive_to_dart",
    "Generate the Dart translation catalog (const crowdin = {...};) from a Crowdin export zip. Default is dry_run=true (preview mode).",
    ConvertArchiveToDartSchema.shape,
    async (args): Promise<ToolResponse> => {
      const input = ConvertArchiveToDartSchema.parse(args);
      return toToolResponse(await convertArchiveToDart(input));
    }
  );
}
