/**
 * convert_dart_to_archive MCP Tool
 * Split the generated Dart catalog into a Crowdin upload zip
 */

import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { getDartPath, getExportArchivePath, getExportRoot } from "../config/env.js";
import { convertSourceToArchive } from "../converters/reverse.js";
import {
  errorOutput,
  resolveToolArgument,
  toToolResponse,
  type ToolErrorOutput,
  type ToolResponse,
} from "./tool-output.js";

// Input schema
export const ConvertDartToArchiveSchema = z.object({
  project_path: z
    .string()
    .optional()
    .describe("Root path of the app repository. Defaults to current working directory."),
  source_path: z
    .string()
    .optional()
    .describe("Generated Dart file, relative to project_path. Defaults to lib/languages/crowdin.dart."),
  export_root: z
    .string()
    .optional()
    .describe("Temporary directory for per-locale files, relative to project_path. Defaults to translations/saturn."),
  archive_path: z
    .string()
    .optional()
    .describe("Zip to create, relative to project_path. Defaults to translations/saturn.zip."),
  dry_run: z
    .boolean()
    .default(true)
    .describe("If true, only parse the catalog and list the files. Default: true (safe mode)"),
});

export type ConvertDartToArchiveInput = z.infer<typeof ConvertDartToArchiveSchema>;

// Output type
interface ConvertDartToArchiveOutput {
  success: true;
  dry_run: boolean;
  archive_path: string;
  locales: string[];
  files: string[];
  message: string;
}

/**
 * Run the reverse conversion for the tool
 */
export async function convertDartToArchive(
  input: ConvertDartToArchiveInput
): Promise<ConvertDartToArchiveOutput | ToolErrorOutput> {
  const projectPath = input.project_path || process.cwd();

  try {
    const sourcePath = resolveToolArgument(projectPath, input.source_path, getDartPath());
    const outputRoot = resolveToolArgument(projectPath, input.export_root, getExportRoot());
    const archivePath = resolveToolArgument(
      projectPath,
      input.archive_path,
      getExportArchivePath()
    );

    const result = await convertSourceToArchive({
      sourcePath,
      outputRoot,
      archivePath,
      dryRun: input.dry_run,
    });

    return {
      success: true,
      dry_run: input.dry_run,
      archive_path: result.archivePath,
      locales: result.locales,
      files: result.files,
      message: result.written
        ? `Wrote ${result.files.length} locale files to ${result.archivePath}.`
        : `Would write ${result.files.length} locale files to ${result.archivePath}. Set dry_run=false to write.`,
    };
  } catch (error) {
    return errorOutput(error);
  }
}

/**
 * Register the convert_dart_to_archive tool with the MCP server
 */
export function registerConvertDartToArchive(server: McpServer): void {
  server.tool(
    "convert_dart_to_archive",
    "Split the generated Dart translation catalog into <locale>/saturn.json files and zip them for upload to Crowdin. Default is dry_run=true (preview mode).",
    ConvertDartToArchiveSchema.shape,
    async (args): Promise<ToolResponse> => {
      const input = ConvertDartToArchiveSchema.parse(args);
      return toToolResponse(await convertDartToArchive(input));
    }
  );
}
