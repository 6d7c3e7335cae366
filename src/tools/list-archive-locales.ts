/**
 * list_archive_locales MCP Tool
 * Lists the locales in a Crowdin export and how each maps onto the app
 */

import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { getArchivePath } from "../config/env.js";
import {
  LOCALE_MAP,
  findVendorLocales,
  listVendorLocales,
  lookupAppLocale,
} from "../config/locale-map.js";
import { readLocaleArchive } from "../archive/reader.js";
import { countKeys } from "../utils/json-parser.js";
import {
  errorOutput,
  resolveToolArgument,
  toToolResponse,
  type ToolErrorOutput,
  type ToolResponse,
} from "./tool-output.js";

// Input schema
export const ListArchiveLocalesSchema = z.object({
  project_path: z
    .string()
    .optional()
    .describe("Root path of the app repository. Defaults to current working directory."),
  archive_path: z
    .string()
    .optional()
    .describe("Crowdin export zip, relative to project_path. Defaults to \"translations/Saturn (translations).zip\"."),
});

export type ListArchiveLocalesInput = z.infer<typeof ListArchiveLocalesSchema>;

// Output types
interface ListArchiveLocalesOutput {
  success: true;
  archive_path: string;
  locales: Array<{
    vendor_locale: string;
    app_locale: string | null;
    entry: string;
    key_count: number;
    /** Other vendor locales that collapse into the same app locale */
    shared_with: string[];
  }>;
  unmapped: string[];
  /** Mapped vendor locales the archive does not contain */
  missing: string[];
}

/**
 * List archive locales with their mapping status
 */
export async function listArchiveLocales(
  input: ListArchiveLocalesInput
): Promise<ListArchiveLocalesOutput | ToolErrorOutput> {
  const projectPath = input.project_path || process.cwd();

  try {
    const archivePath = resolveToolArgument(projectPath, input.archive_path, getArchivePath());
    const entries = await readLocaleArchive(archivePath);

    const locales = entries.map((entry) => {
      const appLocale = lookupAppLocale(entry.vendorLocale);
      return {
        vendor_locale: entry.vendorLocale,
        app_locale: appLocale,
        entry: entry.entryName,
        key_count: countKeys(entry.bundle),
        shared_with:
          appLocale === null
            ? []
            : findVendorLocales(appLocale).filter((vendor) => vendor !== entry.vendorLocale),
      };
    });
    const present = new Set(locales.map((l) => l.vendor_locale));

    return {
      success: true,
      archive_path: archivePath,
      locales,
      unmapped: locales.filter((l) => l.app_locale === null).map((l) => l.vendor_locale),
      missing: listVendorLocales(LOCALE_MAP).filter((vendor) => !present.has(vendor)),
    };
  } catch (error) {
    return errorOutput(error);
  }
}

/**
 * Register the list_archive_locales tool with the MCP server
 */
export function registerListArchiveLocales(server: McpServer): void {
  server.tool(
    "list_archive_locales",
    "List the locales inside a Crowdin export zip, the app locale each one maps to, its key count, and which mapped locales are missing from the export.",
    ListArchiveLocalesSchema.shape,
    async (args): Promise<ToolResponse> => {
      const input = ListArchiveLocalesSchema.parse(args);
      return toToolResponse(await listArchiveLocales(input));
    }
  );
}
