/**
 * Error types raised by the catalog converters
 *
 * Each error carries a stable `code` so MCP tools can report failures in the
 * same `{ success: false, error: { code, message } }` shape for every cause.
 */

export type ConverterErrorCode =
  | "MISSING_MAPPING"
  | "DECODE_ERROR"
  | "PARSE_ERROR"
  | "MARKER_NOT_FOUND"
  | "ARCHIVE_ERROR"
  | "INVALID_PATH"
  | "OUTPUT_CONFLICT";

export class ConverterError extends Error {
  readonly code: ConverterErrorCode;

  constructor(code: ConverterErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * A vendor locale code has no entry in the locale map
 */
export class MissingMappingError extends ConverterError {
  readonly vendorLocale: string;

  constructor(vendorLocale: string) {
    super(
      "MISSING_MAPPING",
      `No app locale mapped for vendor locale '${vendorLocale}'. Add it to LOCALE_MAP or skip unmapped locales.`
    );
    this.vendorLocale = vendorLocale;
  }
}

/**
 * Archive entry bytes are not valid UTF-8
 */
export class DecodeError extends ConverterError {
  readonly entryName: string;

  constructor(entryName: string, options?: ErrorOptions) {
    super("DECODE_ERROR", `Entry '${entryName}' is not valid UTF-8`, options);
    this.entryName = entryName;
  }
}

/**
 * JSON or literal text could not be parsed
 */
export class ParseError extends ConverterError {
  /** Character offset of the failure, when known */
  readonly position: number | null;

  constructor(message: string, position: number | null = null, options?: ErrorOptions) {
    super("PARSE_ERROR", message, options);
    this.position = position;
  }
}

export class MarkerNotFoundError extends ConverterError {
  readonly marker: string;

  constructor(marker: string) {
    super("MARKER_NOT_FOUND", `Marker '${marker}' not found in generated source`);
    this.marker = marker;
  }
}

/**
 * The archive itself could not be opened or written
 */
export class ArchiveError extends ConverterError {
  constructor(message: string, options?: ErrorOptions) {
    super("ARCHIVE_ERROR", message, options);
  }
}

/**
 * A tool path argument resolves outside the project directory
 */
export class PathOutsideProjectError extends ConverterError {
  constructor(filePath: string) {
    super("INVALID_PATH", `Path '${filePath}' must be within the project directory`);
  }
}

/**
 * The reverse working directory would overwrite or swallow existing files
 */
export class OutputConflictError extends ConverterError {
  readonly outputRoot: string;

  constructor(outputRoot: string, message: string) {
    super("OUTPUT_CONFLICT", message);
    this.outputRoot = outputRoot;
  }
}

/**
 * Render any thrown value as a `{ code, message }` pair for tool output
 */
export function describeError(error: unknown): { code: string; message: string } {
  if (error instanceof ConverterError) {
    return { code: error.code, message: error.message };
  }
  if (error instanceof Error) {
    return { code: "IO_ERROR", message: error.message };
  }
  return { code: "UNKNOWN_ERROR", message: String(error) };
}
