/**
 * Shared helpers for the converter MCP tools
 */

import { isAbsolute, join } from "path";
import { TRANSLATIONS_DIR } from "../config/env.js";
import { describeError, PathOutsideProjectError } from "../errors.js";
import { getSafeFilePath } from "../utils/validation.js";

export interface ToolErrorOutput {
  success: false;
  error: {
    code: string;
    message: string;
  };
}

export type ToolResponse = {
  content: Array<{ type: "text"; text: string }>;
};

/**
 * Wrap a tool output as MCP text content
 */
export function toToolResponse(output: unknown): ToolResponse {
  return {
    content: [{ type: "text", text: JSON.stringify(output, null, 2) }],
  };
}

/**
 * Build the error output for any thrown value
 */
export function errorOutput(error: unknown): ToolErrorOutput {
  return { success: false, error: describeError(error) };
}

/**
 * Resolve a tool path argument against the project root
 * @throws PathOutsideProjectError if the path escapes the project
 */
export function resolveToolPath(projectPath: string, filePath: string): string {
  const safe = getSafeFilePath(filePath, projectPath);
  if (safe === null) {
    throw new PathOutsideProjectError(filePath);
  }
  return safe;
}

/**
 * Resolve a tool path argument, falling back to a configured default
 *
 * Relative defaults are relative to the translations directory the scripts
 * run in. An absolute default comes from the operator's environment and is
 * used as is.
 * @throws PathOutsideProjectError if the argument or a relative default escapes the project
 */
export function resolveToolArgument(
  projectPath: string,
  argument: string | undefined,
  configured: string
): string {
  if (argument) {
    return resolveToolPath(projectPath, argument);
  }
  if (isAbsolute(configured)) {
    return configured;
  }
  return resolveToolPath(projectPath, join(TRANSLATIONS_DIR, configured));
}
