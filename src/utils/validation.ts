/**
 * Validation utilities for input sanitization
 */

import { z } from "zod";
import { resolve, relative, isAbsolute, sep } from "path";

/**
 * Zod schema for the quote style of generated Dart
 */
export const quoteStyleSchema = z.enum(["single", "double"]);

/**
 * Zod schema for the unmapped vendor locale policy
 */
export const unmappedLocalePolicySchema = z.enum(["error", "skip"]);

/**
 * Validate that a path is within the project directory
 * Prevents path traversal attacks
 */
export function isPathWithinProject(
  filePath: string,
  projectPath: string
): boolean {
  const resolvedProject = resolve(projectPath);
  const resolvedFile = resolve(projectPath, filePath);
  const rel = relative(resolvedProject, resolvedFile);

  return rel !== ".." && !rel.startsWith(`..${sep}`) && !isAbsolute(rel);
}

/**
 * Get a safe file path within the project directory
 * Returns null if path would escape project directory
 */
export function getSafeFilePath(
  relativePath: string,
  projectPath: string
): string | null {
  if (!isPathWithinProject(relativePath, projectPath)) {
    return null;
  }
  return resolve(projectPath, relativePath);
}

/**
 * Check that a locale can be used as a single directory name
 */
export function isSafeLocaleDirectory(locale: string): boolean {
  return (
    locale.length > 0 &&
    locale !== "." &&
    locale !== ".." &&
    !/[\\/\0]/.test(locale)
  );
}
