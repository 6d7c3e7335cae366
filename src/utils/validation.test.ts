import { describe, it, expect } from "vitest";
import { resolve } from "path";
import {
  isPathWithinProject,
  getSafeFilePath,
  isSafeLocaleDirectory,
  quoteStyleSchema,
} from "./validation.js";

describe("Validation", () => {
  describe("isPathWithinProject", () => {
    it("should accept paths inside the project", () => {
      expect(isPathWithinProject("translations/translations.zip", "/project")).toBe(true);
      expect(isPathWithinProject("translations/../lib/languages/crowdin.dart", "/project")).toBe(true);
      expect(isPathWithinProject("/project/lib", "/project")).toBe(true);
    });

    it("should reject paths escaping the project", () => {
      expect(isPathWithinProject("../outside.zip", "/project")).toBe(false);
      expect(isPathWithinProject("/etc/passwd", "/project")).toBe(false);
    });

    it("should reject sibling directories sharing a prefix", () => {
      expect(isPathWithinProject("/project-evil/x", "/project")).toBe(false);
    });
  });

  describe("getSafeFilePath", () => {
    it("should resolve safe paths", () => {
      expect(getSafeFilePath("saturn.zip", "/project")).toBe(
        resolve("/project", "saturn.zip")
      );
    });

    it("should return null for unsafe paths", () => {
      expect(getSafeFilePath("../saturn.zip", "/project")).toBeNull();
    });
  });

  describe("isSafeLocaleDirectory", () => {
    it("should accept locale codes", () => {
      expect(isSafeLocaleDirectory("de-de")).toBe(true);
      expect(isSafeLocaleDirectory("zh-cn")).toBe(true);
    });

    it("should reject empty, dot and nested names", () => {
      expect(isSafeLocaleDirectory("")).toBe(false);
      expect(isSafeLocaleDirectory(".")).toBe(false);
      expect(isSafeLocaleDirectory("..")).toBe(false);
      expect(isSafeLocaleDirectory("de/de")).toBe(false);
      expect(isSafeLocaleDirectory("de\\de")).toBe(false);
    });
  });

  describe("quoteStyleSchema", () => {
    it("should accept the two quote styles", () => {
      expect(quoteStyleSchema.parse("single")).toBe("single");
      expect(quoteStyleSchema.safeParse("backtick").success).toBe(false);
    });
  });
});
