import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { join } from "path";
import {
  decodeUtf8,
  localeFromEntryName,
  readLocaleArchive,
  readLocaleArchiveFromBuffer,
} from "./reader.js";
import { ArchiveError, DecodeError, ParseError } from "../errors.js";
import { createTempTestDir, type TempTestDir } from "../../tests/helpers/temp-directory.js";
import { buildArchive, writeArchiveFixture } from "../../tests/helpers/fixture-loader.js";

describe("Archive Reader", () => {
  describe("localeFromEntryName", () => {
    it("should return the first path segment", () => {
      expect(localeFromEntryName("es-ES/saturn.json")).toBe("es-ES");
      expect(localeFromEntryName("pt-BR/app/saturn.json")).toBe("pt-BR");
    });

    it("should return the whole name when there is no directory", () => {
      expect(localeFromEntryName("saturn.json")).toBe("saturn.json");
    });
  });

  describe("decodeUtf8", () => {
    it("should decode valid UTF-8", () => {
      expect(decodeUtf8(new TextEncoder().encode("Grüße"), "de/saturn.json")).toBe("Grüße");
    });

    it("should throw DecodeError for invalid bytes", () => {
      expect(() => decodeUtf8(new Uint8Array([0xff, 0xfe, 0x41]), "de/saturn.json")).toThrow(
        "Entry 'de/saturn.json' is not valid UTF-8"
      );
    });
  });

  describe("readLocaleArchiveFromBuffer", () => {
    it("should read matching entries sorted by name", async () => {
      const data = await buildArchive({
        "fr/saturn.json": '{"hello": "Bonjour"}',
        "README.txt": "not a locale",
        "de/saturn.json": '{"hello": "Hallo"}',
        "de/other.json": '{"ignored": true}',
      });

      const entries = await readLocaleArchiveFromBuffer(data);

      expect(entries).toEqual([
        { entryName: "de/saturn.json", vendorLocale: "de", bundle: { hello: "Hallo" } },
        { entryName: "fr/saturn.json", vendorLocale: "fr", bundle: { hello: "Bonjour" } },
      ]);
    });

    it("should take the locale from nested paths", async () => {
      const data = await buildArchive({
        "pt-BR/mobile/saturn.json": '{"hello": "Olá"}',
      });

      const entries = await readLocaleArchiveFromBuffer(data);

      expect(entries.map((e) => e.vendorLocale)).toEqual(["pt-BR"]);
      expect(entries[0].bundle).toEqual({ hello: "Olá" });
    });

    it("should preserve key order within a bundle", async () => {
      const data = await buildArchive({
        "de/saturn.json": '{"zeta": "z", "alpha": "a", "mid": "m"}',
      });

      const [entry] = await readLocaleArchiveFromBuffer(data);

      expect(Object.keys(entry.bundle)).toEqual(["zeta", "alpha", "mid"]);
    });

    it("should honor a custom marker filename", async () => {
      const data = await buildArchive({
        "de/saturn.json": '{"a": "1"}',
        "de/app.json": '{"b": "2"}',
      });

      const entries = await readLocaleArchiveFromBuffer(data, { markerFilename: "app.json" });

      expect(entries.map((e) => e.entryName)).toEqual(["de/app.json"]);
    });

    it("should throw DecodeError for non UTF-8 entries", async () => {
      const data = await buildArchive({
        "de/saturn.json": new Uint8Array([0x7b, 0xff, 0x7d]),
      });

      await expect(readLocaleArchiveFromBuffer(data)).rejects.toThrow(DecodeError);
    });

    it("should throw ParseError for invalid JSON", async () => {
      const data = await buildArchive({ "de/saturn.json": "{not json" });

      await expect(readLocaleArchiveFromBuffer(data)).rejects.toThrow(ParseError);
    });

    it("should throw ParseError when the root is not an object", async () => {
      const data = await buildArchive({ "de/saturn.json": '["Hallo"]' });

      await expect(readLocaleArchiveFromBuffer(data)).rejects.toThrow(
        "Expected a JSON object at the root of 'de/saturn.json'"
      );
    });

    it("should throw ArchiveError for data that is not a zip", async () => {
      const data = new TextEncoder().encode("not a zip file");

      await expect(readLocaleArchiveFromBuffer(data)).rejects.toThrow(ArchiveError);
    });
  });

  describe("readLocaleArchive", () => {
    let tempDir: TempTestDir;

    beforeEach(async () => {
      tempDir = await createTempTestDir();
    });

    afterEach(async () => {
      await tempDir.cleanup();
    });

    it("should read an archive from disk", async () => {
      await writeArchiveFixture(tempDir.path, "translations.zip", {
        "de/saturn.json": '{"hello": "Hallo"}',
      });

      const entries = await readLocaleArchive(join(tempDir.path, "translations.zip"));

      expect(entries).toHaveLength(1);
      expect(entries[0].vendorLocale).toBe("de");
    });

    it("should propagate a missing file", async () => {
      await expect(
        readLocaleArchive(join(tempDir.path, "missing.zip"))
      ).rejects.toThrow(/ENOENT/);
    });
  });
});
