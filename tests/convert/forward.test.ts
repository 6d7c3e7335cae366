/**
 * Tests for converting a Crowdin archive into the Dart catalog
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { join } from "path";
import { createTempTestDir, type TempTestDir } from "../helpers/temp-directory.js";
import {
  fileExists,
  readRawFixture,
  writeArchiveFixture,
} from "../helpers/fixture-loader.js";
import { convertArchiveToSource } from "../../src/converters/forward.js";
import { MissingMappingError } from "../../src/errors.js";

describe("Crowdin Archive → Dart", () => {
  let tempDir: TempTestDir;
  let archivePath: string;
  let outputPath: string;

  beforeEach(async () => {
    tempDir = await createTempTestDir();
    archivePath = join(tempDir.path, "translations/translations.zip");
    outputPath = join(tempDir.path, "lib/languages/crowdin.dart");
  });

  afterEach(async () => {
    await tempDir.cleanup();
  });

  it("should generate the aggregate catalog as JSON", async () => {
    await writeArchiveFixture(tempDir.path, "translations/translations.zip", {
      "fr/saturn.json": '{"hello": "Bonjour"}',
      "de/saturn.json": '{"hello": "Hallo"}',
    });

    const result = await convertArchiveToSource({
      archivePath,
      outputPath,
      quoteStyle: "double",
    });

    expect(result.locales).toEqual(["de-de", "fr-fr"]);
    expect(result.written).toBe(true);
    expect(await readRawFixture(tempDir.path, "lib/languages/crowdin.dart")).toBe(
      'const crowdin = {\n  "de-de": {\n    "hello": "Hallo"\n  },\n  "fr-fr": {\n    "hello": "Bonjour"\n  }\n};'
    );
  });

  it("should generate single-quoted Dart by default", async () => {
    await writeArchiveFixture(tempDir.path, "translations/translations.zip", {
      "de/saturn.json": '{"hello": "Hallo", "price": "$5", "dont": "Don\'t"}',
    });

    await convertArchiveToSource({ archivePath, outputPath });

    expect(await readRawFixture(tempDir.path, "lib/languages/crowdin.dart")).toBe(
      "const crowdin = {\n  'de-de': {\n    'hello': 'Hallo',\n    'price': '\\$5',\n    'dont': \"Don't\"\n  }\n};"
    );
  });

  it("should produce identical output regardless of archive order", async () => {
    const de = '{"hello": "Hallo"}';
    const fr = '{"hello": "Bonjour"}';
    const pt = '{"hello": "Olá"}';
    await writeArchiveFixture(tempDir.path, "a.zip", {
      "de/saturn.json": de,
      "fr/saturn.json": fr,
      "pt-BR/saturn.json": pt,
    });
    await writeArchiveFixture(tempDir.path, "b.zip", {
      "pt-BR/saturn.json": pt,
      "fr/saturn.json": fr,
      "de/saturn.json": de,
    });

    const first = await convertArchiveToSource({
      archivePath: join(tempDir.path, "a.zip"),
      outputPath: join(tempDir.path, "a.dart"),
    });
    const second = await convertArchiveToSource({
      archivePath: join(tempDir.path, "b.zip"),
      outputPath: join(tempDir.path, "b.dart"),
    });

    expect(second.source).toBe(first.source);
    expect(await readRawFixture(tempDir.path, "b.dart")).toBe(
      await readRawFixture(tempDir.path, "a.dart")
    );
  });

  it("should include each mapped locale exactly once and skip the rest", async () => {
    await writeArchiveFixture(tempDir.path, "translations/translations.zip", {
      "xx/saturn.json": '{"hello": "?"}',
      "pt-BR/saturn.json": '{"hello": "Olá"}',
      "de/saturn.json": '{"hello": "Hallo"}',
      "fr/saturn.json": '{"hello": "Bonjour"}',
    });

    const result = await convertArchiveToSource({
      archivePath,
      outputPath,
      unmappedLocales: "skip",
    });

    expect(result.locales).toEqual(["de-de", "fr-fr", "pt-br"]);
    expect(result.skipped).toEqual(["xx"]);
    expect(result.keyCount).toBe(3);
  });

  it("should fail on unmapped locales without writing output", async () => {
    await writeArchiveFixture(tempDir.path, "translations/translations.zip", {
      "de/saturn.json": '{"hello": "Hallo"}',
      "xx/saturn.json": '{"hello": "?"}',
    });

    await expect(convertArchiveToSource({ archivePath, outputPath })).rejects.toThrow(
      MissingMappingError
    );
    expect(await fileExists(tempDir.path, "lib/languages/crowdin.dart")).toBe(false);
  });

  it("should not write in dry-run mode", async () => {
    await writeArchiveFixture(tempDir.path, "translations/translations.zip", {
      "de/saturn.json": '{"hello": "Hallo"}',
    });

    const result = await convertArchiveToSource({ archivePath, outputPath, dryRun: true });

    expect(result.written).toBe(false);
    expect(result.source).toBe("const crowdin = {\n  'de-de': {\n    'hello': 'Hallo'\n  }\n};");
    expect(result.bytes).toBe(Buffer.byteLength(result.source, "utf-8"));
    expect(await fileExists(tempDir.path, "lib/languages/crowdin.dart")).toBe(false);
  });
});
