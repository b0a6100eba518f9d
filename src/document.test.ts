import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ensureFile, loadDocument } from "./document.js";

describe("loadDocument", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "askdoc-document-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reads UTF-8 text with its source path", async () => {
    const filePath = join(dir, "notes.txt");
    await writeFile(filePath, "Grüße aus Köln\nzweite Zeile", "utf-8");

    const document = await loadDocument(filePath);
    expect(document).toEqual({ source: filePath, text: "Grüße aus Köln\nzweite Zeile" });
    expect(Object.isFrozen(document)).toBe(true);
  });

  it("drops a leading byte order mark", async () => {
    const filePath = join(dir, "bom.txt");
    await writeFile(filePath, Buffer.concat([Buffer.from([0xef, 0xbb, 0xbf]), Buffer.from("hello")]));

    expect((await loadDocument(filePath)).text).toBe("hello");
  });

  it("reads an empty file as empty text", async () => {
    const filePath = join(dir, "empty.txt");
    await writeFile(filePath, "");

    expect((await loadDocument(filePath)).text).toBe("");
  });

  it("fails with FILE_NOT_FOUND for a missing path", async () => {
    const filePath = join(dir, "missing.txt");
    await expect(loadDocument(filePath)).rejects.toMatchObject({
      code: "FILE_NOT_FOUND",
      message: `File not found: ${filePath}`,
    });
  });

  it("fails with FILE_NOT_FOUND for a directory", async () => {
    await expect(ensureFile(dir)).rejects.toMatchObject({
      code: "FILE_NOT_FOUND",
      message: `File not found: ${dir} is not a regular file`,
    });
  });

  it("fails with INVALID_ENCODING for bytes that are not UTF-8", async () => {
    const filePath = join(dir, "latin1.txt");
    await writeFile(filePath, Buffer.from([0x63, 0x61, 0x66, 0xe9, 0x21]));

    await expect(loadDocument(filePath)).rejects.toMatchObject({
      code: "INVALID_ENCODING",
      message: `Could not decode ${filePath} as UTF-8. Convert the file to UTF-8 and try again.`,
    });
  });
});
