import { readFile, stat } from "fs/promises";
import { AskDocError } from "./errors.js";

export interface Document {
  readonly source: string;
  readonly text: string;
}

export async function ensureFile(filePath: string): Promise<void> {
  let isFile: boolean;
  try {
    isFile = (await stat(filePath)).isFile();
  } catch (error) {
    if (isErrnoException(error) && (error.code === "ENOENT" || error.code === "ENOTDIR")) {
      throw new AskDocError(`File not found: ${filePath}`, "FILE_NOT_FOUND", { cause: error });
    }
    throw error;
  }
  if (!isFile) {
    throw new AskDocError(`File not found: ${filePath} is not a regular file`, "FILE_NOT_FOUND");
  }
}

/**
 * Reads a text file as strict UTF-8. A leading byte order mark is dropped.
 */
export async function loadDocument(filePath: string): Promise<Document> {
  await ensureFile(filePath);
  const buffer = await readFile(filePath);

  let text: string;
  try {
    text = new TextDecoder("utf-8", { fatal: true, ignoreBOM: false }).decode(buffer);
  } catch (error) {
    throw new AskDocError(
      `Could not decode ${filePath} as UTF-8. Convert the file to UTF-8 and try again.`,
      "INVALID_ENCODING",
      { cause: error }
    );
  }

  return Object.freeze({ source: filePath, text });
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
