import { AskDocError } from "../errors.js";

export interface Chunk {
  text: string;
  source: string;
  /** Zero-based position in the document's chunk sequence. */
  index: number;
  startChar: number;
  endChar: number;
  /** 1-based, inclusive. */
  startLine: number;
  endLine: number;
}

export interface ChunkerOptions {
  chunkSize: number;
  chunkOverlap: number;
}

export interface Chunker {
  readonly name: string;
  chunk(text: string, source: string, options: ChunkerOptions): Chunk[];
}

export function validateChunkerOptions(options: ChunkerOptions): void {
  const { chunkSize, chunkOverlap } = options;
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new AskDocError(
      `chunk-size must be a positive integer (got ${chunkSize})`,
      "INVALID_CHUNK_PARAMETERS"
    );
  }
  if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0) {
    throw new AskDocError(
      `chunk-overlap must be a non-negative integer (got ${chunkOverlap})`,
      "INVALID_CHUNK_PARAMETERS"
    );
  }
  if (chunkOverlap >= chunkSize) {
    throw new AskDocError(
      `chunk-overlap (${chunkOverlap}) must be less than chunk-size (${chunkSize})`,
      "INVALID_CHUNK_PARAMETERS"
    );
  }
}

/** True when `pos` falls between the two code units of a surrogate pair. */
export function splitsSurrogatePair(text: string, pos: number): boolean {
  if (pos <= 0 || pos >= text.length) {
    return false;
  }
  const high = text.charCodeAt(pos - 1);
  const low = text.charCodeAt(pos);
  return high >= 0xd800 && high <= 0xdbff && low >= 0xdc00 && low <= 0xdfff;
}

/**
 * Moves a cut out of a surrogate pair: back by one, or forward when the chunk
 * would otherwise be empty.
 */
export function alignEnd(text: string, startChar: number, endChar: number): number {
  if (!splitsSurrogatePair(text, endChar)) {
    return endChar;
  }
  return endChar - 1 > startChar ? endChar - 1 : endChar + 1;
}

/**
 * Start of the chunk that follows `[prevStart, endChar)`: `chunkOverlap`
 * characters before the cut, moved forward out of a surrogate pair and always
 * past `prevStart`.
 */
export function nextStart(text: string, prevStart: number, endChar: number, chunkOverlap: number): number {
  let startChar = endChar - chunkOverlap;
  if (startChar <= prevStart) {
    startChar = prevStart + 1;
  }
  if (splitsSurrogatePair(text, startChar)) {
    startChar += 1;
  }
  return startChar;
}

/** Returns a function mapping a character offset to its 0-based line. */
export function createLineLocator(text: string): (charPos: number) => number {
  const lineStarts: number[] = [0];
  for (let i = 0; i < text.length; i++) {
    if (text.charCodeAt(i) === 10) {
      lineStarts.push(i + 1);
    }
  }

  return (charPos: number): number => {
    let left = 0;
    let right = lineStarts.length - 1;
    while (left < right) {
      const mid = Math.ceil((left + right) / 2);
      if (lineStarts[mid] <= charPos) {
        left = mid;
      } else {
        right = mid - 1;
      }
    }
    return left;
  };
}

export function buildChunks(
  text: string,
  source: string,
  spans: Array<[start: number, end: number]>
): Chunk[] {
  const lineOf = createLineLocator(text);
  return spans.map(([startChar, endChar], index) => ({
    text: text.slice(startChar, endChar),
    source,
    index,
    startChar,
    endChar,
    startLine: lineOf(startChar) + 1,
    endLine: lineOf(Math.max(startChar, endChar - 1)) + 1,
  }));
}
