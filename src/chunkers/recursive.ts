import { alignEnd, buildChunks, nextStart, validateChunkerOptions, type Chunk, type Chunker, type ChunkerOptions } from "./base.js";

// Tried in order; the empty separator is the hard cut.
const SEPARATORS = ["\n\n", "\n", " "];

/**
 * Whitespace-aware chunker. Each window of `chunkSize` characters is cut at
 * the last paragraph break, line break or space in its back half, the
 * separator staying with the earlier chunk. A cut is also only accepted past
 * `start + chunkOverlap` so that the next chunk, which begins `chunkOverlap`
 * characters before the cut, still moves forward. Without such a separator
 * the window is cut hard, never inside a surrogate pair.
 */
export class RecursiveChunker implements Chunker {
  readonly name = "recursive";

  chunk(text: string, source: string, options: ChunkerOptions): Chunk[] {
    validateChunkerOptions(options);
    if (text.length === 0) {
      return [];
    }

    const { chunkSize, chunkOverlap } = options;
    const spans: Array<[number, number]> = [];
    let startChar = 0;

    while (true) {
      let endChar = Math.min(startChar + chunkSize, text.length);
      if (endChar < text.length) {
        const floor = startChar + Math.max(chunkOverlap, Math.floor(chunkSize / 2));
        endChar = findBreak(text, floor, endChar) ?? alignEnd(text, startChar, endChar);
      }
      spans.push([startChar, endChar]);
      if (endChar >= text.length) {
        break;
      }
      startChar = nextStart(text, startChar, endChar, chunkOverlap);
    }

    return buildChunks(text, source, spans);
  }
}

function findBreak(text: string, floor: number, end: number): number | undefined {
  for (const separator of SEPARATORS) {
    const at = text.lastIndexOf(separator, end - separator.length);
    if (at < 0) {
      continue;
    }
    const cut = at + separator.length;
    // lastIndexOf clamps a negative start to 0, so the cut can land past the window.
    if (cut > floor && cut <= end) {
      return cut;
    }
  }
  return undefined;
}
