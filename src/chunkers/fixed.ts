import { alignEnd, buildChunks, nextStart, validateChunkerOptions, type Chunk, type Chunker, type ChunkerOptions } from "./base.js";

/**
 * Cuts the text every `chunkSize` characters, stepping back `chunkOverlap`
 * characters for the next chunk. Start offsets advance by exactly
 * `chunkSize - chunkOverlap`, give or take one code unit where a cut would
 * split a surrogate pair.
 */
export class FixedChunker implements Chunker {
  readonly name = "fixed";

  chunk(text: string, source: string, options: ChunkerOptions): Chunk[] {
    validateChunkerOptions(options);
    if (text.length === 0) {
      return [];
    }

    const { chunkSize, chunkOverlap } = options;
    const spans: Array<[number, number]> = [];
    let startChar = 0;

    while (true) {
      const endChar = alignEnd(text, startChar, Math.min(startChar + chunkSize, text.length));
      spans.push([startChar, endChar]);
      if (endChar >= text.length) {
        break;
      }
      startChar = nextStart(text, startChar, endChar, chunkOverlap);
    }

    return buildChunks(text, source, spans);
  }
}
