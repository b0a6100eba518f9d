import { AskDocError } from "../errors.js";
import type { Chunker } from "./base.js";
import { FixedChunker } from "./fixed.js";
import { RecursiveChunker } from "./recursive.js";

export const CHUNKER_TYPES = ["recursive", "fixed"] as const;

export type ChunkerType = (typeof CHUNKER_TYPES)[number];

export function isChunkerType(value: string): value is ChunkerType {
  return CHUNKER_TYPES.some((type) => type === value);
}

export function createChunker(type: string = "recursive"): Chunker {
  switch (type) {
    case "recursive":
      return new RecursiveChunker();
    case "fixed":
      return new FixedChunker();
    default:
      throw new AskDocError(
        `Unknown chunker type: ${type}. Supported types: ${CHUNKER_TYPES.join(", ")}`,
        "INVALID_CONFIG"
      );
  }
}

export {
  buildChunks,
  validateChunkerOptions,
  type Chunk,
  type Chunker,
  type ChunkerOptions,
} from "./base.js";
export { FixedChunker } from "./fixed.js";
export { RecursiveChunker } from "./recursive.js";
