export type AskDocErrorCode =
  | "FILE_NOT_FOUND"
  | "INVALID_ENCODING"
  | "MISSING_CREDENTIAL"
  | "INVALID_CHUNK_PARAMETERS"
  | "INVALID_CONFIG"
  | "EMPTY_DOCUMENT"
  | "INVALID_QUESTION"
  | "NOT_INITIALIZED"
  | "UPSTREAM_SERVICE";

export class AskDocError extends Error {
  readonly code: AskDocErrorCode;

  constructor(message: string, code: AskDocErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AskDocError";
    this.code = code;
  }
}

export function isAskDocError(value: unknown, code?: AskDocErrorCode): value is AskDocError {
  return value instanceof AskDocError && (code === undefined || value.code === code);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export type UpstreamStage = "embedding" | "index" | "chat";

const STAGE_GUIDANCE: Record<UpstreamStage, string> = {
  embedding: "Check your API key, network connection and rate limits, and that the embedding model exists.",
  index: "The similarity index could not be used; re-run to rebuild it.",
  chat: "Check your API key, network connection and rate limits, and that the chat model exists.",
};

/**
 * Runs a call into an external collaborator and rethrows any failure as an
 * UPSTREAM_SERVICE error. The upstream message is kept verbatim.
 */
export async function withUpstream<T>(stage: UpstreamStage, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (error instanceof AskDocError) {
      throw error;
    }
    throw new AskDocError(
      `The ${stage} service failed: ${errorMessage(error)}. ${STAGE_GUIDANCE[stage]}`,
      "UPSTREAM_SERVICE",
      { cause: error }
    );
  }
}
