import { Listr } from "listr2";
import {
  createChunker,
  validateChunkerOptions,
  type Chunk,
  type Chunker,
  type ChunkerOptions,
  type ChunkerType,
} from "./chunkers/index.js";
import { loadDocument, type Document } from "./document.js";
import type { EmbeddingProvider } from "./embeddings/base.js";
import { AskDocError, withUpstream } from "./errors.js";
import type { ChatProvider } from "./llm/base.js";
import { buildQAMessages } from "./prompt.js";
import type { EmbeddedChunk, ScoredChunk, VectorStore } from "./store.js";
import { logger } from "./utils/logger.js";

export interface PipelineDependencies {
  embeddings: EmbeddingProvider;
  chat: ChatProvider;
  createStore: () => Promise<VectorStore>;
}

export interface PipelineOptions {
  chunker?: ChunkerType;
  topK?: number;
  /** Texts per embedding request. */
  batchSize?: number;
  /** Render the indexing steps as a task list. */
  showProgress?: boolean;
}

export interface QueryResult {
  question: string;
  answer: string;
  /** Context handed to the model, nearest first. */
  sources: ScoredChunk[];
}

export interface IndexSummary {
  source: string;
  characters: number;
  chunks: number;
  dimensions: number;
}

interface InitContext {
  document?: Document;
  chunks: Chunk[];
  embedded: EmbeddedChunk[];
  store?: VectorStore;
}

export const DEFAULT_CHUNKING: ChunkerOptions = { chunkSize: 1000, chunkOverlap: 200 };

export class RAGPipeline {
  private deps: PipelineDependencies;
  private chunker: Chunker;
  private topK: number;
  private batchSize: number;
  private showProgress: boolean;
  private store: VectorStore | null = null;

  constructor(deps: PipelineDependencies, options: PipelineOptions = {}) {
    this.deps = deps;
    this.chunker = createChunker(options.chunker ?? "recursive");
    this.topK = options.topK ?? 3;
    this.batchSize = options.batchSize ?? 64;
    this.showProgress = options.showProgress ?? true;
    if (!Number.isInteger(this.topK) || this.topK < 1) {
      throw new AskDocError(`top-k must be a positive integer (got ${this.topK})`, "INVALID_CONFIG");
    }
    if (!Number.isInteger(this.batchSize) || this.batchSize < 1) {
      throw new AskDocError(`batch size must be a positive integer (got ${this.batchSize})`, "INVALID_CONFIG");
    }
  }

  get initialized(): boolean {
    return this.store !== null;
  }

  /**
   * Loads the file, chunks it, embeds every chunk and builds a fresh
   * similarity index from the vectors. A previous index is released first.
   */
  async initializeFromFile(filePath: string, chunking: ChunkerOptions = DEFAULT_CHUNKING): Promise<IndexSummary> {
    validateChunkerOptions(chunking);
    await this.close();

    const tasks = new Listr<InitContext>(
      [
        {
          title: `Loading ${filePath}`,
          task: async (ctx) => {
            ctx.document = await loadDocument(filePath);
          },
        },
        {
          title: `Splitting into chunks (${this.chunker.name}, size ${chunking.chunkSize}, overlap ${chunking.chunkOverlap})`,
          task: (ctx, task) => {
            const document = requireDocument(ctx);
            ctx.chunks = this.chunker.chunk(document.text, document.source, chunking);
            if (ctx.chunks.length === 0) {
              throw new AskDocError(`${document.source} is empty; nothing to index.`, "EMPTY_DOCUMENT");
            }
            task.title = `Split into ${ctx.chunks.length} chunk${ctx.chunks.length !== 1 ? "s" : ""}`;
          },
        },
        {
          title: "Generating embeddings",
          task: async (ctx, task) => {
            const totalBatches = Math.ceil(ctx.chunks.length / this.batchSize);
            for (let start = 0, batchNum = 1; start < ctx.chunks.length; start += this.batchSize, batchNum++) {
              const batch = ctx.chunks.slice(start, start + this.batchSize);
              task.title = `Generating embeddings: batch ${batchNum}/${totalBatches}`;
              const vectors = await withUpstream("embedding", () =>
                this.deps.embeddings.embedBatch(batch.map((chunk) => chunk.text))
              );
              if (vectors.length !== batch.length) {
                throw new AskDocError(
                  `The embedding service returned ${vectors.length} vectors for ${batch.length} texts.`,
                  "UPSTREAM_SERVICE"
                );
              }
              batch.forEach((chunk, i) => ctx.embedded.push({ ...chunk, vector: vectors[i] }));
            }
            task.title = `Generated ${ctx.embedded.length} embeddings`;
          },
        },
        {
          title: "Building similarity index",
          task: async (ctx) => {
            const store = await withUpstream("index", () => this.deps.createStore());
            ctx.store = store;
            await withUpstream("index", () => store.add(ctx.embedded));
          },
        },
      ],
      { silentRendererCondition: !this.showProgress }
    );

    const ctx: InitContext = { chunks: [], embedded: [] };
    try {
      await tasks.run(ctx);
    } catch (error) {
      await ctx.store?.close();
      throw error;
    }

    const document = requireDocument(ctx);
    if (!ctx.store) {
      throw new AskDocError("The similarity index was not created.", "NOT_INITIALIZED");
    }
    this.store = ctx.store;

    const summary: IndexSummary = {
      source: document.source,
      characters: document.text.length,
      chunks: ctx.chunks.length,
      dimensions: this.store.dimensions,
    };
    logger.debug(
      `Indexed ${summary.chunks} chunks (${summary.characters} characters, ${summary.dimensions} dimensions) from ${summary.source}`
    );
    return summary;
  }

  async ask(question: string): Promise<QueryResult> {
    const store = this.store;
    if (!store) {
      throw new AskDocError("No document indexed. Call initializeFromFile first.", "NOT_INITIALIZED");
    }
    const trimmed = question.trim();
    if (!trimmed) {
      throw new AskDocError("Please enter a question.", "INVALID_QUESTION");
    }

    const vector = await withUpstream("embedding", () => this.deps.embeddings.embed(trimmed));
    const sources = await withUpstream("index", () => store.search(vector, this.topK));
    logger.debug(`Retrieved ${sources.length} chunks: ${sources.map((s) => s.index).join(", ")}`);

    const messages = buildQAMessages(
      sources.map((source) => source.text),
      trimmed
    );
    const answer = await withUpstream("chat", () => this.deps.chat.complete(messages));

    return { question, answer, sources };
  }

  async close(): Promise<void> {
    const store = this.store;
    this.store = null;
    await store?.close();
  }
}

function requireDocument(ctx: InitContext): Document {
  if (!ctx.document) {
    throw new AskDocError("No document loaded.", "NOT_INITIALIZED");
  }
  return ctx.document;
}
