import * as lancedb from "@lancedb/lancedb";
import { mkdtemp, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import type { Chunk } from "./chunkers/index.js";
import { AskDocError } from "./errors.js";
import { logger } from "./utils/logger.js";

export interface EmbeddedChunk extends Chunk {
  vector: number[];
}

export interface ScoredChunk extends Chunk {
  /** Distance reported by the index; smaller is closer. */
  distance: number;
}

export interface VectorStore {
  /** Vector length fixed by the first `add`, 0 before that. */
  readonly dimensions: number;
  add(records: EmbeddedChunk[]): Promise<void>;
  search(vector: number[], k: number): Promise<ScoredChunk[]>;
  count(): Promise<number>;
  close(): Promise<void>;
}

export function assertDimensions(expected: number, vector: number[], what: string): void {
  if (vector.length === 0 || vector.length !== expected) {
    throw new AskDocError(
      `Embedding dimension mismatch: the index holds ${expected}-dimensional vectors, ` +
        `but the ${what} has ${vector.length} dimensions. ` +
        `Use the same embedding model for indexing and querying.`,
      "UPSTREAM_SERVICE"
    );
  }
}

const TABLE_NAME = "chunks";

/**
 * Similarity index backed by an embedded LanceDB database. Without a
 * directory the database lives in a fresh temporary directory that
 * `close()` removes, so the index lasts only as long as the process uses it.
 */
export class LanceVectorStore implements VectorStore {
  private db: lancedb.Connection;
  private table: lancedb.Table | null = null;
  private directory: string;
  private temporary: boolean;
  private dims = 0;

  private constructor(db: lancedb.Connection, directory: string, temporary: boolean) {
    this.db = db;
    this.directory = directory;
    this.temporary = temporary;
  }

  static async create(directory?: string): Promise<LanceVectorStore> {
    const temporary = directory === undefined;
    const path = directory ?? (await mkdtemp(join(tmpdir(), "askdoc-")));
    const db = await lancedb.connect(path);
    logger.debug(`Opened similarity index at ${path}`);
    return new LanceVectorStore(db, path, temporary);
  }

  get dimensions(): number {
    return this.dims;
  }

  get location(): string {
    return this.directory;
  }

  async add(records: EmbeddedChunk[]): Promise<void> {
    if (records.length === 0) {
      return;
    }

    const expected = this.dims || records[0].vector.length;
    for (const record of records) {
      assertDimensions(expected, record.vector, `vector for chunk ${record.index}`);
    }

    const rows = records.map((record) => ({
      text: record.text,
      source: record.source,
      index: record.index,
      startChar: record.startChar,
      endChar: record.endChar,
      startLine: record.startLine,
      endLine: record.endLine,
      vector: record.vector,
    }));

    if (!this.table) {
      this.table = await this.db.createTable(TABLE_NAME, rows, { mode: "overwrite" });
      logger.debug(`Created table ${TABLE_NAME} with ${rows.length} rows`);
    } else {
      await this.table.add(rows);
      logger.debug(`Added ${rows.length} rows to ${TABLE_NAME}`);
    }
    this.dims = expected;
  }

  async search(vector: number[], k: number): Promise<ScoredChunk[]> {
    if (!this.table) {
      throw new AskDocError("The similarity index is empty. Index a document first.", "NOT_INITIALIZED");
    }
    assertDimensions(this.dims, vector, "query vector");

    const results: Array<Record<string, unknown>> = await this.table
      .vectorSearch(vector)
      .distanceType("cosine")
      .limit(k)
      .toArray();

    return results.map((row) => ({
      text: String(row.text ?? ""),
      source: String(row.source ?? ""),
      index: Number(row.index ?? 0),
      startChar: Number(row.startChar ?? 0),
      endChar: Number(row.endChar ?? 0),
      startLine: Number(row.startLine ?? 0),
      endLine: Number(row.endLine ?? 0),
      distance: Number(row._distance ?? 0),
    }));
  }

  async count(): Promise<number> {
    return this.table ? this.table.countRows() : 0;
  }

  async close(): Promise<void> {
    if (this.table) {
      this.table.close();
      this.table = null;
    }
    this.db.close();
    if (this.temporary) {
      await rm(this.directory, { recursive: true, force: true });
      logger.debug(`Removed similarity index at ${this.directory}`);
    }
  }
}
