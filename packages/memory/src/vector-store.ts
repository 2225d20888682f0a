/**
 * @tubeqa/memory - Vector storage backed by SQLite
 *
 * Stores chunk embeddings alongside their text and metadata in a
 * better-sqlite3 database and searches them with cosine similarity, either
 * plainly ranked or diversified with maximal marginal relevance.
 *
 * The database lives in memory; each transcript gets a fresh store and
 * closing it discards everything.
 */

import { randomUUID } from 'node:crypto';
import Database from 'better-sqlite3';
import pino from 'pino';

const defaultLogger = pino({ name: 'tubeqa:memory:vector-store' });

// ---------------------------------------------------------------------------
// Cosine similarity (pure JS)
// ---------------------------------------------------------------------------

/**
 * Compute cosine similarity between two vectors.
 * Returns a value in [-1, 1]. Higher = more similar.
 *
 * cosine_sim(a, b) = dot(a, b) / (||a|| * ||b||)
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vector dimension mismatch: ${a.length} vs ${b.length}`);
  }

  let dot = 0;
  let magA = 0;
  let magB = 0;

  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    magA += a[i] * a[i];
    magB += b[i] * b[i];
  }

  const denom = Math.sqrt(magA) * Math.sqrt(magB);
  if (denom === 0) return 0;
  return dot / denom;
}

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface VectorEntry {
  content: string;
  embedding: number[];
  metadata?: Record<string, unknown>;
}

export interface SearchResult {
  id: string;
  content: string;
  /** Cosine similarity to the query. */
  score: number;
  metadata: Record<string, unknown>;
}

export interface MmrOptions {
  /** Results to return (default 4). */
  k?: number;
  /** Candidates considered before diversification (default 20). */
  fetchK?: number;
  /** 1 = pure relevance, 0 = pure diversity (default 0.5). */
  lambda?: number;
}

export interface VectorStoreOptions {
  logger?: pino.Logger;
}

interface VectorRow {
  id: string;
  content: string;
  embedding: Buffer;
  metadata: string;
}

interface Candidate extends SearchResult {
  embedding: number[];
}

// ---------------------------------------------------------------------------
// Embedding serialization
// ---------------------------------------------------------------------------

/** Serialize a number[] to a Buffer (Float32 LE) for BLOB storage */
function embeddingToBlob(embedding: number[]): Buffer {
  const buf = Buffer.alloc(embedding.length * 4);
  for (let i = 0; i < embedding.length; i++) {
    buf.writeFloatLE(embedding[i], i * 4);
  }
  return buf;
}

/** Deserialize a Buffer (Float32 LE) back to number[] */
function blobToEmbedding(blob: Buffer): number[] {
  const count = blob.length / 4;
  const result = new Array<number>(count);
  for (let i = 0; i < count; i++) {
    result[i] = blob.readFloatLE(i * 4);
  }
  return result;
}

function parseMetadata(text: string): Record<string, unknown> {
  const parsed: unknown = JSON.parse(text);
  return typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)
    ? { ...parsed }
    : {};
}

// ---------------------------------------------------------------------------
// VectorStore
// ---------------------------------------------------------------------------

export class VectorStore {
  private readonly db: Database.Database;
  private readonly log: pino.Logger;
  private dimensions: number | null = null;

  constructor(options: VectorStoreOptions = {}) {
    this.log = options.logger ?? defaultLogger;

    this.db = new Database(':memory:');
    this.initSchema();
    this.log.debug('VectorStore initialized');
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS vectors (
        seq         INTEGER PRIMARY KEY AUTOINCREMENT,
        id          TEXT NOT NULL UNIQUE,
        content     TEXT NOT NULL,
        embedding   BLOB NOT NULL,
        metadata    TEXT NOT NULL DEFAULT '{}'
      );
    `);
  }

  private checkDimensions(embedding: number[]): void {
    if (embedding.length === 0) {
      throw new Error('Cannot store an empty embedding');
    }
    if (this.dimensions === null) {
      this.dimensions = embedding.length;
    } else if (embedding.length !== this.dimensions) {
      throw new Error(
        `Vector dimension mismatch: store holds ${this.dimensions}, got ${embedding.length}`,
      );
    }
  }

  /**
   * Store one entry.
   * @returns The generated ID.
   */
  store(content: string, embedding: number[], metadata: Record<string, unknown> = {}): string {
    this.checkDimensions(embedding);
    const id = randomUUID();

    this.db
      .prepare('INSERT INTO vectors (id, content, embedding, metadata) VALUES (?, ?, ?, ?)')
      .run(id, content, embeddingToBlob(embedding), JSON.stringify(metadata));

    this.log.debug({ id, contentLength: content.length }, 'Vector stored');
    return id;
  }

  /** Store several entries in one transaction, returning their IDs in order. */
  storeMany(entries: VectorEntry[]): string[] {
    const insert = this.db.transaction((batch: VectorEntry[]) =>
      batch.map((entry) => this.store(entry.content, entry.embedding, entry.metadata)),
    );
    return insert(entries);
  }

  private candidates(): Candidate[] {
    const rows = this.db
      .prepare<[], VectorRow>('SELECT id, content, embedding, metadata FROM vectors ORDER BY seq')
      .all();

    return rows.map((row) => ({
      id: row.id,
      content: row.content,
      score: 0,
      metadata: parseMetadata(row.metadata),
      embedding: blobToEmbedding(row.embedding),
    }));
  }

  private scored(queryEmbedding: number[]): Candidate[] {
    const scored = this.candidates().map((c) => ({
      ...c,
      score: cosineSimilarity(queryEmbedding, c.embedding),
    }));
    // Stable sort keeps insertion order among ties
    scored.sort((a, b) => b.score - a.score);
    return scored;
  }

  /** Top `limit` entries by cosine similarity. */
  search(queryEmbedding: number[], limit: number = 4): SearchResult[] {
    return this.scored(queryEmbedding)
      .slice(0, limit)
      .map(({ embedding: _embedding, ...result }) => result);
  }

  /**
   * Maximal marginal relevance search.
   *
   * Takes the `fetchK` most similar entries, then greedily picks `k` of them,
   * each maximising `lambda * sim(query, d) - (1 - lambda) * max sim(d, picked)`.
   */
  searchMmr(queryEmbedding: number[], options: MmrOptions = {}): SearchResult[] {
    const k = options.k ?? 4;
    const fetchK = Math.max(options.fetchK ?? 20, k);
    const lambda = options.lambda ?? 0.5;

    const pool = this.scored(queryEmbedding).slice(0, fetchK);
    const picked: Candidate[] = [];

    while (picked.length < k && pool.length > 0) {
      let bestIndex = 0;
      let bestScore = -Infinity;

      for (const [i, candidate] of pool.entries()) {
        let redundancy = 0;
        if (picked.length > 0) {
          redundancy = Math.max(
            ...picked.map((p) => cosineSimilarity(candidate.embedding, p.embedding)),
          );
        }
        const mmr = lambda * candidate.score - (1 - lambda) * redundancy;
        if (mmr > bestScore) {
          bestScore = mmr;
          bestIndex = i;
        }
      }

      picked.push(...pool.splice(bestIndex, 1));
    }

    this.log.debug({ k, fetchK, lambda, returned: picked.length }, 'MMR search');
    return picked.map(({ embedding: _embedding, ...result }) => result);
  }

  /** Number of stored entries. */
  count(): number {
    const row = this.db.prepare<[], { cnt: number }>('SELECT COUNT(*) AS cnt FROM vectors').get();
    return row?.cnt ?? 0;
  }

  /** Close the database. The store is unusable afterwards. */
  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
