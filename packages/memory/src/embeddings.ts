/**
 * @tubeqa/memory - Embedding providers
 *
 * A unified interface over the embedding backends a transcript index can use.
 * All embeddings are normalized to unit vectors for consistent cosine similarity.
 */

import pino from 'pino';
import { Type } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { HttpError } from '@tubeqa/fallback';
import { parseModelId } from '@tubeqa/core';

const logger = pino({ name: 'tubeqa:memory:embeddings' });

/** Injected HTTP client, shaped like the global fetch. */
export type EmbeddingFetch = (input: string, init?: RequestInit) => Promise<Response>;

const defaultFetch: EmbeddingFetch = (input, init) => fetch(input, init);

// ---------------------------------------------------------------------------
// Normalization
// ---------------------------------------------------------------------------

/**
 * Normalize a vector to a unit vector (L2 norm = 1).
 * Returns the input unchanged if its magnitude is zero.
 */
export function normalizeEmbedding(vec: number[]): number[] {
  let mag = 0;
  for (let i = 0; i < vec.length; i++) {
    mag += vec[i] * vec[i];
  }
  mag = Math.sqrt(mag);
  if (mag === 0) return vec;
  const result = new Array<number>(vec.length);
  for (let i = 0; i < vec.length; i++) {
    result[i] = vec[i] / mag;
  }
  return result;
}

// ---------------------------------------------------------------------------
// EmbeddingProvider interface
// ---------------------------------------------------------------------------

export interface EmbeddingProvider {
  /** Human-readable provider name */
  readonly name: string;

  /** Dimensionality of the produced embeddings */
  readonly dimensions: number;

  /** Generate an embedding for a single text */
  embed(text: string): Promise<number[]>;

  /** Generate embeddings for multiple texts, in input order */
  embedBatch(texts: string[]): Promise<number[][]>;

  /** Embed a search query, for backends with asymmetric query/document models */
  embedQuery?(text: string): Promise<number[]>;
}

async function failOnStatus(resp: Response, label: string): Promise<void> {
  if (resp.ok) return;
  const body = await resp.text();
  throw new HttpError(`${label} embedding failed (${resp.status}): ${body}`, resp.status);
}

// ---------------------------------------------------------------------------
// Gemini Embedding Provider
// ---------------------------------------------------------------------------

const ValuesSchema = Type.Object({ values: Type.Array(Type.Number()) });

const EmbedContentResponse = Type.Object({ embedding: ValuesSchema });
const BatchEmbedContentsResponse = Type.Object({ embeddings: Type.Array(ValuesSchema) });

type GeminiTaskType = 'RETRIEVAL_DOCUMENT' | 'RETRIEVAL_QUERY';

export interface GeminiEmbeddingOptions {
  apiKey: string;
  model?: string;
  baseUrl?: string;
  /** Per-request timeout (default 10 000). */
  timeoutMs?: number;
  fetch?: EmbeddingFetch;
}

/**
 * Google Generative Language embeddings (embedding-001 / text-embedding-004).
 * Documents and queries use different task types.
 */
export class GeminiEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'gemini';
  readonly dimensions = 768;

  /** Maximum requests per batchEmbedContents call. */
  static readonly BATCH_SIZE = 100;

  private readonly apiKey: string;
  private readonly model: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: EmbeddingFetch;

  constructor(options: GeminiEmbeddingOptions) {
    this.apiKey = options.apiKey;
    this.model = options.model ?? 'embedding-001';
    this.baseUrl = (options.baseUrl ?? 'https://generativelanguage.googleapis.com').replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.fetchFn = options.fetch ?? defaultFetch;
  }

  private content(text: string, taskType: GeminiTaskType): Record<string, unknown> {
    return {
      model: `models/${this.model}`,
      content: { parts: [{ text }] },
      taskType,
    };
  }

  private async post(action: string, body: Record<string, unknown>): Promise<unknown> {
    const resp = await this.fetchFn(
      `${this.baseUrl}/v1beta/models/${this.model}:${action}`,
      {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'x-goog-api-key': this.apiKey,
        },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs),
      },
    );
    await failOnStatus(resp, 'Gemini');
    return resp.json();
  }

  private async embedOne(text: string, taskType: GeminiTaskType): Promise<number[]> {
    const data = await this.post('embedContent', this.content(text, taskType));
    if (!Value.Check(EmbedContentResponse, data)) {
      throw new Error('Gemini embedding response is missing embedding.values');
    }
    return normalizeEmbedding(data.embedding.values);
  }

  async embed(text: string): Promise<number[]> {
    return this.embedOne(text, 'RETRIEVAL_DOCUMENT');
  }

  async embedQuery(text: string): Promise<number[]> {
    return this.embedOne(text, 'RETRIEVAL_QUERY');
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    const all: number[][] = [];

    for (let i = 0; i < texts.length; i += GeminiEmbeddingProvider.BATCH_SIZE) {
      const batch = texts.slice(i, i + GeminiEmbeddingProvider.BATCH_SIZE);
      const data = await this.post('batchEmbedContents', {
        requests: batch.map((text) => this.content(text, 'RETRIEVAL_DOCUMENT')),
      });
      if (!Value.Check(BatchEmbedContentsResponse, data)) {
        throw new Error('Gemini batch embedding response is missing embeddings');
      }
      if (data.embeddings.length !== batch.length) {
        throw new Error(
          `Gemini returned ${data.embeddings.length} embeddings for ${batch.length} inputs`,
        );
      }
      all.push(...data.embeddings.map((e) => normalizeEmbedding(e.values)));
    }

    logger.debug({ count: texts.length, model: this.model }, 'Embedded batch');
    return all;
  }
}

// ---------------------------------------------------------------------------
// Ollama Embedding Provider
// ---------------------------------------------------------------------------

const OllamaEmbeddingResponse = Type.Object({ embedding: Type.Array(Type.Number()) });

export interface OllamaEmbeddingOptions {
  baseUrl?: string;
  model?: string;
  timeoutMs?: number;
  fetch?: EmbeddingFetch;
}

/**
 * Calls a local Ollama server for embeddings.
 * Uses nomic-embed-text (768 dimensions) unless told otherwise.
 */
export class OllamaEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'ollama';
  readonly dimensions = 768;

  private readonly baseUrl: string;
  private readonly model: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: EmbeddingFetch;

  constructor(options: OllamaEmbeddingOptions = {}) {
    this.baseUrl = (options.baseUrl ?? 'http://localhost:11434').replace(/\/+$/, '');
    this.model = options.model ?? 'nomic-embed-text';
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.fetchFn = options.fetch ?? defaultFetch;
  }

  async embed(text: string): Promise<number[]> {
    const resp = await this.fetchFn(`${this.baseUrl}/api/embeddings`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ model: this.model, prompt: text }),
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    await failOnStatus(resp, 'Ollama');

    const data: unknown = await resp.json();
    if (!Value.Check(OllamaEmbeddingResponse, data)) {
      throw new Error('Ollama embedding response is missing embedding');
    }
    return normalizeEmbedding(data.embedding);
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    // Ollama does not natively support batch; process sequentially
    const results: number[][] = [];
    for (const text of texts) {
      results.push(await this.embed(text));
    }
    return results;
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export interface EmbeddingProviderOptions {
  google?: { apiKey?: string; baseUrl?: string };
  ollama?: { baseUrl?: string };
  timeoutMs?: number;
  fetch?: EmbeddingFetch;
}

/**
 * Build the provider for a "provider/model" id such as "google/embedding-001"
 * or "ollama/nomic-embed-text".
 */
export function createEmbeddingProvider(
  modelId: string,
  options: EmbeddingProviderOptions = {},
): EmbeddingProvider {
  const { provider, model } = parseModelId(modelId);

  switch (provider) {
    case 'google': {
      const apiKey = options.google?.apiKey;
      if (!apiKey) {
        throw new Error(`GOOGLE_API_KEY not found (required by ${modelId})`);
      }
      return new GeminiEmbeddingProvider({
        apiKey,
        model,
        baseUrl: options.google?.baseUrl,
        timeoutMs: options.timeoutMs,
        fetch: options.fetch,
      });
    }
    case 'ollama':
      return new OllamaEmbeddingProvider({
        model,
        baseUrl: options.ollama?.baseUrl,
        timeoutMs: options.timeoutMs,
        fetch: options.fetch,
      });
    default:
      throw new Error(`Unknown embedding provider "${provider}" in "${modelId}"`);
  }
}
