/**
 * Unit Tests for embedding providers
 */
import { describe, it, expect, vi } from 'vitest';
import {
  GeminiEmbeddingProvider,
  OllamaEmbeddingProvider,
  createEmbeddingProvider,
  normalizeEmbedding,
  type EmbeddingFetch,
} from '@tubeqa/memory';
import { HttpError } from '@tubeqa/fallback';

vi.mock('pino', () => ({
  default: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }),
}));

function jsonFetch(body: unknown, status = 200) {
  return vi.fn<EmbeddingFetch>(async () => new Response(JSON.stringify(body), { status }));
}

function sentBody(fetch: ReturnType<typeof jsonFetch>, call = 0): unknown {
  const body = fetch.mock.calls[call]?.[1]?.body;
  return typeof body === 'string' ? JSON.parse(body) : undefined;
}

describe('normalizeEmbedding', () => {
  it('scales to unit length', () => {
    expect(normalizeEmbedding([3, 4])).toEqual([0.6, 0.8]);
  });

  it('leaves a zero vector alone', () => {
    expect(normalizeEmbedding([0, 0])).toEqual([0, 0]);
  });
});

describe('GeminiEmbeddingProvider', () => {
  it('embeds a document with the document task type', async () => {
    const fetch = jsonFetch({ embedding: { values: [3, 4] } });
    const provider = new GeminiEmbeddingProvider({ apiKey: 'test-secret', fetch });

    await expect(provider.embed('hello')).resolves.toEqual([0.6, 0.8]);

    const [url, init] = fetch.mock.calls[0] ?? [];
    expect(url).toBe(
      'https://generativelanguage.googleapis.com/v1beta/models/embedding-001:embedContent',
    );
    expect(init?.method).toBe('POST');
    expect(init?.headers).toMatchObject({ 'x-goog-api-key': 'test-secret' });
    expect(sentBody(fetch)).toEqual({
      model: 'models/embedding-001',
      content: { parts: [{ text: 'hello' }] },
      taskType: 'RETRIEVAL_DOCUMENT',
    });
  });

  it('embeds queries with the query task type', async () => {
    const fetch = jsonFetch({ embedding: { values: [0, 2] } });
    const provider = new GeminiEmbeddingProvider({ apiKey: 'test-secret', fetch });

    await expect(provider.embedQuery('what?')).resolves.toEqual([0, 1]);
    expect(sentBody(fetch)).toMatchObject({ taskType: 'RETRIEVAL_QUERY' });
  });

  it('batches in groups of 100', async () => {
    const fetch = vi.fn<EmbeddingFetch>(async (_url, init) => {
      const body: unknown = typeof init?.body === 'string' ? JSON.parse(init.body) : {};
      const count =
        typeof body === 'object' && body !== null && 'requests' in body && Array.isArray(body.requests)
          ? body.requests.length
          : 0;
      return new Response(
        JSON.stringify({ embeddings: Array.from({ length: count }, () => ({ values: [1, 0] })) }),
      );
    });
    const provider = new GeminiEmbeddingProvider({ apiKey: 'test-secret', fetch, model: 'text-embedding-004' });

    const texts = Array.from({ length: 250 }, (_, i) => `chunk ${i}`);
    const vectors = await provider.embedBatch(texts);

    expect(vectors).toHaveLength(250);
    expect(fetch).toHaveBeenCalledTimes(3);
    expect(fetch.mock.calls[0]?.[0]).toBe(
      'https://generativelanguage.googleapis.com/v1beta/models/text-embedding-004:batchEmbedContents',
    );
  });

  it('raises an HttpError on a non-OK response', async () => {
    const fetch = vi.fn<EmbeddingFetch>(async () => new Response('quota exceeded', { status: 429 }));
    const provider = new GeminiEmbeddingProvider({ apiKey: 'test-secret', fetch });

    const err = await provider.embed('x').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(HttpError);
    expect(err).toMatchObject({
      statusCode: 429,
      message: 'Gemini embedding failed (429): quota exceeded',
    });
  });

  it('rejects a malformed response', async () => {
    const provider = new GeminiEmbeddingProvider({
      apiKey: 'test-secret',
      fetch: jsonFetch({ unexpected: true }),
    });
    await expect(provider.embed('x')).rejects.toThrow('Gemini embedding response is missing embedding.values');
  });
});

describe('OllamaEmbeddingProvider', () => {
  it('posts to /api/embeddings', async () => {
    const fetch = jsonFetch({ embedding: [0, 5] });
    const provider = new OllamaEmbeddingProvider({ baseUrl: 'http://ollama.test:11434/', fetch });

    await expect(provider.embedBatch(['a', 'b'])).resolves.toEqual([
      [0, 1],
      [0, 1],
    ]);
    expect(fetch.mock.calls[0]?.[0]).toBe('http://ollama.test:11434/api/embeddings');
    expect(sentBody(fetch, 1)).toEqual({ model: 'nomic-embed-text', prompt: 'b' });
  });
});

describe('createEmbeddingProvider', () => {
  it('builds a Gemini provider with the given key', () => {
    const provider = createEmbeddingProvider('google/embedding-001', {
      google: { apiKey: 'test-secret' },
    });
    expect(provider).toBeInstanceOf(GeminiEmbeddingProvider);
  });

  it('requires a Google API key', () => {
    expect(() => createEmbeddingProvider('google/embedding-001')).toThrow(
      'GOOGLE_API_KEY not found (required by google/embedding-001)',
    );
  });

  it('builds an Ollama provider', () => {
    expect(createEmbeddingProvider('ollama/nomic-embed-text')).toBeInstanceOf(OllamaEmbeddingProvider);
  });

  it('rejects unknown providers', () => {
    expect(() => createEmbeddingProvider('acme/embedder')).toThrow(
      'Unknown embedding provider "acme" in "acme/embedder"',
    );
  });
});
