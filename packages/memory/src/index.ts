/**
 * @tubeqa/memory - Chunking, embeddings and vector storage
 *
 * Everything the answering pipeline needs to turn a transcript into a
 * searchable in-memory index.
 */

// Chunking
export {
  splitText,
  DEFAULT_CHUNK_OPTIONS,
  type TextChunk,
  type ChunkOptions,
} from './chunker.js';

// Embeddings
export {
  type EmbeddingProvider,
  type EmbeddingFetch,
  type EmbeddingProviderOptions,
  type GeminiEmbeddingOptions,
  type OllamaEmbeddingOptions,
  GeminiEmbeddingProvider,
  OllamaEmbeddingProvider,
  createEmbeddingProvider,
  normalizeEmbedding,
} from './embeddings.js';

// Vector store
export {
  type VectorEntry,
  type SearchResult,
  type MmrOptions,
  type VectorStoreOptions,
  VectorStore,
  cosineSimilarity,
} from './vector-store.js';
