/**
 * @tubeqa/qa - Retrieval-augmented answering pipeline
 *
 * Built once per transcript: chunk, embed, index. Each question is embedded,
 * the most relevant yet diverse chunks are retrieved and the model answers
 * from them alone.
 */

import pino from 'pino';
import {
  DEFAULT_CHUNK_OPTIONS,
  VectorStore,
  splitText,
  type ChunkOptions,
  type EmbeddingProvider,
  type MmrOptions,
  type SearchResult,
} from '@tubeqa/memory';
import type { CompletionModel, CompletionOptions } from './completion.js';
import { fillPromptTemplate, formatContext, QA_PROMPT_TEMPLATE } from './prompt.js';

const log = pino({ name: 'tubeqa:qa:pipeline' });

export interface PipelineDependencies {
  embeddings: EmbeddingProvider;
  model: CompletionModel;
  chunking?: ChunkOptions;
  retrieval?: MmrOptions;
  completion?: CompletionOptions;
  /** Prompt with `{context}` and `{question}` placeholders. */
  promptTemplate?: string;
  /** Fresh store per pipeline; defaults to an in-memory VectorStore. */
  createStore?: () => VectorStore;
  logger?: pino.Logger;
}

export interface AnswerResult {
  answer: string;
  sources: SearchResult[];
  prompt: string;
}

export const DEFAULT_RETRIEVAL: Required<MmrOptions> = { k: 4, fetchK: 20, lambda: 0.5 };

export class RetrievalQaPipeline {
  private closed = false;

  private constructor(
    private readonly store: VectorStore,
    private readonly deps: PipelineDependencies,
    private readonly log: pino.Logger,
    readonly chunkCount: number,
  ) {}

  /**
   * Chunk and embed `transcript` into a new index.
   * The store is closed again if embedding fails.
   */
  static async build(transcript: string, deps: PipelineDependencies): Promise<RetrievalQaPipeline> {
    const logger = deps.logger ?? log;
    const chunks = splitText(transcript, deps.chunking ?? DEFAULT_CHUNK_OPTIONS);
    if (chunks.length === 0) {
      throw new Error('Cannot build a pipeline from an empty transcript');
    }

    const store = deps.createStore?.() ?? new VectorStore({ logger: deps.logger });
    try {
      const vectors = await deps.embeddings.embedBatch(chunks.map((c) => c.text));
      if (vectors.length !== chunks.length) {
        throw new Error(`Expected ${chunks.length} embeddings, got ${vectors.length}`);
      }
      store.storeMany(
        chunks.map((chunk, i) => ({
          content: chunk.text,
          embedding: vectors[i],
          metadata: { index: chunk.index, start: chunk.start, end: chunk.end },
        })),
      );
    } catch (err: unknown) {
      store.close();
      throw err;
    }

    logger.info(
      { chunks: chunks.length, embeddings: deps.embeddings.name },
      'Retrieval pipeline built',
    );
    return new RetrievalQaPipeline(store, deps, logger, chunks.length);
  }

  private ensureOpen(): void {
    if (this.closed) {
      throw new Error('Pipeline has been closed');
    }
  }

  /** Chunks most relevant to `question`, diversified by MMR. */
  async retrieve(question: string): Promise<SearchResult[]> {
    this.ensureOpen();
    const { embeddings } = this.deps;
    const query = embeddings.embedQuery
      ? await embeddings.embedQuery(question)
      : await embeddings.embed(question);
    return this.store.searchMmr(query, { ...DEFAULT_RETRIEVAL, ...this.deps.retrieval });
  }

  /** Answer with the retrieved sources and the prompt that was sent. */
  async ask(question: string): Promise<AnswerResult> {
    const sources = await this.retrieve(question);
    const prompt = fillPromptTemplate(
      formatContext(sources),
      question,
      this.deps.promptTemplate ?? QA_PROMPT_TEMPLATE,
    );

    const answer = await this.deps.model.complete(prompt, this.deps.completion);
    this.log.debug(
      { sources: sources.length, model: this.deps.model.model, answerLength: answer.length },
      'Question answered',
    );
    return { answer, sources, prompt };
  }

  async answer(question: string): Promise<string> {
    const { answer } = await this.ask(question);
    return answer;
  }

  /** Release the index. Further calls fail. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.store.close();
  }
}
