/**
 * tubeqa - Main entry point
 *
 * Wires a Q&A session from configuration:
 *   1. Create a logger at the configured level
 *   2. Build the transcript extractor (caption API, page scraping, timeouts)
 *   3. Build the embedding provider and completion model with explicit credentials
 *   4. Hand everything to a TranscriptQaSession
 */

import pino from 'pino';
import { loadConfig, type TubeqaConfig } from '@tubeqa/core';
import { createEmbeddingProvider } from '@tubeqa/memory';
import { TranscriptQaSession } from '@tubeqa/qa';
import { TranscriptExtractor, type TranscriptApi } from '@tubeqa/transcript';
import { createCompletionModel, type HttpFetch } from './models/provider.js';

export interface CreateTranscriptQaOptions {
  /** Caption API override; defaults to youtube-transcript-plus. */
  api?: TranscriptApi;
  /** HTTP client for page scraping and model calls. */
  fetch?: HttpFetch;
  logger?: pino.Logger;
}

export interface TranscriptQa {
  config: TubeqaConfig;
  extractor: TranscriptExtractor;
  session: TranscriptQaSession;
}

/**
 * Build a ready-to-use session. Nothing here reads the environment: keys
 * and endpoints come from `config` only.
 */
export async function createTranscriptQa(
  config: TubeqaConfig,
  options: CreateTranscriptQaOptions = {},
): Promise<TranscriptQa> {
  const logger = options.logger ?? pino({ name: 'tubeqa', level: config.logging.level });
  const { transcript, chunking, retrieval, models, providers } = config;

  const extractor = new TranscriptExtractor({
    api: options.api,
    fetch: options.fetch,
    requestTimeoutMs: transcript.requestTimeoutMs,
    strategyTimeoutMs: transcript.strategyTimeoutMs,
    pacingDelayMaxMs: transcript.pacingDelayMaxMs,
    userAgent: transcript.userAgent,
    logger: logger.child({ module: 'transcript' }),
  });

  const embeddings = createEmbeddingProvider(models.embedding, {
    google: providers.google,
    ollama: providers.ollama,
    timeoutMs: transcript.requestTimeoutMs,
    fetch: options.fetch,
  });

  const model = await createCompletionModel(models.chat, {
    google: providers.google,
    ollama: providers.ollama,
    temperature: models.temperature,
    fetch: options.fetch,
  });

  const session = new TranscriptQaSession({
    extractor,
    embeddings,
    model,
    chunking,
    retrieval,
    minTranscriptLength: transcript.minTranscriptLength,
    logger: logger.child({ module: 'qa' }),
  });

  logger.info({ chat: models.chat, embedding: models.embedding }, 'Transcript Q&A ready');
  return { config, extractor, session };
}

/**
 * Load configuration from TUBEQA_HOME and the environment, then build a
 * session. Throws when the configuration is invalid.
 */
export async function createTranscriptQaFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  options: CreateTranscriptQaOptions = {},
): Promise<TranscriptQa> {
  const { config, validation } = loadConfig({ env });
  if (!validation.valid) {
    const details = validation.errors.map((e) => `${e.path}: ${e.message}`).join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }
  return createTranscriptQa(config, options);
}

export { createCompletionModel, type CompletionModelConfig, type HttpFetch } from './models/provider.js';
export { GeminiProvider, type GeminiProviderOptions } from './models/gemini.js';
export { OllamaProvider, type OllamaProviderOptions } from './models/ollama.js';

export * from '@tubeqa/core';
export * from '@tubeqa/fallback';
export * from '@tubeqa/transcript';
export * from '@tubeqa/memory';
export * from '@tubeqa/qa';
