/**
 * @tubeqa/core - TypeBox schema for tubeqa configuration
 *
 * Sections: transcript, chunking, retrieval, models, providers, logging
 */

import { Type, type Static } from '@sinclair/typebox';

// ---------------------------------------------------------------------------
// Sub-schemas
// ---------------------------------------------------------------------------

const TranscriptSchema = Type.Object({
  defaultLanguage: Type.String({ default: 'en' }),
  requestTimeoutMs: Type.Number({ minimum: 1, default: 10000 }),
  strategyTimeoutMs: Type.Number({ minimum: 1, default: 60000 }),
  pacingDelayMaxMs: Type.Number({
    minimum: 0,
    default: 2000,
    description: 'Upper bound of the random delay before scraping the video page',
  }),
  minTranscriptLength: Type.Number({ minimum: 0, default: 50 }),
  userAgent: Type.Optional(Type.String()),
});

const ChunkingSchema = Type.Object({
  chunkSize: Type.Number({ minimum: 1, default: 1000 }),
  chunkOverlap: Type.Number({ minimum: 0, default: 200 }),
});

const RetrievalSchema = Type.Object({
  k: Type.Number({ minimum: 1, default: 4 }),
  fetchK: Type.Number({ minimum: 1, default: 20 }),
  lambda: Type.Number({
    minimum: 0,
    maximum: 1,
    default: 0.5,
    description: '1 = pure relevance, 0 = pure diversity',
  }),
});

const ModelsSchema = Type.Object({
  chat: Type.String({ default: 'google/gemini-2.0-flash', description: 'Format: provider/model' }),
  embedding: Type.String({ default: 'google/embedding-001', description: 'Format: provider/model' }),
  temperature: Type.Number({ minimum: 0, maximum: 2, default: 0.3 }),
});

const ProvidersSchema = Type.Object({
  google: Type.Object({
    apiKey: Type.Optional(Type.String()),
    baseUrl: Type.String({ default: 'https://generativelanguage.googleapis.com' }),
  }),
  ollama: Type.Object({
    baseUrl: Type.String({ default: 'http://localhost:11434' }),
  }),
});

const LoggingSchema = Type.Object({
  level: Type.Union(
    [
      Type.Literal('fatal'),
      Type.Literal('error'),
      Type.Literal('warn'),
      Type.Literal('info'),
      Type.Literal('debug'),
      Type.Literal('trace'),
      Type.Literal('silent'),
    ],
    { default: 'info' },
  ),
});

// ---------------------------------------------------------------------------
// Root config schema
// ---------------------------------------------------------------------------

export const TubeqaConfigSchema = Type.Object({
  $schema: Type.Optional(Type.String()),
  version: Type.Number({ default: 1 }),
  transcript: TranscriptSchema,
  chunking: ChunkingSchema,
  retrieval: RetrievalSchema,
  models: ModelsSchema,
  providers: ProvidersSchema,
  logging: LoggingSchema,
});

export type TubeqaConfig = Static<typeof TubeqaConfigSchema>;
export type LogLevel = TubeqaConfig['logging']['level'];

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_CONFIG: TubeqaConfig = {
  version: 1,
  transcript: {
    defaultLanguage: 'en',
    requestTimeoutMs: 10000,
    strategyTimeoutMs: 60000,
    pacingDelayMaxMs: 2000,
    minTranscriptLength: 50,
  },
  chunking: {
    chunkSize: 1000,
    chunkOverlap: 200,
  },
  retrieval: {
    k: 4,
    fetchK: 20,
    lambda: 0.5,
  },
  models: {
    chat: 'google/gemini-2.0-flash',
    embedding: 'google/embedding-001',
    temperature: 0.3,
  },
  providers: {
    google: {
      baseUrl: 'https://generativelanguage.googleapis.com',
    },
    ollama: {
      baseUrl: 'http://localhost:11434',
    },
  },
  logging: {
    level: 'info',
  },
};
