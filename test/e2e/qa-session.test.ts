/**
 * E2E Tests for the transcript Q&A session
 *
 * Real chunking, vector store and retrieval; fake extractor, embeddings
 * and completion model.
 */
import { describe, it, expect, vi } from 'vitest';
import {
  InsufficientTranscriptError,
  RetrievalQaPipeline,
  SessionNotReadyError,
  TranscriptQaSession,
  type CompletionModel,
  type TranscriptSource,
} from '@tubeqa/qa';
import type { EmbeddingProvider } from '@tubeqa/memory';
import type { Transcript } from '@tubeqa/transcript';

vi.mock('pino', () => ({
  default: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }),
}));

const TOPICS = ['cooking', 'rockets', 'gardens'] as const;

/** Embeds text as counts of each topic word, so retrieval is predictable. */
function topicEmbeddings(): EmbeddingProvider {
  const vectorOf = (text: string): number[] =>
    TOPICS.map((topic) => text.split(topic).length - 1 + 0.01);
  return {
    name: 'topic-counter',
    dimensions: TOPICS.length,
    embed: vi.fn(async (text: string) => vectorOf(text)),
    embedBatch: vi.fn(async (texts: string[]) => texts.map(vectorOf)),
  };
}

function echoModel(): CompletionModel {
  return {
    name: 'fake',
    model: 'echo-1',
    complete: vi.fn(async (prompt: string) => `answered from ${prompt.length} chars`),
  };
}

function transcriptOf(text: string, videoId = 'vid1'): Transcript {
  return {
    videoId,
    text,
    language: 'en',
    requestedLanguage: 'en',
    languageSubstituted: false,
    strategy: 'structured-api',
    attempts: [],
  };
}

const LONG_TEXT = [
  'We start with cooking. The cooking section covers pasta and sauces in detail.',
  'Then rockets. Rockets need fuel, and rockets need careful engineering to fly.',
  'Finally gardens. Gardens need water and sunlight to grow vegetables well.',
].join('\n\n');

function extractorReturning(...texts: string[]): TranscriptSource {
  return {
    extract: async (url: string) => transcriptOf(texts.shift() ?? '', url.slice(-4)),
  };
}

describe('RetrievalQaPipeline', () => {
  it('retrieves the chunk about the question and grounds the prompt in it', async () => {
    const model = echoModel();
    const pipeline = await RetrievalQaPipeline.build(LONG_TEXT, {
      embeddings: topicEmbeddings(),
      model,
      chunking: { chunkSize: 90, chunkOverlap: 10 },
      retrieval: { k: 1 },
    });

    const { sources, prompt } = await pipeline.ask('Tell me about rockets');
    expect(sources).toHaveLength(1);
    expect(sources[0]?.content).toContain('rockets need careful engineering');
    expect(prompt).toContain('Answer ONLY from the provided transcript context.');
    expect(prompt.endsWith('Question: Tell me about rockets')).toBe(true);
    expect(model.complete).toHaveBeenCalledWith(prompt, undefined);

    pipeline.close();
    await expect(pipeline.answer('again?')).rejects.toThrow('Pipeline has been closed');
  });

  it('uses the query embedding when the provider has one', async () => {
    const embeddings = topicEmbeddings();
    const embedQuery = vi.fn(async () => [0, 0, 1]);
    const pipeline = await RetrievalQaPipeline.build(LONG_TEXT, {
      embeddings: { ...embeddings, embedQuery },
      model: echoModel(),
      chunking: { chunkSize: 90, chunkOverlap: 10 },
      retrieval: { k: 1 },
    });

    const [source] = await pipeline.retrieve('anything');
    expect(embedQuery).toHaveBeenCalledWith('anything');
    expect(embeddings.embed).not.toHaveBeenCalled();
    expect(source?.content).toContain('ardens');
    pipeline.close();
  });

  it('joins several retrieved chunks with blank lines', async () => {
    const pipeline = await RetrievalQaPipeline.build('cooking notes', {
      embeddings: topicEmbeddings(),
      model: echoModel(),
    });
    const { prompt } = await pipeline.ask('cooking?');
    expect(prompt).toContain('\n\ncooking notes\nQuestion: cooking?');
    pipeline.close();
  });
});

describe('TranscriptQaSession', () => {
  function session(extractor: TranscriptSource, model = echoModel()) {
    return new TranscriptQaSession({
      extractor,
      embeddings: topicEmbeddings(),
      model,
      chunking: { chunkSize: 90, chunkOverlap: 10 },
    });
  }

  it('answers questions after processing a video and keeps history', async () => {
    const qa = session(extractorReturning(LONG_TEXT));
    expect(qa.isReady).toBe(false);

    const { transcript, preview } = await qa.processVideo('https://youtu.be/aaaa', 'en');
    expect(transcript.videoId).toBe('aaaa');
    expect(preview).toBe(LONG_TEXT);
    expect(qa.isReady).toBe(true);
    expect(qa.currentVideoUrl).toBe('https://youtu.be/aaaa');

    const answer = await qa.ask('What about rockets?');
    expect(answer).toMatch(/^answered from \d+ chars$/);
    expect(qa.history).toEqual([{ question: 'What about rockets?', answer }]);
  });

  it('previews long transcripts with an ellipsis', async () => {
    const text = 'cooking '.repeat(100);
    const qa = session(extractorReturning(text));
    const { preview } = await qa.processVideo('https://youtu.be/bbbb', 'en');
    expect(preview).toBe(`${text.slice(0, 500)}...`);
  });

  it('refuses questions before a video is ready', async () => {
    const qa = session(extractorReturning());
    await expect(qa.ask('anything?')).rejects.toBeInstanceOf(SessionNotReadyError);
  });

  it('refuses blank questions', async () => {
    const qa = session(extractorReturning(LONG_TEXT));
    await qa.processVideo('https://youtu.be/aaaa', 'en');
    await expect(qa.ask('   ')).rejects.toBeInstanceOf(RangeError);
  });

  it('rejects transcripts that are too short', async () => {
    const qa = session(extractorReturning('   tiny   '));
    await expect(qa.processVideo('https://youtu.be/cccc', 'en')).rejects.toBeInstanceOf(
      InsufficientTranscriptError,
    );
    expect(qa.isReady).toBe(false);
    expect(qa.lastError).toBe(
      'Transcript too short or empty (4 characters, need at least 50). Try a different video or language.',
    );
  });

  it('clears history for a new URL but keeps it when reprocessing the same one', async () => {
    const qa = session(extractorReturning(LONG_TEXT, LONG_TEXT, LONG_TEXT));

    await qa.processVideo('https://youtu.be/aaaa', 'en');
    await qa.ask('cooking?');
    await qa.processVideo('https://youtu.be/aaaa', 'es');
    expect(qa.history).toHaveLength(1);

    await qa.processVideo('https://youtu.be/dddd', 'en');
    expect(qa.history).toEqual([]);
    expect(qa.currentTranscript?.videoId).toBe('dddd');
  });

  it('drops the previous pipeline when processing fails', async () => {
    const extractor: TranscriptSource = {
      extract: vi
        .fn<(url: string, language: string) => Promise<Transcript>>()
        .mockResolvedValueOnce(transcriptOf(LONG_TEXT))
        .mockRejectedValueOnce(new Error('No captions available for this video (eeee).')),
    };
    const qa = session(extractor);

    await qa.processVideo('https://youtu.be/aaaa', 'en');
    await expect(qa.processVideo('https://youtu.be/eeee', 'en')).rejects.toThrow('No captions');

    expect(qa.isReady).toBe(false);
    expect(qa.currentTranscript).toBeNull();
    expect(qa.lastError).toBe('No captions available for this video (eeee).');
    await expect(qa.ask('still there?')).rejects.toBeInstanceOf(SessionNotReadyError);
  });

  it('clearHistory() drops the turns but keeps the video', async () => {
    const qa = session(extractorReturning(LONG_TEXT));
    await qa.processVideo('https://youtu.be/aaaa', 'en');
    await qa.ask('rockets?');
    await qa.ask('gardens?');
    expect(qa.history).toHaveLength(2);

    qa.clearHistory();
    expect(qa.history).toEqual([]);
    expect(qa.isReady).toBe(true);
    expect(qa.currentVideoUrl).toBe('https://youtu.be/aaaa');

    const answer = await qa.ask('cooking?');
    expect(qa.history).toEqual([{ question: 'cooking?', answer }]);
  });

  it('reset() forgets everything', async () => {
    const qa = session(extractorReturning(LONG_TEXT));
    await qa.processVideo('https://youtu.be/aaaa', 'en');
    await qa.ask('gardens?');

    qa.reset();
    expect(qa.isReady).toBe(false);
    expect(qa.currentVideoUrl).toBeNull();
    expect(qa.history).toEqual([]);
  });
});
