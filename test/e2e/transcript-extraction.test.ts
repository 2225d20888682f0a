/**
 * E2E Tests for transcript extraction
 *
 * Runs the real strategies and fallback chain against a fake caption API
 * and a fake HTTP client.
 */
import { describe, it, expect, vi } from 'vitest';
import {
  InvalidVideoUrlError,
  NoCaptionsError,
  TranscriptExhaustedError,
  TranscriptExtractor,
  extractTranscript,
} from '@tubeqa/transcript';
import type { ApiCallOptions, FetchFn, TranscriptApi } from '@tubeqa/transcript';

vi.mock('pino', () => ({
  default: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }),
}));

const CAPTION_URL = 'https://www.youtube.com/api/timedtext?v=vid42&lang=en';
const PAGE = '<script>{"captionTracks":[{"baseUrl":"https://www.youtube.com/api/timedtext?v=vid42\\u0026lang=en"}]}</script>';

function pageFetch(captionBody: string = '<text>Hello</text><text>world</text>') {
  return vi.fn<FetchFn>(async (input) => {
    if (input.startsWith('https://www.youtube.com/watch')) return new Response(PAGE);
    if (input === CAPTION_URL) return new Response(captionBody);
    return new Response('', { status: 404 });
  });
}

function deadFetch() {
  return vi.fn<FetchFn>(async () => new Response('blocked', { status: 403 }));
}

function failingApi(languages: string[]): TranscriptApi {
  return {
    listLanguages: vi.fn(async () => languages),
    fetch: vi.fn(async (_videoId: string, language?: string) => {
      throw new Error(`request blocked (${language ?? 'default'})`);
    }),
  };
}

function workingApi(tracks: Record<string, string[]>): TranscriptApi {
  return {
    listLanguages: vi.fn(async () => Object.keys(tracks)),
    fetch: vi.fn(async (_videoId: string, language?: string) => {
      const code = language ?? Object.keys(tracks)[0] ?? 'en';
      const texts = tracks[code] ?? [];
      return {
        language: code,
        fragments: texts.map((text, i) => ({ text, offsetMs: i * 1000, durationMs: 1000 })),
      };
    }),
  };
}

const VIDEO_URL = 'https://www.youtube.com/watch?v=vid42';

describe('Transcript extraction', () => {
  it('tries the strategies in the established order', () => {
    // The scrape runs before the simpler default-track call; kept deliberately.
    const extractor = new TranscriptExtractor({ api: failingApi([]), fetch: deadFetch() });
    expect(extractor.strategyOrder()).toEqual(['structured-api', 'page-scrape', 'default-track']);
  });

  it('returns the structured API result when it succeeds', async () => {
    const fetch = pageFetch();
    const transcript = await extractTranscript(VIDEO_URL, 'en', {
      api: workingApi({ en: ['first', 'second'] }),
      fetch,
      pacingDelayMaxMs: 0,
    });

    expect(transcript).toMatchObject({
      videoId: 'vid42',
      text: 'first second',
      language: 'en',
      requestedLanguage: 'en',
      languageSubstituted: false,
      strategy: 'structured-api',
    });
    expect(transcript.attempts).toHaveLength(1);
    expect(fetch).not.toHaveBeenCalled();
  });

  it('reports a language substitution', async () => {
    const transcript = await extractTranscript('https://youtu.be/vid42', 'fr', {
      api: workingApi({ en: ['hello'], es: ['hola'] }),
      fetch: deadFetch(),
      pacingDelayMaxMs: 0,
    });

    expect(transcript.language).toBe('en');
    expect(transcript.requestedLanguage).toBe('fr');
    expect(transcript.languageSubstituted).toBe(true);
  });

  it('falls back to page scraping when the structured API fails', async () => {
    const fetch = pageFetch();
    const transcript = await extractTranscript(VIDEO_URL, 'en', {
      api: failingApi(['en']),
      fetch,
      pacingDelayMaxMs: 0,
    });

    expect(transcript.text).toBe('Hello world');
    expect(transcript.strategy).toBe('page-scrape');
    expect(transcript.language).toBe('en');
    expect(transcript.attempts.map((a) => [a.provider, a.success])).toEqual([
      ['structured-api', false],
      ['page-scrape', true],
    ]);
    expect(transcript.attempts[0]?.error).toBe(
      'Could not retrieve transcript in any available language (en: request blocked (en))',
    );
  });

  it('falls back to the default track when scraping fails too', async () => {
    const api: TranscriptApi = {
      listLanguages: vi.fn(async () => []),
      fetch: vi.fn(async (_videoId: string, language?: string) => {
        if (language) throw new Error('unexpected language request');
        return { language: 'de', fragments: [{ text: 'Guten Tag', offsetMs: 0, durationMs: 900 }] };
      }),
    };

    const transcript = await extractTranscript(VIDEO_URL, 'en', {
      api,
      fetch: deadFetch(),
      pacingDelayMaxMs: 0,
    });

    expect(transcript.strategy).toBe('default-track');
    expect(transcript.text).toBe('Guten Tag');
    expect(transcript.language).toBe('de');
    expect(transcript.languageSubstituted).toBe(true);
    expect(transcript.attempts.map((a) => a.error)).toEqual([
      'No transcripts available for video vid42',
      'Could not access video page (HTTP 403)',
      undefined,
    ]);
  });

  it('rejects an invalid URL before any network call', async () => {
    const api = failingApi(['en']);
    const fetch = pageFetch();

    await expect(
      extractTranscript('https://vimeo.com/1234', 'en', { api, fetch, pacingDelayMaxMs: 0 }),
    ).rejects.toBeInstanceOf(InvalidVideoUrlError);
    expect(api.listLanguages).not.toHaveBeenCalled();
    expect(fetch).not.toHaveBeenCalled();
  });

  it('lists languages and every reason when all strategies fail', async () => {
    const err = await extractTranscript(VIDEO_URL, 'en', {
      api: failingApi(['es', 'ja']),
      fetch: deadFetch(),
      pacingDelayMaxMs: 0,
    }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(TranscriptExhaustedError);
    expect(err).not.toBeInstanceOf(NoCaptionsError);
    if (!(err instanceof TranscriptExhaustedError)) return;

    expect(err.availableLanguages).toEqual(['es', 'ja']);
    expect(err.message).toBe(
      'Could not retrieve a transcript for vid42. Available languages: es, ja. Errors: ' +
        'structured-api: Could not retrieve transcript in any available language ' +
        '(es: request blocked (es); ja: request blocked (ja)); ' +
        'page-scrape: Could not access video page (HTTP 403); ' +
        'default-track: request blocked (default)',
    );
    expect(err.attempts).toHaveLength(3);
  });

  it('gives a simpler message when no captions exist at all', async () => {
    const err = await extractTranscript(VIDEO_URL, 'en', {
      api: failingApi([]),
      fetch: deadFetch(),
      pacingDelayMaxMs: 0,
    }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(NoCaptionsError);
    if (!(err instanceof NoCaptionsError)) return;
    expect(err.message).toBe('No captions available for this video (vid42).');
    expect(err.attempts.map((a) => a.provider)).toEqual([
      'structured-api',
      'page-scrape',
      'default-track',
    ]);
  });

  it('treats a stalled strategy as a failure', async () => {
    const api: TranscriptApi = {
      listLanguages: vi.fn(() => new Promise<string[]>(() => {})),
      fetch: vi.fn(async () => ({ language: 'en', fragments: [{ text: 'late but fine', offsetMs: 0, durationMs: 1 }] })),
    };
    const extractor = new TranscriptExtractor({
      api,
      fetch: deadFetch(),
      pacingDelayMaxMs: 0,
      strategyTimeoutMs: 20,
    });

    const transcript = await extractor.extract(VIDEO_URL, 'en');
    expect(transcript.strategy).toBe('default-track');
    expect(transcript.attempts[0]?.error).toBe('Provider "structured-api" timed out after 20ms');
  });

  it('bounds the final language listing when it stalls', async () => {
    const api: TranscriptApi = {
      listLanguages: vi.fn(() => new Promise<string[]>(() => {})),
      fetch: vi.fn(async () => {
        throw new Error('default track blocked');
      }),
    };
    const extractor = new TranscriptExtractor({
      api,
      fetch: deadFetch(),
      pacingDelayMaxMs: 0,
      strategyTimeoutMs: 50,
      requestTimeoutMs: 50,
    });

    const err = await extractor.extract(VIDEO_URL, 'en').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(NoCaptionsError);
    expect(api.listLanguages).toHaveBeenCalledTimes(2);
  });

  it('stops an abandoned strategy before the next one starts', async () => {
    const events: string[] = [];
    const api: TranscriptApi = {
      listLanguages: vi.fn(async () => ['es', 'ja', 'ko']),
      fetch: vi.fn((_videoId: string, language?: string, options?: ApiCallOptions) => {
        events.push(`api.fetch(${language ?? 'default'})`);
        if (language === undefined) {
          return Promise.resolve({
            language: 'es',
            fragments: [{ text: 'hola', offsetMs: 0, durationMs: 1000 }],
          });
        }
        // Only gives up when the attempt is aborted
        return new Promise<never>((_resolve, reject) => {
          options?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        });
      }),
    };
    const fetch = vi.fn<FetchFn>(async () => {
      events.push('page');
      return new Response('blocked', { status: 403 });
    });

    const transcript = await extractTranscript(VIDEO_URL, 'es', {
      api,
      fetch,
      pacingDelayMaxMs: 0,
      strategyTimeoutMs: 30,
    });

    expect(transcript.strategy).toBe('default-track');
    expect(events).toEqual(['api.fetch(es)', 'page', 'api.fetch(default)']);
  });
});
