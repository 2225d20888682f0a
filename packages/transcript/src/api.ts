/**
 * @tubeqa/transcript - Structured transcript API
 *
 * The port the structured-api and default-track strategies talk to, plus the
 * production adapter backed by youtube-transcript-plus. The library is loaded
 * lazily so that importing this package never touches it.
 */

import pino from 'pino';
import { errorMessage } from '@tubeqa/core';
import type { FetchFn } from './strategies/types.js';

const log = pino({ name: 'tubeqa:transcript-api' });

/** One timed caption fragment. */
export interface CaptionFragment {
  text: string;
  offsetMs: number;
  durationMs: number;
}

export interface FetchedCaptions {
  /** Language the track was served in, or null when not reported. */
  language: string | null;
  fragments: CaptionFragment[];
}

export interface ApiCallOptions {
  /** Aborts every request the call still has in flight. */
  signal?: AbortSignal;
}

export interface TranscriptApi {
  /** Language codes with captions for the video, in platform order. */
  listLanguages(videoId: string, options?: ApiCallOptions): Promise<string[]>;
  /** Caption fragments in `language`, or the video's default track when omitted. */
  fetch(videoId: string, language?: string, options?: ApiCallOptions): Promise<FetchedCaptions>;
}

// Language code no video carries; asking for it makes the library report
// the languages that do exist.
const UNLISTED_LANGUAGE = 'zz-unlisted';

export interface YoutubeTranscriptPlusApiOptions {
  /** Overrides the library's default User-Agent. */
  userAgent?: string;
  /** Bound on each HTTP request the library makes (default 10 000). */
  requestTimeoutMs?: number;
  /** HTTP client the library's requests go through. */
  fetch?: FetchFn;
  logger?: pino.Logger;
}

type TranscriptModule = typeof import('youtube-transcript-plus');

/** What the library hands its fetch hooks. */
interface HookRequest {
  url: string;
  method?: string;
  body?: string;
  headers?: Record<string, string>;
  lang?: string;
  userAgent?: string;
}

/**
 * TranscriptApi backed by youtube-transcript-plus.
 */
export class YoutubeTranscriptPlusApi implements TranscriptApi {
  private readonly userAgent?: string;
  private readonly requestTimeoutMs: number;
  private readonly fetchFn: FetchFn;
  private readonly log: pino.Logger;
  private modulePromise: Promise<TranscriptModule> | null = null;

  constructor(options: YoutubeTranscriptPlusApiOptions = {}) {
    this.userAgent = options.userAgent;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 10_000;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.log = options.logger ?? log;
  }

  private load(): Promise<TranscriptModule> {
    this.modulePromise ??= import('youtube-transcript-plus');
    return this.modulePromise;
  }

  async listLanguages(videoId: string, options: ApiCallOptions = {}): Promise<string[]> {
    const mod = await this.load();
    try {
      const entries = await mod.fetchTranscript(videoId, this.configFor(UNLISTED_LANGUAGE, options.signal));
      // Should never succeed; if it does, report whatever came back.
      const served = entries.find((entry) => entry.lang)?.lang;
      return served ? [served] : [];
    } catch (err: unknown) {
      if (err instanceof mod.YoutubeTranscriptNotAvailableLanguageError) {
        return [...err.availableLangs];
      }
      this.log.debug({ videoId, error: errorMessage(err) }, 'Language discovery failed');
      return [];
    }
  }

  async fetch(videoId: string, language?: string, options: ApiCallOptions = {}): Promise<FetchedCaptions> {
    const mod = await this.load();
    const entries = await mod.fetchTranscript(videoId, this.configFor(language, options.signal));
    const served = entries.find((entry) => entry.lang)?.lang;
    return {
      language: served ?? language ?? null,
      // the library reports seconds
      fragments: entries.map((entry) => ({
        text: entry.text,
        offsetMs: Math.round(entry.offset * 1000),
        durationMs: Math.round(entry.duration * 1000),
      })),
    };
  }

  private configFor(language: string | undefined, signal: AbortSignal | undefined) {
    const request = (hook: HookRequest): Promise<Response> => this.request(hook, signal);
    return {
      ...(language ? { lang: language } : {}),
      ...(this.userAgent ? { userAgent: this.userAgent } : {}),
      videoFetch: request,
      playerFetch: request,
      transcriptFetch: request,
    };
  }

  /** Every library request is bounded by the request timeout and the caller's signal. */
  private request(hook: HookRequest, signal: AbortSignal | undefined): Promise<Response> {
    const headers: Record<string, string> = { ...hook.headers };
    if (hook.userAgent) headers['User-Agent'] = hook.userAgent;
    if (hook.lang) headers['Accept-Language'] = hook.lang;

    const timeout = AbortSignal.timeout(this.requestTimeoutMs);
    return this.fetchFn(hook.url, {
      method: hook.method ?? 'GET',
      headers,
      body: hook.body,
      signal: signal ? AbortSignal.any([timeout, signal]) : timeout,
    });
  }
}
