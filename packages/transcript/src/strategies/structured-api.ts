/**
 * Structured API strategy.
 *
 * Asks the transcript API for a specific language, choosing among the
 * languages the video actually has when the preferred one is missing.
 */

import pino from 'pino';
import { errorMessage } from '@tubeqa/core';
import type { TranscriptApi } from '../api.js';
import { NoTranscriptsError, TranscriptFetchError } from '../errors.js';
import type { StrategyRequest, StrategyResult, TranscriptStrategy } from './types.js';

const log = pino({ name: 'tubeqa:transcript:structured-api' });

export interface StructuredApiStrategyOptions {
  api: TranscriptApi;
  logger?: pino.Logger;
}

/**
 * Order in which languages are tried: preferred, then English, then the
 * rest in discovery order. Only discovered languages are ever tried.
 */
export function candidateLanguages(discovered: string[], preferred: string): string[] {
  const candidates: string[] = [];
  if (discovered.includes(preferred)) candidates.push(preferred);
  if (preferred !== 'en' && discovered.includes('en')) candidates.push('en');
  for (const code of discovered) {
    if (!candidates.includes(code)) candidates.push(code);
  }
  return candidates;
}

function throwIfAbandoned(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new TranscriptFetchError('Structured API attempt abandoned', 'language', {
      cause: signal.reason,
    });
  }
}

export class StructuredApiStrategy implements TranscriptStrategy {
  readonly kind = 'structured-api' as const;

  private readonly api: TranscriptApi;
  private readonly log: pino.Logger;

  constructor(options: StructuredApiStrategyOptions) {
    this.api = options.api;
    this.log = options.logger ?? log;
  }

  /** Distinct language codes in platform order; any failure yields []. */
  async discoverLanguages(videoId: string, signal?: AbortSignal): Promise<string[]> {
    let languages: string[];
    try {
      languages = await this.api.listLanguages(videoId, { signal });
    } catch (err: unknown) {
      this.log.warn({ videoId, error: errorMessage(err) }, 'Language listing failed');
      return [];
    }
    return [...new Set(languages)];
  }

  /** Fragment texts for exactly one language, joined with single spaces. */
  async fetch(videoId: string, language: string, signal?: AbortSignal): Promise<string> {
    const { fragments } = await this.api.fetch(videoId, language, { signal });
    const text = fragments.map((f) => f.text).join(' ');
    if (!text.trim()) {
      throw new TranscriptFetchError(`Transcript in ${language} is empty`, 'download');
    }
    return text;
  }

  /**
   * Try each candidate language in turn. Once `signal` is aborted no further
   * candidate is requested.
   */
  async fetchWithFallback(
    videoId: string,
    preferred: string,
    signal?: AbortSignal,
  ): Promise<StrategyResult> {
    const discovered = await this.discoverLanguages(videoId, signal);
    throwIfAbandoned(signal);
    if (discovered.length === 0) {
      throw new NoTranscriptsError(videoId);
    }

    const failures: string[] = [];
    for (const language of candidateLanguages(discovered, preferred)) {
      throwIfAbandoned(signal);
      try {
        const text = await this.fetch(videoId, language, signal);
        if (language !== preferred) {
          this.log.info({ videoId, preferred, language }, 'Using substitute caption language');
        }
        return { text, language };
      } catch (err: unknown) {
        const message = errorMessage(err);
        this.log.debug({ videoId, language, error: message }, 'Language candidate failed');
        failures.push(`${language}: ${message}`);
      }
    }

    throw new TranscriptFetchError(
      `Could not retrieve transcript in any available language (${failures.join('; ')})`,
      'language',
    );
  }

  run(request: StrategyRequest): Promise<StrategyResult> {
    return this.fetchWithFallback(request.videoId, request.language, request.signal);
  }
}
