/**
 * @tubeqa/transcript - Extraction orchestrator
 *
 * Resolves the video ID, then runs the strategies in fixed order through a
 * FallbackChain: structured API, page scrape, default track. The first
 * success wins. When all fail, languages are discovered once more so the
 * final error can say whether captions exist at all.
 */

import pino from 'pino';
import {
  FallbackChain,
  FallbackChainError,
  type FallbackAttempt,
  type FallbackProvider,
  withTimeout,
} from '@tubeqa/fallback';
import { errorMessage } from '@tubeqa/core';
import { YoutubeTranscriptPlusApi, type TranscriptApi } from './api.js';
import { InvalidVideoUrlError, NoCaptionsError, TranscriptExhaustedError } from './errors.js';
import { DefaultTrackStrategy } from './strategies/default-track.js';
import { PageScrapeStrategy } from './strategies/page-scrape.js';
import { StructuredApiStrategy } from './strategies/structured-api.js';
import type {
  FetchFn,
  StrategyKind,
  StrategyRequest,
  StrategyResult,
  TranscriptStrategy,
} from './strategies/types.js';
import { parseYouTubeVideoId } from './url.js';

const log = pino({ name: 'tubeqa:transcript:orchestrator' });

export interface Transcript {
  videoId: string;
  text: string;
  /** Language actually served, or null when the strategy could not tell. */
  language: string | null;
  requestedLanguage: string;
  /** True when a known served language differs from the requested one. */
  languageSubstituted: boolean;
  strategy: StrategyKind;
  attempts: FallbackAttempt[];
}

export interface TranscriptExtractorOptions {
  /** Caption API for the structured and default-track strategies (default: youtube-transcript-plus). */
  api?: TranscriptApi;
  fetch?: FetchFn;
  requestTimeoutMs?: number;
  /** Ceiling for one whole strategy (default 60 000). */
  strategyTimeoutMs?: number;
  pacingDelayMaxMs?: number;
  userAgent?: string;
  random?: () => number;
  logger?: pino.Logger;
}

export class TranscriptExtractor {
  private readonly structured: StructuredApiStrategy;
  private readonly chain: FallbackChain<StrategyRequest, StrategyResult, StrategyKind>;
  private readonly requestTimeoutMs: number;
  private readonly log: pino.Logger;

  constructor(options: TranscriptExtractorOptions = {}) {
    this.log = options.logger ?? log;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 10_000;
    const api =
      options.api ??
      new YoutubeTranscriptPlusApi({
        userAgent: options.userAgent,
        requestTimeoutMs: this.requestTimeoutMs,
        fetch: options.fetch,
        logger: options.logger,
      });
    this.structured = new StructuredApiStrategy({ api, logger: options.logger });

    const strategies: TranscriptStrategy[] = [
      this.structured,
      new PageScrapeStrategy({
        fetch: options.fetch,
        pacingDelayMaxMs: options.pacingDelayMaxMs,
        requestTimeoutMs: this.requestTimeoutMs,
        userAgent: options.userAgent,
        random: options.random,
        logger: options.logger,
      }),
      new DefaultTrackStrategy(api),
    ];

    const providers: FallbackProvider<StrategyRequest, StrategyResult, StrategyKind>[] =
      strategies.map((strategy, i) => ({
        name: strategy.kind,
        priority: (i + 1) * 10,
        isAvailable: async () => true,
        execute: (request, signal) => strategy.run({ ...request, signal }),
      }));

    this.chain = new FallbackChain({
      providers,
      timeoutMs: options.strategyTimeoutMs ?? 60_000,
      logger: options.logger,
      onFallback: (from, to, error) => {
        this.log.warn({ from, to, error }, 'Transcript strategy failed, trying next');
      },
    });
  }

  /** Strategy names in the order they are tried. */
  strategyOrder(): StrategyKind[] {
    return this.chain.getProviderNames();
  }

  /**
   * Extract the transcript of the video at `url`.
   *
   * @throws InvalidVideoUrlError before any network call when the URL names no video
   * @throws TranscriptExhaustedError (or its NoCaptionsError subclass) when every strategy fails
   */
  async extract(url: string, language: string): Promise<Transcript> {
    const videoId = parseYouTubeVideoId(url);
    if (videoId === null) {
      throw new InvalidVideoUrlError(url);
    }

    try {
      const { result, provider: strategy, attempts } = await this.chain.execute({
        videoId,
        language,
      });
      const languageSubstituted = result.language !== null && result.language !== language;

      this.log.info(
        { videoId, strategy, language: result.language, length: result.text.length },
        'Transcript extracted',
      );

      return {
        videoId,
        text: result.text,
        language: result.language,
        requestedLanguage: language,
        languageSubstituted,
        strategy,
        attempts,
      };
    } catch (err: unknown) {
      if (!(err instanceof FallbackChainError)) throw err;
      throw await this.exhausted(videoId, err.attempts);
    }
  }

  private async exhausted(
    videoId: string,
    attempts: FallbackAttempt[],
  ): Promise<TranscriptExhaustedError> {
    const languages = await this.diagnosticLanguages(videoId);
    this.log.error({ videoId, languages, attempts }, 'All transcript strategies failed');

    if (languages.length === 0) {
      return new NoCaptionsError(videoId, attempts);
    }

    const reasons = attempts
      .map((a) => `${a.provider}: ${a.error ?? 'unknown error'}`)
      .join('; ');
    return new TranscriptExhaustedError(
      `Could not retrieve a transcript for ${videoId}. Available languages: ${languages.join(', ')}. Errors: ${reasons}`,
      videoId,
      languages,
      attempts,
    );
  }

  /** Final language listing, bounded like any other request; a stall counts as none. */
  private async diagnosticLanguages(videoId: string): Promise<string[]> {
    const controller = new AbortController();
    try {
      return await withTimeout(
        this.structured.discoverLanguages(videoId, controller.signal),
        this.requestTimeoutMs,
        'language discovery',
        controller,
      );
    } catch (err: unknown) {
      this.log.warn({ videoId, error: errorMessage(err) }, 'Final language discovery failed');
      return [];
    }
  }
}

/**
 * One-shot extraction with a fresh TranscriptExtractor.
 */
export function extractTranscript(
  url: string,
  language: string,
  options: TranscriptExtractorOptions = {},
): Promise<Transcript> {
  return new TranscriptExtractor(options).extract(url, language);
}
