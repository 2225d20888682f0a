/**
 * Page-scrape strategy.
 *
 * Fetches the watch page, pulls the first caption-track URL out of the
 * embedded player data, downloads the caption XML and parses it. Each step
 * fails with its own message and stage.
 */

import pino from 'pino';
import { errorMessage, randomDelay } from '@tubeqa/core';
import { captionXmlToText } from '../caption-xml.js';
import { extractCaptionUrls, findCaptionTracks } from '../caption-tracks.js';
import { TranscriptFetchError } from '../errors.js';
import { watchPageUrl } from '../url.js';
import type { FetchFn, StrategyRequest, StrategyResult, TranscriptStrategy } from './types.js';

const log = pino({ name: 'tubeqa:transcript:page-scrape' });

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

export interface PageScrapeStrategyOptions {
  fetch?: FetchFn;
  /** Upper bound of the random pause before the first request (default 2000). */
  pacingDelayMaxMs?: number;
  /** Per-request timeout (default 10 000). */
  requestTimeoutMs?: number;
  userAgent?: string;
  /** Randomness source for the pacing delay. */
  random?: () => number;
  logger?: pino.Logger;
}

export class PageScrapeStrategy implements TranscriptStrategy {
  readonly kind = 'page-scrape' as const;

  private readonly fetchFn: FetchFn;
  private readonly pacingDelayMaxMs: number;
  private readonly requestTimeoutMs: number;
  private readonly userAgent: string;
  private readonly random: () => number;
  private readonly log: pino.Logger;

  constructor(options: PageScrapeStrategyOptions = {}) {
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.pacingDelayMaxMs = options.pacingDelayMaxMs ?? 2000;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 10_000;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.random = options.random ?? Math.random;
    this.log = options.logger ?? log;
  }

  async run(request: StrategyRequest): Promise<StrategyResult> {
    const { videoId, signal } = request;

    const delayMs = await randomDelay(this.pacingDelayMaxMs, this.random);
    this.log.debug({ videoId, delayMs }, 'Paced before page fetch');

    const html = await this.get(watchPageUrl(videoId), 'page', 'Could not access video page', signal);

    const tracks = findCaptionTracks(html);
    if (tracks === null) {
      throw new TranscriptFetchError('No caption tracks found in video page', 'tracks');
    }

    const [track] = extractCaptionUrls(tracks);
    if (!track) {
      throw new TranscriptFetchError('No caption URLs found in caption tracks', 'urls');
    }
    this.log.debug({ videoId, language: track.languageCode }, 'Selected caption track');

    const xml = await this.get(track.baseUrl, 'download', 'Could not download captions', signal);

    let text: string;
    try {
      text = captionXmlToText(xml);
    } catch (err: unknown) {
      throw new TranscriptFetchError(`Could not parse captions: ${errorMessage(err)}`, 'parse', {
        cause: err,
      });
    }
    if (!text) {
      throw new TranscriptFetchError('Caption document contained no text', 'parse');
    }

    return { text, language: track.languageCode };
  }

  /** GET `url` and read its body; every failure carries `failure` and `stage`. */
  private async get(
    url: string,
    stage: 'page' | 'download',
    failure: string,
    signal: AbortSignal | undefined,
  ): Promise<string> {
    if (signal?.aborted) {
      throw new TranscriptFetchError(`${failure}: attempt abandoned`, stage, { cause: signal.reason });
    }

    const timeout = AbortSignal.timeout(this.requestTimeoutMs);
    let response: Response;
    let body: string;
    try {
      response = await this.fetchFn(url, {
        headers: {
          'User-Agent': this.userAgent,
          'Accept-Language': 'en-US,en;q=0.9',
          Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
        },
        signal: signal ? AbortSignal.any([timeout, signal]) : timeout,
      });
      body = await response.text();
    } catch (err: unknown) {
      throw new TranscriptFetchError(`${failure}: ${errorMessage(err)}`, stage, { cause: err });
    }

    if (response.status !== 200) {
      throw new TranscriptFetchError(`${failure} (HTTP ${response.status})`, stage);
    }
    return body;
  }
}
