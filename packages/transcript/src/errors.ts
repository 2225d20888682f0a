/**
 * @tubeqa/transcript - Error types
 *
 * Every failure the acquisition pipeline can report. Strategy-level errors
 * (NoTranscriptsError, TranscriptFetchError, CaptionParseError) are recorded
 * by the orchestrator; only InvalidVideoUrlError and the exhaustion errors
 * reach the caller.
 */

import type { FallbackAttempt } from '@tubeqa/fallback';

export class TranscriptError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TranscriptError';
  }
}

/** The URL does not name a YouTube video. Raised before any network call. */
export class InvalidVideoUrlError extends TranscriptError {
  constructor(public readonly url: string) {
    super(`Invalid YouTube URL: ${url}`);
    this.name = 'InvalidVideoUrlError';
  }
}

/** The platform lists no caption tracks at all for the video. */
export class NoTranscriptsError extends TranscriptError {
  constructor(public readonly videoId: string) {
    super(`No transcripts available for video ${videoId}`);
    this.name = 'NoTranscriptsError';
  }
}

export type FetchStage =
  | 'language'
  | 'page'
  | 'tracks'
  | 'urls'
  | 'download'
  | 'parse';

/** One step of a strategy failed (bad status, timeout, missing marker, bad markup). */
export class TranscriptFetchError extends TranscriptError {
  constructor(
    message: string,
    public readonly stage: FetchStage,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'TranscriptFetchError';
  }
}

/** Caption markup could not be parsed. */
export class CaptionParseError extends TranscriptError {
  constructor(
    message: string,
    public readonly line: number,
    public readonly column: number,
  ) {
    super(`${message} at line ${line}, column ${column}`);
    this.name = 'CaptionParseError';
  }
}

/** Every strategy failed. Carries the per-strategy attempts for diagnosis. */
export class TranscriptExhaustedError extends TranscriptError {
  constructor(
    message: string,
    public readonly videoId: string,
    public readonly availableLanguages: string[],
    public readonly attempts: FallbackAttempt[],
  ) {
    super(message);
    this.name = 'TranscriptExhaustedError';
  }
}

/** Every strategy failed and no caption languages are discoverable. */
export class NoCaptionsError extends TranscriptExhaustedError {
  constructor(videoId: string, attempts: FallbackAttempt[]) {
    super(`No captions available for this video (${videoId}).`, videoId, [], attempts);
    this.name = 'NoCaptionsError';
  }
}
