/**
 * User-facing failure descriptions.
 *
 * Collapses any error from extraction into one of four families, each with
 * a short message and a tip the UI can show as is.
 */

import { errorMessage, languageName } from '@tubeqa/core';
import {
  InvalidVideoUrlError,
  NoCaptionsError,
  NoTranscriptsError,
  TranscriptExhaustedError,
} from './errors.js';

export type FailureFamily = 'invalid-url' | 'no-captions' | 'language-mismatch' | 'generic';

export interface FailureDescription {
  family: FailureFamily;
  message: string;
  tip: string;
}

export function describeFailure(err: unknown): FailureDescription {
  if (err instanceof InvalidVideoUrlError) {
    return {
      family: 'invalid-url',
      message: 'That does not look like a YouTube video link.',
      tip: 'Use a link like https://www.youtube.com/watch?v=<id> or https://youtu.be/<id>.',
    };
  }

  if (err instanceof NoCaptionsError || err instanceof NoTranscriptsError) {
    return {
      family: 'no-captions',
      message: 'This video has no captions available.',
      tip: 'Try a video with subtitles or auto-generated captions enabled.',
    };
  }

  if (err instanceof TranscriptExhaustedError) {
    const names = err.availableLanguages.map((code) => `${languageName(code)} (${code})`);
    return {
      family: 'language-mismatch',
      message: `Captions exist but could not be retrieved in the requested language. Available: ${names.join(', ')}.`,
      tip: 'Select one of the available languages and try again.',
    };
  }

  return {
    family: 'generic',
    message: `Something went wrong: ${errorMessage(err)}`,
    tip: 'Check your connection and try again in a moment.',
  };
}
