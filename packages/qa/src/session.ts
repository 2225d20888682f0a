/**
 * @tubeqa/qa - Transcript Q&A session
 *
 * Holds one video's pipeline and the chat history about it. Processing a
 * new video discards the previous pipeline first; a different URL also
 * clears the history.
 */

import pino from 'pino';
import { errorMessage } from '@tubeqa/core';
import type { Transcript } from '@tubeqa/transcript';
import { InsufficientTranscriptError, SessionNotReadyError } from './errors.js';
import { RetrievalQaPipeline, type PipelineDependencies } from './pipeline.js';

const log = pino({ name: 'tubeqa:qa:session' });

/** Anything that turns a URL and language into a transcript. */
export interface TranscriptSource {
  extract(url: string, language: string): Promise<Transcript>;
}

export interface ChatTurn {
  question: string;
  answer: string;
}

export interface ProcessedVideo {
  transcript: Transcript;
  /** Start of the transcript for display. */
  preview: string;
}

export interface TranscriptQaSessionOptions extends PipelineDependencies {
  extractor: TranscriptSource;
  /** Shortest trimmed transcript worth indexing (default 50). */
  minTranscriptLength?: number;
  /** Preview length before the ellipsis (default 500). */
  previewLength?: number;
}

export class TranscriptQaSession {
  private pipeline: RetrievalQaPipeline | null = null;
  private transcript: Transcript | null = null;
  private videoUrl: string | null = null;
  private turns: ChatTurn[] = [];
  private error: string | null = null;
  private readonly log: pino.Logger;

  constructor(private readonly options: TranscriptQaSessionOptions) {
    this.log = options.logger ?? log;
  }

  get isReady(): boolean {
    return this.pipeline !== null;
  }

  get currentVideoUrl(): string | null {
    return this.videoUrl;
  }

  get currentTranscript(): Transcript | null {
    return this.transcript;
  }

  get lastError(): string | null {
    return this.error;
  }

  /** Copy of the chat history, oldest first. */
  get history(): ChatTurn[] {
    return [...this.turns];
  }

  /**
   * Extract and index the video at `url`.
   * On failure the session is left not ready and `lastError` is set.
   */
  async processVideo(url: string, language: string): Promise<ProcessedVideo> {
    this.discardPipeline();
    if (url !== this.videoUrl) {
      this.turns = [];
    }
    this.videoUrl = url;
    this.error = null;

    try {
      const transcript = await this.options.extractor.extract(url, language);

      const minLength = this.options.minTranscriptLength ?? 50;
      const length = transcript.text.trim().length;
      if (length < minLength) {
        throw new InsufficientTranscriptError(length, minLength);
      }

      this.pipeline = await RetrievalQaPipeline.build(transcript.text, this.options);
      this.transcript = transcript;

      this.log.info(
        { videoId: transcript.videoId, chunks: this.pipeline.chunkCount },
        'Video processed',
      );

      const previewLength = this.options.previewLength ?? 500;
      const preview =
        transcript.text.length > previewLength
          ? `${transcript.text.slice(0, previewLength)}...`
          : transcript.text;
      return { transcript, preview };
    } catch (err: unknown) {
      this.error = errorMessage(err);
      this.log.warn({ url, error: this.error }, 'Video processing failed');
      throw err;
    }
  }

  /**
   * Answer a question about the current video and record the turn.
   */
  async ask(question: string): Promise<string> {
    if (!question.trim()) {
      throw new RangeError('Question must not be empty');
    }
    if (!this.pipeline) {
      throw new SessionNotReadyError();
    }

    const answer = await this.pipeline.answer(question);
    this.turns.push({ question, answer });
    return answer;
  }

  clearHistory(): void {
    this.turns = [];
  }

  /** Forget the video, its pipeline and the history. */
  reset(): void {
    this.discardPipeline();
    this.videoUrl = null;
    this.turns = [];
    this.error = null;
  }

  private discardPipeline(): void {
    this.pipeline?.close();
    this.pipeline = null;
    this.transcript = null;
  }
}
