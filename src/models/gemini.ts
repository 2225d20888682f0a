/**
 * Gemini completion model.
 *
 * Calls the Generative Language API `generateContent` endpoint with a single
 * user turn and returns the concatenated text of the first candidate.
 */

import pino from 'pino';
import { Type } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { HttpError } from '@tubeqa/fallback';
import type { CompletionModel, CompletionOptions } from '@tubeqa/qa';
import type { HttpFetch } from './provider.js';

const log = pino({ name: 'tubeqa:models:gemini' });

const DEFAULT_BASE = 'https://generativelanguage.googleapis.com';

const GenerateContentResponse = Type.Object({
  candidates: Type.Array(
    Type.Object({
      content: Type.Object({
        parts: Type.Array(Type.Object({ text: Type.Optional(Type.String()) })),
      }),
    }),
  ),
});

export interface GeminiProviderOptions {
  apiKey: string;
  baseUrl?: string;
  /** Default sampling temperature when a call gives none. */
  temperature?: number;
  timeoutMs?: number;
  fetch?: HttpFetch;
}

export class GeminiProvider implements CompletionModel {
  readonly name = 'google';
  readonly model: string;

  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly temperature?: number;
  private readonly timeoutMs: number;
  private readonly fetchFn: HttpFetch;

  constructor(model: string, options: GeminiProviderOptions) {
    this.model = model;
    this.apiKey = options.apiKey;
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE).replace(/\/+$/, '');
    this.temperature = options.temperature;
    this.timeoutMs = options.timeoutMs ?? 60_000;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
  }

  async complete(prompt: string, options?: CompletionOptions): Promise<string> {
    const generationConfig: Record<string, unknown> = {};
    const temperature = options?.temperature ?? this.temperature;
    if (temperature !== undefined) {
      generationConfig['temperature'] = temperature;
    }
    if (options?.maxTokens !== undefined) {
      generationConfig['maxOutputTokens'] = options.maxTokens;
    }

    const res = await this.fetchFn(
      `${this.baseUrl}/v1beta/models/${this.model}:generateContent`,
      {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'x-goog-api-key': this.apiKey,
        },
        body: JSON.stringify({
          contents: [{ role: 'user', parts: [{ text: prompt }] }],
          generationConfig,
        }),
        signal: AbortSignal.timeout(this.timeoutMs),
      },
    );

    if (!res.ok) {
      const errorBody = await res.text();
      throw new HttpError(`Gemini API error ${res.status}: ${errorBody}`, res.status);
    }

    const data: unknown = await res.json();
    if (!Value.Check(GenerateContentResponse, data)) {
      throw new Error('Gemini response has no candidates');
    }

    const [first] = data.candidates;
    if (!first) {
      throw new Error('Gemini returned no candidates');
    }

    const text = first.content.parts.map((p) => p.text ?? '').join('');
    log.debug({ model: this.model, length: text.length }, 'Completion received');
    return text;
  }
}
