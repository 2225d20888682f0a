/**
 * Ollama completion model.
 *
 * Uses the local server's non-streaming `/api/generate` endpoint.
 * No API key; data stays local.
 */

import pino from 'pino';
import { Type } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { HttpError } from '@tubeqa/fallback';
import type { CompletionModel, CompletionOptions } from '@tubeqa/qa';
import type { HttpFetch } from './provider.js';

const log = pino({ name: 'tubeqa:models:ollama' });

const DEFAULT_BASE = 'http://localhost:11434';

const GenerateResponse = Type.Object({ response: Type.String() });

export interface OllamaProviderOptions {
  baseUrl?: string;
  temperature?: number;
  timeoutMs?: number;
  fetch?: HttpFetch;
}

export class OllamaProvider implements CompletionModel {
  readonly name = 'ollama';
  readonly model: string;

  private readonly baseUrl: string;
  private readonly temperature?: number;
  private readonly timeoutMs: number;
  private readonly fetchFn: HttpFetch;

  constructor(model: string, options: OllamaProviderOptions = {}) {
    this.model = model;
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE).replace(/\/+$/, '');
    this.temperature = options.temperature;
    this.timeoutMs = options.timeoutMs ?? 120_000;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
  }

  async complete(prompt: string, options?: CompletionOptions): Promise<string> {
    const ollamaOptions: Record<string, unknown> = {};
    const temperature = options?.temperature ?? this.temperature;
    if (temperature !== undefined) {
      ollamaOptions['temperature'] = temperature;
    }
    if (options?.maxTokens !== undefined) {
      ollamaOptions['num_predict'] = options.maxTokens;
    }

    const res = await this.fetchFn(`${this.baseUrl}/api/generate`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        model: this.model,
        prompt,
        stream: false,
        options: ollamaOptions,
      }),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!res.ok) {
      const errorBody = await res.text();
      throw new HttpError(`Ollama API error ${res.status}: ${errorBody}`, res.status);
    }

    const data: unknown = await res.json();
    if (!Value.Check(GenerateResponse, data)) {
      throw new Error('Ollama response has no "response" field');
    }

    log.debug({ model: this.model, length: data.response.length }, 'Completion received');
    return data.response;
  }
}
