/**
 * Completion model factory.
 *
 * Builds the CompletionModel for a "provider/model" identifier, passing the
 * credentials it needs explicitly.
 */

import { parseModelId } from '@tubeqa/core';
import type { CompletionModel } from '@tubeqa/qa';

/** Injected HTTP client, shaped like the global fetch. */
export type HttpFetch = (input: string, init?: RequestInit) => Promise<Response>;

export interface CompletionModelConfig {
  google?: { apiKey?: string; baseUrl?: string };
  ollama?: { baseUrl?: string };
  temperature?: number;
  timeoutMs?: number;
  fetch?: HttpFetch;
}

/**
 * Create a CompletionModel for the given model ID.
 *
 * @param modelId - Full model identifier (e.g. "google/gemini-2.0-flash", "ollama/llama3.1")
 */
export async function createCompletionModel(
  modelId: string,
  config: CompletionModelConfig = {},
): Promise<CompletionModel> {
  const { provider, model } = parseModelId(modelId);

  switch (provider) {
    case 'google': {
      const apiKey = config.google?.apiKey;
      if (!apiKey) {
        throw new Error(`GOOGLE_API_KEY not found (required by ${modelId})`);
      }
      const { GeminiProvider } = await import('./gemini.js');
      return new GeminiProvider(model, {
        apiKey,
        baseUrl: config.google?.baseUrl,
        temperature: config.temperature,
        timeoutMs: config.timeoutMs,
        fetch: config.fetch,
      });
    }
    case 'ollama': {
      const { OllamaProvider } = await import('./ollama.js');
      return new OllamaProvider(model, {
        baseUrl: config.ollama?.baseUrl,
        temperature: config.temperature,
        timeoutMs: config.timeoutMs,
        fetch: config.fetch,
      });
    }
    default:
      throw new Error(
        `Unknown provider "${provider}" in model ID "${modelId}". Supported: google, ollama`,
      );
  }
}
