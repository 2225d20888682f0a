/**
 * @tubeqa/qa - Completion model port
 */

export interface CompletionOptions {
  temperature?: number;
  maxTokens?: number;
}

/** Prompt text in, answer text out. */
export interface CompletionModel {
  /** Provider name (e.g. 'google', 'ollama'). */
  readonly name: string;
  /** The specific model being used. */
  readonly model: string;
  complete(prompt: string, options?: CompletionOptions): Promise<string>;
}
