/**
 * @tubeqa/core - Common utilities
 *
 * Shared helper functions used across the tubeqa packages.
 */

// ---------------------------------------------------------------------------
// Async helpers
// ---------------------------------------------------------------------------

/**
 * Sleep for a given number of milliseconds.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Sleep for a random duration in [0, maxMs).
 *
 * @param random - Source of randomness in [0, 1); injectable for tests
 * @returns The number of milliseconds slept
 */
export async function randomDelay(maxMs: number, random: () => number = Math.random): Promise<number> {
  const ms = maxMs > 0 ? Math.floor(random() * maxMs) : 0;
  if (ms > 0) {
    await sleep(ms);
  }
  return ms;
}

// ---------------------------------------------------------------------------
// Error helpers
// ---------------------------------------------------------------------------

/**
 * Render any thrown value as a message string.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ---------------------------------------------------------------------------
// Model ID parsing
// ---------------------------------------------------------------------------

export interface ParsedModelId {
  provider: string;
  model: string;
  raw: string;
}

/**
 * Parse a model identifier in "provider/model" format.
 *
 * @param modelId - The model ID string (e.g. "google/gemini-2.0-flash")
 * @throws Error if the format is invalid
 */
export function parseModelId(modelId: string): ParsedModelId {
  const slashIndex = modelId.indexOf('/');

  if (slashIndex === -1) {
    throw new Error(
      `Invalid model ID "${modelId}": expected format "provider/model" (e.g. "google/gemini-2.0-flash")`,
    );
  }

  const provider = modelId.slice(0, slashIndex).toLowerCase().trim();
  const model = modelId.slice(slashIndex + 1).trim();

  if (!provider || !model) {
    throw new Error(
      `Invalid model ID "${modelId}": provider and model name must not be empty`,
    );
  }

  return { provider, model, raw: modelId };
}

/**
 * Safely parse a model ID, returning null instead of throwing.
 */
export function tryParseModelId(modelId: string): ParsedModelId | null {
  try {
    return parseModelId(modelId);
  } catch {
    return null;
  }
}

// ---------------------------------------------------------------------------
// Object helpers
// ---------------------------------------------------------------------------

/**
 * Check if a value is a non-null object (not an array).
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
