/**
 * Shared strategy types.
 */

export type StrategyKind = 'structured-api' | 'page-scrape' | 'default-track';

export interface StrategyRequest {
  videoId: string;
  /** Preferred caption language. */
  language: string;
  /** Aborted when the attempt is abandoned; no request may start after that. */
  signal?: AbortSignal;
}

export interface StrategyResult {
  text: string;
  /** Language actually served, or null when the strategy cannot tell. */
  language: string | null;
}

/** One way of obtaining a transcript. Throws on failure. */
export interface TranscriptStrategy {
  readonly kind: StrategyKind;
  run(request: StrategyRequest): Promise<StrategyResult>;
}

/** Injected HTTP client, shaped like the global fetch. */
export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;
