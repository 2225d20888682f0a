/**
 * @tubeqa/fallback - FallbackChain
 *
 * Generic fallback chain that tries providers in priority order,
 * with configurable timeouts and detailed attempt tracking.
 */

import pino from 'pino';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** A provider that can be registered into a FallbackChain. */
export interface FallbackProvider<I, T, N extends string = string> {
  /** Human-readable name (e.g. "structured-api", "page-scrape"). */
  name: N;
  /**
   * Execute the provider logic and return a result. `signal` is aborted when
   * the chain gives up on this attempt.
   */
  execute: (input: I, signal: AbortSignal) => Promise<T>;
  /** Returns true when the provider is reachable / configured. */
  isAvailable: () => Promise<boolean>;
  /** Lower number = tried first. */
  priority: number;
}

/** Record of a single attempt within a chain execution. */
export interface FallbackAttempt {
  provider: string;
  success: boolean;
  error?: string;
  durationMs: number;
}

/** Successful chain execution result. */
export interface FallbackResult<T, N extends string = string> {
  result: T;
  provider: N;
  attempts: FallbackAttempt[];
}

/** Options accepted by FallbackChain constructor. */
export interface FallbackChainOptions<I, T, N extends string = string> {
  /** Providers (sorted by priority internally; equal priorities keep their given order). */
  providers: FallbackProvider<I, T, N>[];
  /** Per-provider timeout in milliseconds (default 30 000). */
  timeoutMs?: number;
  /** Called whenever we fall back from one provider to the next. */
  onFallback?: (from: string, to: string, error: string) => void;
  /** Custom pino logger instance. */
  logger?: pino.Logger;
}

// ---------------------------------------------------------------------------
// HTTP helpers
// ---------------------------------------------------------------------------

/**
 * Error that carries an HTTP status code from a non-OK response.
 */
export class HttpError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

// ---------------------------------------------------------------------------
// Timeout helper
// ---------------------------------------------------------------------------

/**
 * Race a promise against a timeout. Rejects with a descriptive error when
 * the timeout fires first, aborting `controller` with that same error.
 */
export function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  label: string,
  controller?: AbortController,
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      const error = new Error(`Provider "${label}" timed out after ${ms}ms`);
      controller?.abort(error);
      reject(error);
    }, ms);

    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (err: unknown) => {
        clearTimeout(timer);
        reject(err);
      },
    );
  });
}

// ---------------------------------------------------------------------------
// FallbackChain
// ---------------------------------------------------------------------------

/**
 * Executes providers in priority order until one succeeds.
 *
 * ```ts
 * const chain = new FallbackChain({
 *   providers: [structuredApi, pageScrape, defaultTrack],
 *   timeoutMs: 60_000,
 *   onFallback: (from, to, err) => log.warn({ from, to, err }, 'falling back'),
 * });
 * const { result, provider, attempts } = await chain.execute(request);
 * ```
 */
export class FallbackChain<I, T, N extends string = string> {
  private readonly providers: FallbackProvider<I, T, N>[];
  private readonly timeoutMs: number;
  private readonly onFallback?: (from: string, to: string, error: string) => void;
  private readonly log: pino.Logger;

  constructor(options: FallbackChainOptions<I, T, N>) {
    // Array.prototype.sort is stable, so equal priorities keep insertion order
    this.providers = [...options.providers].sort((a, b) => a.priority - b.priority);
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.onFallback = options.onFallback;
    this.log = options.logger ?? pino({ name: 'tubeqa:fallback' });
  }

  // -----------------------------------------------------------------------
  // Public API
  // -----------------------------------------------------------------------

  /**
   * Execute the chain against `input`. Tries each provider in priority order,
   * skipping unavailable ones. Every failure is recorded and the next provider
   * is tried; the chain throws only once all providers are exhausted.
   */
  async execute(input: I): Promise<FallbackResult<T, N>> {
    const attempts: FallbackAttempt[] = [];
    let lastError: string | undefined;

    for (const [i, provider] of this.providers.entries()) {
      const next = this.providers[i + 1];

      // --- availability check ------------------------------------------------
      let available: boolean;
      try {
        available = await provider.isAvailable();
      } catch (err: unknown) {
        this.log.warn(
          { provider: provider.name, error: err instanceof Error ? err.message : String(err) },
          'isAvailable() threw -- treating as unavailable',
        );
        available = false;
      }

      if (!available) {
        this.log.info({ provider: provider.name }, 'Provider unavailable, skipping');
        attempts.push({
          provider: provider.name,
          success: false,
          error: 'Provider unavailable',
          durationMs: 0,
        });
        lastError = 'Provider unavailable';

        if (this.onFallback && next) {
          this.onFallback(provider.name, next.name, 'Provider unavailable');
        }
        continue;
      }

      // --- execution ---------------------------------------------------------
      const start = performance.now();
      try {
        const controller = new AbortController();
        const result = await withTimeout(
          provider.execute(input, controller.signal),
          this.timeoutMs,
          provider.name,
          controller,
        );
        const durationMs = Math.round(performance.now() - start);

        this.log.info({ provider: provider.name, durationMs }, 'Provider succeeded');

        attempts.push({
          provider: provider.name,
          success: true,
          durationMs,
        });

        return { result, provider: provider.name, attempts };
      } catch (err: unknown) {
        const durationMs = Math.round(performance.now() - start);
        const errorMessage = err instanceof Error ? err.message : String(err);

        this.log.warn({ provider: provider.name, durationMs, error: errorMessage }, 'Provider failed');

        attempts.push({
          provider: provider.name,
          success: false,
          error: errorMessage,
          durationMs,
        });

        lastError = errorMessage;

        if (this.onFallback && next) {
          this.onFallback(provider.name, next.name, errorMessage);
        }
      }
    }

    // All providers exhausted
    throw new FallbackChainError(
      `All ${this.providers.length} providers failed. Last error: ${lastError ?? 'unknown'}`,
      attempts,
    );
  }

  /**
   * Return the ordered list of provider names (by priority).
   */
  getProviderNames(): N[] {
    return this.providers.map((p) => p.name);
  }
}

// ---------------------------------------------------------------------------
// FallbackChainError
// ---------------------------------------------------------------------------

/** Error thrown when the entire chain is exhausted. */
export class FallbackChainError extends Error {
  public readonly attempts: FallbackAttempt[];

  constructor(message: string, attempts: FallbackAttempt[]) {
    super(message);
    this.name = 'FallbackChainError';
    this.attempts = attempts;
  }
}
