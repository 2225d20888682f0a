/**
 * @tubeqa/fallback - Priority-ordered fallback execution
 *
 * Tries providers in order with per-provider timeouts and records every
 * attempt so callers can explain what failed.
 *
 * @packageDocumentation
 */

export {
  FallbackChain,
  FallbackChainError,
  HttpError,
  withTimeout,
  type FallbackProvider,
  type FallbackAttempt,
  type FallbackResult,
  type FallbackChainOptions,
} from './chain.js';
