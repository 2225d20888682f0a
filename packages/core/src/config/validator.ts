/**
 * @tubeqa/core - Configuration validator
 *
 * Validates a TubeqaConfig object using TypeBox and applies business rules
 * (chunk overlap, retrieval sizes, model format, provider credentials).
 */

import { Value } from '@sinclair/typebox/value';
import { TubeqaConfigSchema, type TubeqaConfig } from './schema.js';
import { isSupportedLanguage } from '../languages.js';
import { tryParseModelId } from '../utils/index.js';

/** Validation result */
export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
  warnings: ValidationWarning[];
  config: TubeqaConfig;
}

export interface ValidationError {
  path: string;
  message: string;
}

export interface ValidationWarning {
  path: string;
  message: string;
}

/** Model identifier format regex: provider/model-name */
const MODEL_FORMAT_RE = /^[a-zA-Z0-9_-]+\/[a-zA-Z0-9._-]+$/;

export const KNOWN_PROVIDERS = ['google', 'ollama'] as const;

/**
 * Validate and normalise a TubeqaConfig object.
 *
 * 1. TypeBox schema check
 * 2. Chunk overlap must be smaller than chunk size
 * 3. Retrieval k must not exceed fetchK
 * 4. Model ids must be provider/model with a known provider
 * 5. Google models need an API key
 */
export function validateConfig(raw: unknown): ValidationResult {
  const errors: ValidationError[] = [];
  const warnings: ValidationWarning[] = [];

  // ----- TypeBox schema validation -----
  for (const err of Value.Errors(TubeqaConfigSchema, raw)) {
    errors.push({ path: err.path, message: err.message });
  }

  // Cast keeps every valid value and replaces invalid ones with defaults,
  // so callers always get a usable config alongside the error list.
  const config = Value.Cast(
    TubeqaConfigSchema,
    Value.Default(TubeqaConfigSchema, Value.Clone(raw)),
  );

  // ----- Business rules -----
  if (config.chunking.chunkOverlap >= config.chunking.chunkSize) {
    errors.push({
      path: '/chunking/chunkOverlap',
      message: `chunkOverlap (${config.chunking.chunkOverlap}) must be smaller than chunkSize (${config.chunking.chunkSize})`,
    });
  }

  if (config.retrieval.k > config.retrieval.fetchK) {
    errors.push({
      path: '/retrieval/k',
      message: `k (${config.retrieval.k}) must not exceed fetchK (${config.retrieval.fetchK})`,
    });
  }

  for (const key of ['chat', 'embedding'] as const) {
    const modelId = config.models[key];
    const path = `/models/${key}`;

    if (!MODEL_FORMAT_RE.test(modelId)) {
      errors.push({
        path,
        message: `Model "${modelId}" must be in provider/model format (e.g. google/gemini-2.0-flash)`,
      });
      continue;
    }

    const parsed = tryParseModelId(modelId);
    if (parsed && !isKnownProvider(parsed.provider)) {
      errors.push({
        path,
        message: `Unknown provider "${parsed.provider}". Supported: ${KNOWN_PROVIDERS.join(', ')}`,
      });
    }

    if (parsed?.provider === 'google' && !config.providers.google.apiKey) {
      errors.push({
        path: '/providers/google/apiKey',
        message: `GOOGLE_API_KEY not found (required by ${modelId})`,
      });
    }
  }

  if (!isSupportedLanguage(config.transcript.defaultLanguage)) {
    warnings.push({
      path: '/transcript/defaultLanguage',
      message: `Language "${config.transcript.defaultLanguage}" is not in the supported list; it will still be sent as a hint`,
    });
  }

  // Duplicate key errors for the same path (two google models) read badly.
  const seen = new Set<string>();
  const deduped = errors.filter((e) => {
    const key = `${e.path}\u0000${e.message.split(' (required by')[0]}`;
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });

  return {
    valid: deduped.length === 0,
    errors: deduped,
    warnings,
    config,
  };
}

/**
 * Validate a single model identifier string.
 */
export function isValidModelFormat(model: string): boolean {
  return MODEL_FORMAT_RE.test(model);
}

function isKnownProvider(provider: string): boolean {
  return KNOWN_PROVIDERS.some((p) => p === provider);
}
