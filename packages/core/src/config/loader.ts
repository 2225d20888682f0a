/**
 * @tubeqa/core - Configuration loader
 *
 * Loads config.json from TUBEQA_HOME (when present), merges it over the
 * defaults, applies environment overrides and validates the result.
 */

import { readFileSync, existsSync } from 'node:fs';
import { Value } from '@sinclair/typebox/value';
import { TubeqaConfigSchema, DEFAULT_CONFIG, type TubeqaConfig } from './schema.js';
import { validateConfig, type ValidationResult } from './validator.js';
import { resolveConfigPath } from './paths.js';
import { isPlainObject } from '../utils/index.js';

export interface LoadConfigOptions {
  /** Environment to read overrides from. Defaults to process.env. */
  env?: NodeJS.ProcessEnv;
  /** Explicit config file path. Defaults to TUBEQA_CONFIG or TUBEQA_HOME/config.json. */
  configPath?: string;
  /** Values applied after the file and before the environment. */
  overrides?: Record<string, unknown>;
}

/**
 * Deep-merge two objects.  Arrays are replaced (not concatenated).
 */
export function deepMerge(
  base: Record<string, unknown>,
  override: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };

  for (const key of Object.keys(override)) {
    const overVal = override[key];
    const baseVal = result[key];

    if (isPlainObject(overVal) && isPlainObject(baseVal)) {
      result[key] = deepMerge(baseVal, overVal);
    } else if (overVal !== undefined) {
      result[key] = overVal;
    }
  }

  return result;
}

/**
 * Map recognised environment variables onto a partial config.
 */
function envOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const providers: Record<string, unknown> = {};
  const out: Record<string, unknown> = {};

  const googleKey = env['GOOGLE_API_KEY'];
  if (googleKey) {
    providers['google'] = { apiKey: googleKey };
  }

  const ollamaBase = env['OLLAMA_BASE_URL'];
  if (ollamaBase) {
    providers['ollama'] = { baseUrl: ollamaBase };
  }

  if (Object.keys(providers).length > 0) {
    out['providers'] = providers;
  }

  const level = env['TUBEQA_LOG_LEVEL'];
  if (level) {
    out['logging'] = { level };
  }

  return out;
}

function readConfigFile(configPath: string): Record<string, unknown> {
  if (!existsSync(configPath)) {
    return {};
  }

  const text = readFileSync(configPath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new Error(
      `Failed to parse ${configPath}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  if (!isPlainObject(parsed)) {
    throw new Error(`Failed to parse ${configPath}: expected a JSON object`);
  }
  return parsed;
}

/**
 * Load the tubeqa configuration.
 *
 * 1. Read the config file if it exists
 * 2. Deep-merge over DEFAULT_CONFIG, then explicit overrides, then the environment
 * 3. Fill TypeBox defaults
 * 4. Validate
 */
export function loadConfig(
  options: LoadConfigOptions = {},
): { config: TubeqaConfig; validation: ValidationResult } {
  const env = options.env ?? process.env;
  const configPath = options.configPath ?? resolveConfigPath(env);

  const fromFile = readConfigFile(configPath);

  let merged = deepMerge(Value.Clone(DEFAULT_CONFIG), fromFile);
  if (options.overrides) {
    merged = deepMerge(merged, options.overrides);
  }
  merged = deepMerge(merged, envOverrides(env));

  const withDefaults = Value.Default(TubeqaConfigSchema, merged);
  const validation = validateConfig(withDefaults);

  return { config: validation.config, validation };
}
