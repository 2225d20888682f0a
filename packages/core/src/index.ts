/**
 * @tubeqa/core - Core package for tubeqa
 *
 * Configuration, the supported language table and shared utilities.
 */

// Configuration
export * from './config/index.js';

// Languages
export {
  SUPPORTED_LANGUAGES,
  isSupportedLanguage,
  languageName,
  type LanguageCode,
} from './languages.js';

// Utilities
export {
  sleep,
  randomDelay,
  errorMessage,
  parseModelId,
  tryParseModelId,
  isPlainObject,
  type ParsedModelId,
} from './utils/index.js';
