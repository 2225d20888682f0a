export { TubeqaConfigSchema, DEFAULT_CONFIG, type TubeqaConfig, type LogLevel } from './schema.js';
export { loadConfig, deepMerge, type LoadConfigOptions } from './loader.js';
export { validateConfig, isValidModelFormat, KNOWN_PROVIDERS, type ValidationResult, type ValidationError, type ValidationWarning } from './validator.js';
export { resolveTubeqaHome, resolveConfigPath } from './paths.js';
