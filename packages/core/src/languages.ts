/**
 * @tubeqa/core - Supported caption languages
 *
 * The language preference a caller may pass to transcript extraction. It is a
 * fetch hint only; nothing checks it against what the platform actually has.
 */

export const SUPPORTED_LANGUAGES = {
  en: 'English',
  hi: 'Hindi',
  es: 'Spanish',
  fr: 'French',
  de: 'German',
  it: 'Italian',
  pt: 'Portuguese',
  ru: 'Russian',
  ja: 'Japanese',
  ko: 'Korean',
  zh: 'Chinese',
  ar: 'Arabic',
  bn: 'Bengali',
  ta: 'Tamil',
  te: 'Telugu',
  ml: 'Malayalam',
  kn: 'Kannada',
  gu: 'Gujarati',
  pa: 'Punjabi',
  mr: 'Marathi',
  ur: 'Urdu',
} as const;

export type LanguageCode = keyof typeof SUPPORTED_LANGUAGES;

export function isSupportedLanguage(code: string): code is LanguageCode {
  return Object.prototype.hasOwnProperty.call(SUPPORTED_LANGUAGES, code);
}

/** Display name for a code; unknown codes are returned unchanged. */
export function languageName(code: string): string {
  return isSupportedLanguage(code) ? SUPPORTED_LANGUAGES[code] : code;
}
