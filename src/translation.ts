import translations from '../assets/translations.json';
import type { TranslateFn } from '@/types';

/**
 * Localized prompt texts, keyed by language and then by prompt key.
 */
const TRANSLATIONS: Readonly<Record<string, Readonly<Record<string, string>> | undefined>> = translations;

/**
 * Looks up the localized text of a prompt.
 *
 * English is the source language: for `en`, an unknown language, or a key the language does not
 * translate, the English text is returned unchanged.
 *
 * @param text - The English prompt text
 * @param language - Locale code, e.g. `es`
 * @param key - The prompt key, e.g. `subject`
 *
 * @example
 * ```typescript
 * translateTextFromEnglish('Documentation only changes', 'es', 'docs')
 * // → 'Cambios solo en la documentación'
 *
 * translateTextFromEnglish('Documentation only changes', 'xx', 'docs')
 * // → 'Documentation only changes'
 * ```
 */
export const translateTextFromEnglish: TranslateFn = (text, language, key) => {
  return TRANSLATIONS[language]?.[key] ?? text;
};

/**
 * Languages with a translation, besides English.
 */
export function getSupportedLanguages(): string[] {
  return Object.keys(TRANSLATIONS);
}
