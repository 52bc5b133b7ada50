import { getSupportedLanguages, translateTextFromEnglish } from '@/translation';
import { describe, expect, it } from 'vitest';

describe('translation', () => {
  describe('translateTextFromEnglish()', () => {
    it('should return the English text for en', () => {
      expect(translateTextFromEnglish('Documentation only changes', 'en', 'docs')).toBe('Documentation only changes');
    });

    it('should look up the localized text by key', () => {
      expect(translateTextFromEnglish('Documentation only changes', 'es', 'docs')).toBe(
        'Cambios solo en la documentación',
      );
      expect(translateTextFromEnglish('A code change that improves performance', 'fr', 'perf')).toBe(
        'Une modification du code qui améliore les performances',
      );
    });

    it('should fall back to the English text for an unknown language or key', () => {
      expect(translateTextFromEnglish('Documentation only changes', 'xx', 'docs')).toBe('Documentation only changes');
      expect(translateTextFromEnglish('Anything', 'es', 'unknown-key')).toBe('Anything');
    });
  });

  describe('getSupportedLanguages()', () => {
    it('should list the bundled translations', () => {
      expect(getSupportedLanguages()).toEqual(['es', 'fr']);
    });
  });
});
