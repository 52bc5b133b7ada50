import { ValidationError, requireValue } from '@/utils/errors';
import { describe, expect, it } from 'vitest';

describe('utils/errors', () => {
  describe('ValidationError', () => {
    it('should be an Error with its own name', () => {
      const error = new ValidationError('Subject is required.');
      expect(error).toBeInstanceOf(Error);
      expect(error.name).toBe('ValidationError');
      expect(error.message).toBe('Subject is required.');
    });
  });

  describe('requireValue', () => {
    it('should return non-empty values unchanged', () => {
      expect(requireValue('value')).toBe('value');
      expect(requireValue(' ')).toBe(' ');
    });

    it('should reject absent and empty values', () => {
      expect(() => requireValue('')).toThrow(new ValidationError('Field is required.'));
      expect(() => requireValue(null)).toThrow(ValidationError);
      expect(() => requireValue(undefined, 'Scope is required.')).toThrow('Scope is required.');
    });
  });
});
