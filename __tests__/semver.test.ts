import { getNextVersion, isMajorVersionZero } from '@/semver';
import { describe, expect, it } from 'vitest';

describe('semver', () => {
  describe('getNextVersion', () => {
    it('should increment major version and reset minor and patch', () => {
      expect(getNextVersion('v1.2.3', 'major')).toBe('v2.0.0');
    });

    it('should increment minor version and reset patch', () => {
      expect(getNextVersion('v1.2.3', 'minor')).toBe('v1.3.0');
    });

    it('should increment patch version', () => {
      expect(getNextVersion('v1.2.3', 'patch')).toBe('v1.2.4');
    });

    it('should return null when nothing is bumped', () => {
      expect(getNextVersion('v1.2.3', 'none')).toBeNull();
    });

    it('should keep versions without a prefix unprefixed', () => {
      expect(getNextVersion('0.4.0', 'minor')).toBe('0.5.0');
      expect(getNextVersion('0.4.9', 'patch')).toBe('0.4.10');
    });

    it('should throw on an invalid version', () => {
      expect(() => getNextVersion('latest', 'patch')).toThrow(
        new TypeError("Version must be in format v#.#.# or #.#.# (e.g., v1.0.0 or 1.0.0). Got: 'latest'"),
      );
    });
  });

  describe('isMajorVersionZero', () => {
    it('should detect the 0.y.z range', () => {
      expect(isMajorVersionZero('0.4.0')).toBe(true);
      expect(isMajorVersionZero('v0.0.1')).toBe(true);
      expect(isMajorVersionZero('v1.0.0')).toBe(false);
      expect(isMajorVersionZero('10.0.0')).toBe(false);
    });
  });
});
