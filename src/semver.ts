import type { BumpSeverity } from '@/types';
import { BUMP_SEVERITY, VERSION_TAG_REGEX } from '@/utils/constants';

/**
 * Splits a `v#.#.#` or `#.#.#` version into its numeric parts.
 *
 * @throws {TypeError} When the version is not in one of those formats.
 */
function parseVersion(version: string): [number, number, number] {
  const match = VERSION_TAG_REGEX.exec(version);
  if (match === null) {
    throw new TypeError(`Version must be in format v#.#.# or #.#.# (e.g., v1.0.0 or 1.0.0). Got: '${version}'`);
  }

  return [Number(match[1]), Number(match[2]), Number(match[3])];
}

/**
 * Whether a version is in the major version zero range (`0.y.z`).
 *
 * @param {string} version - Version in the format `v#.#.#` or `#.#.#`.
 * @returns {boolean} True when the major version is 0.
 */
export function isMajorVersionZero(version: string): boolean {
  return parseVersion(version)[0] === 0;
}

/**
 * Computes the next version based on the current version and the bump severity.
 *
 * This function increments the version based on semantic versioning rules:
 * - If the severity is 'major', it increments the major version and resets the minor and patch versions.
 * - If the severity is 'minor', it increments the minor version and resets the patch version.
 * - If the severity is 'patch', it increments the patch version.
 * - If the severity is 'none', there is no next version.
 *
 * A leading "v" on the current version is kept on the result.
 *
 * @param {string} currentVersion - The current version, e.g. `v1.2.3` or `0.4.0`.
 * @param {BumpSeverity} bump - The bump to apply.
 * @returns {string | null} The next version, or null when nothing is bumped.
 */
export function getNextVersion(currentVersion: string, bump: BumpSeverity): string | null {
  if (bump === BUMP_SEVERITY.NONE) {
    return null;
  }

  const semver = parseVersion(currentVersion);
  if (bump === BUMP_SEVERITY.MAJOR) {
    semver[0]++;
    semver[1] = 0;
    semver[2] = 0;
  } else if (bump === BUMP_SEVERITY.MINOR) {
    semver[1]++;
    semver[2] = 0;
  } else {
    semver[2]++;
  }

  const prefix = currentVersion.startsWith('v') ? 'v' : '';

  return `${prefix}${semver.join('.')}`;
}
