import { isMajorVersionZero } from '@/semver';
import type { Config } from '@/types';
import { VERSION_TAG_REGEX } from '@/utils/constants';
import { createConfigFromInputs } from '@/utils/metadata';
import { endGroup, info, startGroup } from '@actions/core';

// Keep configInstance private to this module
let configInstance: Config | null = null;

/**
 * Clears the cached config instance during testing.
 *
 * This utility function is specifically designed for testing scenarios where
 * multiple different configurations need to be tested. It resets the singleton
 * instance to null, allowing the next config initialization to start fresh with
 * new mocked values.
 *
 * @remarks
 * - This function only works when NODE_ENV is set to 'test'
 * - It is intended for testing purposes only and should not be used in production code
 * - Typically used in beforeEach() test setup or before testing different config variations
 */
export function clearConfigForTesting(): void {
  if (process.env.NODE_ENV === 'test') {
    configInstance = null;
  }
}

/**
 * Lazy-initialized configuration object. This is kept separate from the exported
 * config to allow testing utilities to be imported without triggering initialization.
 */
function initializeConfig(): Config {
  if (configInstance) {
    return configInstance;
  }

  try {
    startGroup('Initializing Config');

    // Initialize the config using action metadata; it is only cached once it validates
    const inputs = createConfigFromInputs();

    // Validate current version format
    if (!VERSION_TAG_REGEX.test(inputs.currentVersion)) {
      throw new TypeError(
        `Current version must be in format v#.#.# or #.#.# (e.g., v1.0.0 or 1.0.0). Got: '${inputs.currentVersion}'`,
      );
    }

    // Major version zero only makes sense while the project is at 0.x
    if (inputs.majorVersionZero && !isMajorVersionZero(inputs.currentVersion)) {
      throw new TypeError(
        `major-version-zero is meaningless for current version '${inputs.currentVersion}'. It can only be enabled while the major version is 0.`,
      );
    }

    configInstance = inputs;

    info(`Current Version: ${inputs.currentVersion}`);
    info(`Major Version Zero: ${inputs.majorVersionZero}`);
    info(`Fail On Invalid Commits: ${inputs.failOnInvalidCommits}`);

    return configInstance;
  } finally {
    endGroup();
  }
}

// Create a getter for the config that initializes on first use
export function getConfig(): Config {
  return initializeConfig();
}

// For backward compatibility and existing usage
export const config: Config = new Proxy({} as Config, {
  get(_target, prop) {
    return getConfig()[prop as keyof Config];
  },
});
