import type { Config } from '@/types';

/**
 * Configuration interface with added utility methods
 */
interface ConfigWithMethods extends Config {
  set: (overrides: Partial<Config>) => void;
  resetDefaults: () => void;
}

/**
 * Default configuration object.
 */
const defaultConfig: Config = {
  githubToken: 'test-token',
  currentVersion: 'v1.0.0',
  majorVersionZero: false,
  failOnInvalidCommits: false,
};

function isConfigKey(key: string): key is keyof Config {
  return Object.hasOwn(defaultConfig, key);
}

// Store the actual configuration data
let currentConfig: Config = { ...defaultConfig };

/**
 * Config proxy handler. Reads go to the current configuration; use `set()` to override values.
 */
const configProxyHandler: ProxyHandler<ConfigWithMethods> = {
  get(_target: ConfigWithMethods, prop: string | symbol): unknown {
    if (typeof prop !== 'string') {
      return undefined;
    }
    if (prop === 'set') {
      return (overrides: Partial<Config> = {}) => {
        currentConfig = { ...currentConfig, ...overrides };
      };
    }
    if (prop === 'resetDefaults') {
      return () => {
        currentConfig = { ...defaultConfig };
      };
    }

    return isConfigKey(prop) ? currentConfig[prop] : undefined;
  },
};

/**
 * Returns the current configuration.
 */
export function getConfig(): Config {
  return currentConfig;
}

/**
 * No-op; the mocked configuration is not cached.
 */
export function clearConfigForTesting(): void {}

/**
 * Create and export the config object directly with the proxy
 */
export const config: ConfigWithMethods = new Proxy({} as ConfigWithMethods, configProxyHandler);
