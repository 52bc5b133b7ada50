import { createMockOctokit } from '@/tests/helpers/octokit';
import type { Context, Repo } from '@/types';
import { merge } from 'ts-deepmerge';

/**
 * Default repository configuration
 */
const defaultRepo: Repo = {
  owner: 'octo-org',
  repo: 'octo-repo',
};

/**
 * Context interface with added utility methods
 */
export interface ContextWithMethods extends Context {
  set: (overrides?: Partial<Context>) => void;
  reset: () => void;
}

function createDefaultContext(): Context {
  return {
    repo: defaultRepo,
    octokit: createMockOctokit(),
    prNumber: 1,
  };
}

function isContextKey(key: string): key is keyof Context {
  return ['repo', 'octokit', 'prNumber'].includes(key);
}

// Store the current context configuration
let currentContext: Context = createDefaultContext();

/**
 * Context proxy handler
 */
const contextProxyHandler: ProxyHandler<ContextWithMethods> = {
  get(_target: ContextWithMethods, prop: string | symbol): unknown {
    if (typeof prop !== 'string') {
      return undefined;
    }
    if (prop === 'set') {
      return (overrides: Partial<Context> = {}) => {
        currentContext = { ...currentContext, ...overrides };
      };
    }
    if (prop === 'reset') {
      return () => {
        currentContext = createDefaultContext();
      };
    }

    return isContextKey(prop) ? currentContext[prop] : undefined;
  },
};

/**
 * Create and export the context mock directly with the proxy
 */
export const context = new Proxy({} as ContextWithMethods, contextProxyHandler);

/**
 * Returns the current context configuration
 */
export function getContext(): Context {
  return currentContext;
}

/**
 * No-op; the mocked context is not cached.
 */
export function clearContextForTesting(): void {}

/**
 * Default pull request payload for testing
 */
const defaultPullRequestPayload = {
  action: 'opened',
  pull_request: {
    number: 123,
    title: 'Test PR',
    body: 'Test PR body',
  },
  repository: {
    full_name: 'octo-org/octo-repo',
  },
};

/**
 * Create a mock pull request factory function
 */
export function createPullRequestMock(overrides: Record<string, unknown> = {}) {
  return merge(defaultPullRequestPayload, overrides);
}
