import * as fs from 'node:fs';
import { config } from '@/config';
import type { Context, Repo } from '@/types';
import { endGroup, info, startGroup } from '@actions/core';
import { Octokit } from '@octokit/core';
import { paginateRest } from '@octokit/plugin-paginate-rest';
import { restEndpointMethods } from '@octokit/plugin-rest-endpoint-methods';
import type { PullRequestEvent } from '@octokit/webhooks-types';
import { homepage, version } from '../package.json';

const DEFAULT_API_URL = 'https://api.github.com';

/**
 * The part of a `pull_request` event payload the action relies on.
 */
type PullRequestPayload = { pull_request: Pick<PullRequestEvent['pull_request'], 'number'> };

let contextInstance: Context | null = null;

/**
 * Retrieves an environment variable GitHub sets for every workflow run.
 *
 * @throws {Error} If the variable is missing or empty.
 */
function getRequiredEnvironmentVar(name: string): string {
  const value = process.env[name];
  if (!value) {
    throw new Error(
      `The ${name} environment variable is missing or invalid. This variable should be automatically set by GitHub for each workflow run. Please review the workflow setup.`,
    );
  }

  return value;
}

/**
 * Splits `GITHUB_REPOSITORY` (`owner/name`) into its parts.
 */
function parseRepository(repository: string): Repo {
  const [owner, repo, ...rest] = repository.split('/');
  if (!owner || !repo || rest.length > 0) {
    throw new Error(`GITHUB_REPOSITORY must be in the form owner/name. Got: '${repository}'`);
  }

  return { owner, repo };
}

function isPullRequestPayload(payload: unknown): payload is PullRequestPayload {
  if (typeof payload !== 'object' || payload === null || !('pull_request' in payload)) {
    return false;
  }

  const pullRequest = payload.pull_request;
  return (
    typeof pullRequest === 'object' &&
    pullRequest !== null &&
    'number' in pullRequest &&
    typeof pullRequest.number === 'number'
  );
}

/**
 * Reads the pull request number from the event payload file.
 */
function readPullRequestNumber(eventPath: string): number {
  if (!fs.existsSync(eventPath)) {
    throw new Error(`Specified GITHUB_EVENT_PATH ${eventPath} does not exist`);
  }

  const payload: unknown = JSON.parse(fs.readFileSync(eventPath, { encoding: 'utf8' }));
  if (!isPullRequestPayload(payload)) {
    throw new Error('Event payload did not match expected pull_request event payload');
  }

  return payload.pull_request.number;
}

/**
 * Clears the cached context instance during testing. Only works when NODE_ENV is 'test'.
 */
export function clearContextForTesting(): void {
  if (process.env.NODE_ENV === 'test') {
    contextInstance = null;
  }
}

/**
 * Lazily builds the pull request context. It is created once and reused for subsequent calls.
 *
 * @throws {Error} If this workflow is not running for a pull request event.
 */
function initializeContext(): Context {
  if (contextInstance) {
    return contextInstance;
  }

  try {
    startGroup('Initializing Context');

    const eventName = getRequiredEnvironmentVar('GITHUB_EVENT_NAME');
    const repo = parseRepository(getRequiredEnvironmentVar('GITHUB_REPOSITORY'));
    const eventPath = getRequiredEnvironmentVar('GITHUB_EVENT_PATH');
    // Set on GitHub Enterprise Server runners
    const apiUrl = process.env.GITHUB_API_URL || DEFAULT_API_URL;

    if (eventName !== 'pull_request') {
      throw new Error(
        'This workflow is not running in the context of a pull request. Ensure this workflow is triggered by a pull request event.',
      );
    }

    const prNumber = readPullRequestNumber(eventPath);
    const OctokitRestApi = Octokit.plugin(restEndpointMethods, paginateRest);

    contextInstance = {
      repo,
      prNumber,
      octokit: new OctokitRestApi({
        auth: `token ${config.githubToken}`,
        baseUrl: apiUrl,
        userAgent: `[octokit] conventional-commit-grammar/${version} (${homepage})`,
      }),
    };

    info(`Repository: ${repo.owner}/${repo.repo}`);
    info(`Pull Request Number: ${prNumber}`);
    info(`API URL: ${apiUrl}`);

    return contextInstance;
  } finally {
    endGroup();
  }
}

export const getContext = (): Context => {
  return initializeContext();
};

export const context: Context = new Proxy({} as Context, {
  get(_target, prop) {
    return getContext()[prop as keyof Context];
  },
});
