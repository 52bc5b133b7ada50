import { generateChangelog } from '@/changelog';
import { classifyCommits, computeBump } from '@/commit-analyzer';
import { findInvalidCommitMessages } from '@/commit-parser';
import { getConfig } from '@/config';
import { getContext } from '@/context';
import { getPullRequestCommitMessages } from '@/pull-request';
import { getNextVersion } from '@/semver';
import type { BumpSeverity, Config, Context } from '@/types';
import { endGroup, info, setFailed, setOutput, startGroup, warning } from '@actions/core';

/**
 * Initializes and returns the configuration and context objects.
 * Config must be initialized before context due to dependency constraints.
 *
 * @returns {{ config: Config; context: Context }} Initialized config and context objects.
 */
function initialize(): { config: Config; context: Context } {
  const configInstance = getConfig();
  const contextInstance = getContext();

  return { config: configInstance, context: contextInstance };
}

/**
 * Reports commit messages that do not follow the schema. Each one is a warning, or the whole run
 * fails when `fail-on-invalid-commits` is enabled.
 */
function reportInvalidCommits(config: Config, invalidCommits: string[]): void {
  if (invalidCommits.length === 0) {
    return;
  }

  for (const message of invalidCommits) {
    warning(`Commit message does not follow the conventional commit schema: ${message.split('\n', 1)[0]}`);
  }

  if (config.failOnInvalidCommits) {
    const count = invalidCommits.length;
    throw new Error(
      `Found ${count} commit message${count !== 1 ? 's that do' : ' that does'} not follow the conventional commit schema.`,
    );
  }
}

/**
 * Sets the GitHub Action outputs:
 * - `bump`: The computed bump severity (`major`, `minor`, `patch` or `none`)
 * - `next-version`: The next version, or an empty string when nothing is bumped
 * - `changelog`: The markdown changelog entry for the pull request
 * - `invalid-commits`: JSON array of the messages that do not follow the schema
 */
function setActionOutputs(
  bump: BumpSeverity,
  nextVersion: string | null,
  changelog: string,
  invalidCommits: string[],
): void {
  startGroup('GitHub Action Outputs');
  info(`Bump: ${bump}`);
  info(`Next version: ${nextVersion ?? '(none)'}`);
  info(`Changelog:\n${changelog}`);
  info(`Invalid commits: ${JSON.stringify(invalidCommits)}`);
  endGroup();

  setOutput('bump', bump);
  setOutput('next-version', nextVersion ?? '');
  setOutput('changelog', changelog);
  setOutput('invalid-commits', JSON.stringify(invalidCommits));
}

/**
 * Executes the main process of the action.
 *
 * 1. Reads the commit messages of the pull request
 * 2. Reports messages that do not follow the schema
 * 3. Classifies the remaining messages and computes the aggregate bump
 * 4. Derives the next version and the changelog entry
 * 5. Sets the action outputs
 *
 * @returns {Promise<void>} A promise that resolves when the process completes
 * @throws Will capture and report any errors through setFailed
 */
export async function run(): Promise<void> {
  try {
    const { config } = initialize();

    const messages = await getPullRequestCommitMessages();
    const invalidCommits = findInvalidCommitMessages(messages);
    reportInvalidCommits(config, invalidCommits);

    const commits = classifyCommits(messages, config.majorVersionZero);
    const bump = computeBump(commits);
    const nextVersion = getNextVersion(config.currentVersion, bump);
    const changelog = generateChangelog(nextVersion ?? config.currentVersion, commits);

    setActionOutputs(bump, nextVersion, changelog, invalidCommits);
  } catch (error) {
    if (error instanceof Error) {
      setFailed(error.message);
    } else {
      setFailed(String(error));
    }
  }
}
