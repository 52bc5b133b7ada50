import { context } from '@/context';
import { endGroup, info, startGroup } from '@actions/core';
import { RequestError } from '@octokit/request-error';

/**
 * Retrieves the messages of all commits in the pull request, oldest first.
 *
 * @returns {Promise<string[]>} The full commit messages, including body and footer.
 * @throws {Error} When the commits cannot be listed. A 403 response is reported as a permissions problem.
 */
export async function getPullRequestCommitMessages(): Promise<string[]> {
  console.time('Elapsed time fetching commits');
  startGroup('Fetching pull request commits');

  try {
    const {
      octokit,
      repo: { owner, repo },
      prNumber: pull_number,
    } = context;

    const iterator = octokit.paginate.iterator(octokit.rest.pulls.listCommits, { owner, repo, pull_number });

    const messages: string[] = [];
    for await (const { data } of iterator) {
      for (const commit of data) {
        messages.push(commit.commit.message);
      }
    }

    info(`Found ${messages.length} commit${messages.length !== 1 ? 's' : ''} in pull request.`);
    for (const message of messages) {
      info(`- ${message.split('\n', 1)[0]}`);
    }

    return messages;
  } catch (error) {
    // Make it clear to the consumer which permission the workflow is missing.
    if (error instanceof RequestError && error.status === 403) {
      throw new Error(
        `Unable to read pull request commits due to insufficient permissions. Ensure the workflow permissions.pull-requests is set to "read".\n${error.message}`,
        { cause: error },
      );
    }

    throw new Error(
      `Error getting pull request commits: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    );
  } finally {
    console.timeEnd('Elapsed time fetching commits');
    endGroup();
  }
}
