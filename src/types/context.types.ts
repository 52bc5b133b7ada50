import type { OctokitRestApi, Repo } from '@/types/github.types';

/**
 * Context and runtime related types
 */

/**
 * Interface representing the context required by this GitHub Action.
 * It contains the necessary GitHub API client, repository details, and pull request information.
 */
export interface Context {
  /**
   * The repository details (owner and name).
   */
  repo: Repo;

  /**
   * An instance of the Octokit class with REST API and pagination plugins enabled.
   * This instance is authenticated using a GitHub token and is used to interact with GitHub's API.
   */
  octokit: OctokitRestApi;

  /**
   * The pull request number associated with the workflow run.
   */
  prNumber: number;
}
