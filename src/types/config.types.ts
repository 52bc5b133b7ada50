/**
 * Configuration related types
 */

/**
 * Configuration interface used for defining key GitHub Action input configuration.
 */
export interface Config {
  /**
   * The GitHub token (`GITHUB_TOKEN`) used for API authentication.
   */
  githubToken: string;

  /**
   * The version the computed bump is applied to. May be in the format of `v#.#.#` or `#.#.#`.
   */
  currentVersion: string;

  /**
   * Whether the project follows the major version zero convention. While enabled, breaking
   * changes bump MINOR instead of MAJOR. Only valid when the current major version is 0.
   */
  majorVersionZero: boolean;

  /**
   * Whether the action fails when a pull request commit does not match the commit message schema.
   * When false, such commits are reported as warnings and skipped.
   */
  failOnInvalidCommits: boolean;
}
