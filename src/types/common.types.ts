import type { BUMP_SEVERITY, COMMIT_TYPE } from '@/utils/constants';

/**
 * Common types used across the application
 */

/**
 * A commit type token of the grammar (e.g. `feat`, `fix` or the literal `BREAKING CHANGE`).
 *
 * This type is derived from the `COMMIT_TYPE` constant object, so the set of tokens is closed.
 *
 * @see {@link COMMIT_TYPE} for the available commit type tokens
 */
export type CommitType = (typeof COMMIT_TYPE)[keyof typeof COMMIT_TYPE];

/**
 * The magnitude of semantic version increment implied by a commit.
 *
 * @see {@link BUMP_SEVERITY} for the available severities
 */
export type BumpSeverity = (typeof BUMP_SEVERITY)[keyof typeof BUMP_SEVERITY];
