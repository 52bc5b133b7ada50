import type { BumpSeverity, CommitType } from '@/types/common.types';

/**
 * Types for the commit grammar and classification modules.
 */

/**
 * A commit message that matched the strict schema, split into its parts.
 */
export interface ParsedCommit {
  /** The commit type token */
  type: CommitType;
  /** The scope without parentheses, or `null` when the header has none */
  scope: string | null;
  /** Whether the header carries the `!` marker or the footer starts with `BREAKING CHANGE:` */
  breaking: boolean;
  /** The trimmed subject line content */
  subject: string;
  /** Free text between the header and the footer */
  body: string | null;
  /** Last paragraph of the message (or the `BREAKING CHANGE:` paragraph onwards) */
  footer: string | null;
}

/**
 * Fields extracted by the classification pattern from a commit message.
 */
export interface ChangeEntry {
  /** The recognized type token, or `null` for a bare `word!:` header */
  changeType: CommitType | null;
  /** The type as written in the header (the word itself for `word!:`) */
  rawType: string;
  scope: string | null;
  breaking: boolean;
  /** Remainder of the header line after `: ` */
  message: string;
  /** Issue references found in the message (e.g. `#12`) */
  references: string[];
}

/**
 * A classified commit, ready for bump computation and changelog rendering.
 */
export interface ClassifiedCommit extends ChangeEntry {
  /** The bump this commit implies on its own */
  severity: BumpSeverity;
  /** Changelog section the commit belongs to, or `null` when it is left out of changelogs */
  section: string | null;
}
