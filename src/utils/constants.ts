import type { BumpSeverity, CommitType } from '@/types';

/**
 * Regular expression that matches versions in the format of semantic versioning.
 * This regex validates version strings like "1.2.3" or "v1.2.3" and includes capture groups.
 * Group 1: Major version number
 * Group 2: Minor version number
 * Group 3: Patch version number
 */
export const VERSION_TAG_REGEX = /^v?(\d+)\.(\d+)\.(\d+)$/;

/**
 * The closed set of commit type tokens understood by the grammar. Adding a type is a code change:
 * every table below is keyed by this set and the compiler flags a table that misses one.
 */
export const COMMIT_TYPE = {
  FEAT: 'feat',
  FIX: 'fix',
  REFACTOR: 'refactor',
  PERF: 'perf',
  DOCS: 'docs',
  STYLE: 'style',
  TEST: 'test',
  BUILD: 'build',
  CI: 'ci',
  CHORE: 'chore',
  REVERT: 'revert',
  BUMP: 'bump',
  BREAKING_CHANGE: 'BREAKING CHANGE',
} as const;

/**
 * Bump severity constants for semantic versioning
 */
export const BUMP_SEVERITY = {
  MAJOR: 'major',
  MINOR: 'minor',
  PATCH: 'patch',
  NONE: 'none',
} as const;

/**
 * Order of precedence used when several commits contribute to one bump.
 */
export const BUMP_SEVERITY_PRIORITY: Readonly<Record<BumpSeverity, number>> = {
  major: 3,
  minor: 2,
  patch: 1,
  none: 0,
};

/**
 * Changelog section header per commit type. Types mapped to `null` are left out of generated changelogs.
 */
export const CHANGE_TYPE_MAP = {
  feat: 'Feat',
  fix: 'Fix',
  refactor: 'Refactor',
  perf: 'Perf',
  docs: null,
  style: null,
  test: null,
  build: null,
  ci: null,
  chore: null,
  revert: null,
  bump: null,
  'BREAKING CHANGE': null,
} as const satisfies Readonly<Record<CommitType, string | null>>;

/**
 * Bump severity per commit type. The `BREAKING CHANGE` entry is the rule applied to any breaking commit.
 */
export const BUMP_MAP = {
  'BREAKING CHANGE': BUMP_SEVERITY.MAJOR,
  feat: BUMP_SEVERITY.MINOR,
  fix: BUMP_SEVERITY.PATCH,
  refactor: BUMP_SEVERITY.PATCH,
  perf: BUMP_SEVERITY.PATCH,
  docs: BUMP_SEVERITY.NONE,
  style: BUMP_SEVERITY.NONE,
  test: BUMP_SEVERITY.NONE,
  build: BUMP_SEVERITY.NONE,
  ci: BUMP_SEVERITY.NONE,
  chore: BUMP_SEVERITY.NONE,
  revert: BUMP_SEVERITY.NONE,
  bump: BUMP_SEVERITY.NONE,
} as const satisfies Readonly<Record<CommitType, BumpSeverity>>;

/**
 * Same as {@link BUMP_MAP} for projects at major version zero, where a breaking change only bumps MINOR.
 */
export const BUMP_MAP_MAJOR_VERSION_ZERO = {
  ...BUMP_MAP,
  'BREAKING CHANGE': BUMP_SEVERITY.MINOR,
} as const satisfies Readonly<Record<CommitType, BumpSeverity>>;

export const BREAKING_CHANGES_SECTION = 'BREAKING CHANGES';
export const OTHER_BREAKING_CHANGES_SECTION = 'Other Breaking Changes';

/**
 * Order in which changelog sections are rendered.
 */
export const CHANGELOG_SECTION_ORDER: readonly string[] = [
  BREAKING_CHANGES_SECTION,
  OTHER_BREAKING_CHANGES_SECTION,
  CHANGE_TYPE_MAP.feat,
  CHANGE_TYPE_MAP.fix,
  CHANGE_TYPE_MAP.refactor,
  CHANGE_TYPE_MAP.perf,
];

/**
 * Strict schema a complete commit message must match:
 *
 * - Group 1: type (the recognized tokens, case-sensitive)
 * - Group 2: optional `(scope)`, followed by an optional `!`
 * - Group 3: `: ` and the subject, which must not be empty
 * - Group 4: a blank line followed by free text, or trailing whitespace only
 *
 * The whole string must match. `BREAKING CHANGE` is deliberately not a valid type here.
 */
export const SCHEMA_PATTERN =
  /^(build|ci|docs|feat|fix|perf|refactor|style|test|chore|revert|bump)(\(\S+\))?!?:( [^\n\r]+)((\n\n[\s\S]*)|(\s*))?$/;

/**
 * Header pattern used to classify commits for bumps and changelogs. Matches at the start of the message only.
 *
 * Named groups:
 * - `change_type`: a recognized type token, including the literal `BREAKING CHANGE`
 * - `scope`: contents of the parentheses
 * - `breaking`: the `!` marker after the type or scope
 * - `other_breaking`: the word of the bare `word!:` spelling when it is not a recognized type
 * - `message`: remainder of the first line
 */
export const COMMIT_PARSER_PATTERN =
  /^((?<change_type>feat|fix|refactor|perf|docs|style|test|build|ci|chore|revert|bump|BREAKING CHANGE)(?:\((?<scope>[^()\r\n]*)\)|\()?(?<breaking>!)?|(?<other_breaking>\w+)!):\s(?<message>.*)?/;

export const BREAKING_CHANGE_FOOTER_PREFIX = 'BREAKING CHANGE: ';

export const INFO_FILENAME = 'conventional-commits-info.txt';

export const COMMIT_MESSAGE_EXAMPLE = [
  'fix: correct minor typos in code',
  '',
  'see the issue for details on the typos fixed',
  '',
  'closes issue #12',
].join('\n');

export const COMMIT_MESSAGE_SCHEMA = [
  '<type>(<scope>): <subject>',
  '<BLANK LINE>',
  '<body>',
  '<BLANK LINE>',
  '(BREAKING CHANGE: )<footer>',
].join('\n');
