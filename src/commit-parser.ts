import type { ChangeEntry, CommitType, ParsedCommit } from '@/types';
import { COMMIT_PARSER_PATTERN, COMMIT_TYPE, SCHEMA_PATTERN } from '@/utils/constants';
import { CommitParser } from 'conventional-commits-parser';

/**
 * Parser used for the issue references in a message, which the header patterns do not cover. Options
 * follow the `conventional-changelog-conventionalcommits` preset.
 *
 * @see https://github.com/conventional-changelog/conventional-changelog/blob/master/packages/conventional-changelog-conventionalcommits/src/parser.js
 */
const footerParser = new CommitParser({
  headerPattern: /^(\w*)(?:\((.*)\))?!?: (.*)$/,
  headerCorrespondence: ['type', 'scope', 'subject'],
  issuePrefixes: ['#'],
});

const COMMIT_TYPES: readonly string[] = Object.values(COMMIT_TYPE);

const BREAKING_FOOTER_REGEX = /^BREAKING[ -]CHANGE:/;

/**
 * Whether any line after the header is a `BREAKING CHANGE:` or `BREAKING-CHANGE:` footer line. The
 * colon is required; a line merely mentioning a breaking change does not count.
 */
export function hasBreakingFooter(message: string): boolean {
  return message
    .split(/\r?\n/)
    .slice(1)
    .some((line) => BREAKING_FOOTER_REGEX.test(line));
}

/**
 * Type guard for the closed set of commit type tokens.
 */
export function isCommitType(value: string): value is CommitType {
  return COMMIT_TYPES.includes(value);
}

/**
 * Returns a named capture group, or `null` when the group did not participate in the match.
 */
function getGroup(match: RegExpExecArray, name: string): string | null {
  return match.groups?.[name] ?? null;
}

//////////////////////////////////////////////////////////////////////////////////////////////////////////////////////
// Strict schema
//////////////////////////////////////////////////////////////////////////////////////////////////////////////////////

/**
 * Checks a complete commit message against the strict schema.
 *
 * @param message - The full commit message string
 * @returns Whether the whole message conforms
 */
export function isConventionalCommit(message: string): boolean {
  return SCHEMA_PATTERN.test(message);
}

/**
 * Extracts the subject of a commit message that matches the strict schema.
 *
 * A message that does not match is not an error: the empty string tells callers to skip the commit.
 *
 * @example
 * ```typescript
 * extractSubject('fix(parser): handle empty input\n\ndetails')
 * // → 'handle empty input'
 *
 * extractSubject('fix:no space')
 * // → ''
 * ```
 */
export function extractSubject(message: string): string {
  const match = SCHEMA_PATTERN.exec(message);
  if (match === null) {
    return '';
  }

  return match[3].trim();
}

/**
 * Returns the messages that do not match the strict schema, keeping their order.
 */
export function findInvalidCommitMessages(messages: ReadonlyArray<string>): string[] {
  return messages.filter((message) => extractSubject(message) === '');
}

/**
 * Splits the text after the header into body and footer.
 *
 * The footer is the first paragraph starting with `BREAKING CHANGE:` and everything after it. Without
 * one, the last of two or more paragraphs is the footer. A single paragraph is the body. Only trailing
 * newlines are dropped from a paragraph, so the rendered `BREAKING CHANGE: ` prefix survives a re-parse.
 */
function splitBodyAndFooter(rest: string): { body: string | null; footer: string | null } {
  const paragraphs = rest
    .split(/\n{2,}/)
    .map((paragraph) => paragraph.replace(/\n+$/, ''))
    .filter((paragraph) => paragraph.trim() !== '');

  if (paragraphs.length === 0) {
    return { body: null, footer: null };
  }

  const breakingIndex = paragraphs.findIndex((paragraph) => BREAKING_FOOTER_REGEX.test(paragraph));
  const footerIndex = breakingIndex >= 0 ? breakingIndex : paragraphs.length > 1 ? paragraphs.length - 1 : -1;

  if (footerIndex < 0) {
    return { body: paragraphs[0], footer: null };
  }

  const body = paragraphs.slice(0, footerIndex).join('\n\n');

  return {
    body: body === '' ? null : body,
    footer: paragraphs.slice(footerIndex).join('\n\n'),
  };
}

/**
 * Parses a complete commit message that matches the strict schema.
 *
 * Parsing is all-or-nothing: a message that does not match yields `null`, never a partial result.
 *
 * @example
 * ```typescript
 * parseCommit('feat(api)!: drop v1 routes\n\nmigration notes\n\nBREAKING CHANGE: v1 is gone')
 * // → { type: 'feat', scope: 'api', breaking: true, subject: 'drop v1 routes',
 * //     body: 'migration notes', footer: 'BREAKING CHANGE: v1 is gone' }
 * ```
 */
export function parseCommit(message: string): ParsedCommit | null {
  const match = SCHEMA_PATTERN.exec(message);
  if (match === null) {
    return null;
  }

  const type = match[1];
  if (!isCommitType(type)) {
    return null;
  }

  const scopeGroup = match[2] ?? '';
  const headerBreaking = message.startsWith(`${type}${scopeGroup}!`);
  const { body, footer } = splitBodyAndFooter(match[5] ?? '');

  return {
    type,
    scope: scopeGroup === '' ? null : scopeGroup.slice(1, -1),
    breaking: headerBreaking || hasBreakingFooter(message),
    subject: match[3].trim(),
    body,
    footer,
  };
}

//////////////////////////////////////////////////////////////////////////////////////////////////////////////////////
// Classification pattern
//////////////////////////////////////////////////////////////////////////////////////////////////////////////////////

/**
 * Extracts the fields used for bump and changelog classification from a commit message.
 *
 * Unlike the strict schema this only looks at the start of the message, accepts the literal
 * `BREAKING CHANGE` type, and accepts a bare `word!:` header with any word. The latter is always
 * breaking and carries a `null` change type.
 *
 * A `BREAKING CHANGE:` or `BREAKING-CHANGE:` footer line after the header also marks the entry
 * breaking, by the same rule `parseCommit` applies.
 *
 * @param message - The full commit message string
 * @returns The extracted entry, or `null` when the header does not match
 *
 * @example
 * ```typescript
 * extractChange('fix(auth)!: remove legacy flow')
 * // → { changeType: 'fix', rawType: 'fix', scope: 'auth', breaking: true, message: 'remove legacy flow', references: [] }
 *
 * extractChange('wip!: rewrite everything')
 * // → { changeType: null, rawType: 'wip', scope: null, breaking: true, message: 'rewrite everything', references: [] }
 * ```
 */
export function extractChange(message: string): ChangeEntry | null {
  const match = COMMIT_PARSER_PATTERN.exec(message);
  if (match === null) {
    return null;
  }

  const changeTypeToken = getGroup(match, 'change_type');
  const otherBreaking = getGroup(match, 'other_breaking');
  const changeType = changeTypeToken !== null && isCommitType(changeTypeToken) ? changeTypeToken : null;
  const scope = getGroup(match, 'scope');

  const parsed = footerParser.parse(message.trim());
  const references = Array.from(new Set(parsed.references.map((reference) => `${reference.prefix}${reference.issue}`)));

  return {
    changeType,
    rawType: changeTypeToken ?? otherBreaking ?? '',
    scope: scope === '' ? null : scope,
    breaking:
      getGroup(match, 'breaking') !== null ||
      otherBreaking !== null ||
      changeType === COMMIT_TYPE.BREAKING_CHANGE ||
      hasBreakingFooter(message),
    message: (getGroup(match, 'message') ?? '').trim(),
    references,
  };
}
