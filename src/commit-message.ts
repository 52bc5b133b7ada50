import { readFileSync } from 'node:fs';
import type { Answers } from '@/types';
import {
  BREAKING_CHANGE_FOOTER_PREFIX,
  COMMIT_MESSAGE_EXAMPLE,
  COMMIT_MESSAGE_SCHEMA,
  INFO_FILENAME,
} from '@/utils/constants';
import { requireValue } from '@/utils/errors';
import { removeTrailingCharacters, splitWords } from '@/utils/string';

/**
 * Normalizes free-form scope input into a single token.
 *
 * Whitespace-separated words are joined with a hyphen. Absent or blank input yields an empty string.
 *
 * @example
 * ```typescript
 * parseScope('  a   b  c ') // → 'a-b-c'
 * parseScope('solo')         // → 'solo'
 * parseScope('')             // → ''
 * ```
 */
export function parseScope(text?: string | null): string {
  if (!text) {
    return '';
  }

  const words = splitWords(text);
  if (words.length === 1) {
    return words[0];
  }

  return words.join('-');
}

/**
 * Cleans up a subject and rejects it when nothing is left.
 *
 * Trailing periods are removed first, then surrounding whitespace.
 *
 * @throws {ValidationError} When the subject is absent or empty after cleanup.
 */
export function parseSubject(text?: string | null): string {
  const subject = typeof text === 'string' ? removeTrailingCharacters(text, ['.']).trim() : text;

  return requireValue(subject, 'Subject is required.');
}

/**
 * Joins a single-line answer into a paragraph, using `separator` as the line break marker.
 *
 * Empty segments are dropped and every line is trimmed.
 *
 * @example
 * ```typescript
 * multipleLineBreaker('first line | second line') // → 'first line\nsecond line'
 * ```
 */
export function multipleLineBreaker(text: string, separator = '|'): string {
  return text
    .split(separator)
    .filter((line) => line !== '')
    .map((line) => line.trim())
    .join('\n');
}

/**
 * Renders the collected answers as a commit message in the canonical format:
 *
 * ```
 * <type>(<scope>): <subject>
 * <BLANK LINE>
 * <body>
 * <BLANK LINE>
 * (BREAKING CHANGE: )<footer>
 * ```
 *
 * No validation happens here; the fields are expected to have passed through their filters already.
 * A breaking change always gets a footer, even when the footer answer was empty.
 */
export function composeMessage(answers: Answers): string {
  const { prefix, subject } = answers;
  const scope = answers.scope ? `(${answers.scope})` : '';
  const body = answers.body ? `\n\n${answers.body}` : '';

  let footer = answers.footer ?? '';
  if (answers.isBreakingChange) {
    footer = `${BREAKING_CHANGE_FOOTER_PREFIX}${footer}`;
  }
  if (footer) {
    footer = `\n\n${footer}`;
  }

  return `${prefix}${scope}: ${subject}${body}${footer}`;
}

/**
 * Returns an example of a conforming commit message.
 */
export function getExample(): string {
  return COMMIT_MESSAGE_EXAMPLE;
}

/**
 * Returns the schema of a commit message, as shown in help output.
 */
export function getSchema(): string {
  return COMMIT_MESSAGE_SCHEMA;
}

/**
 * Reads the bundled help document describing the commit convention.
 *
 * Read errors are not handled here; there is nothing to show without the document.
 *
 * @param encoding - Encoding of the document
 */
export function getInfo(encoding: BufferEncoding = 'utf-8'): string {
  return readFileSync(new URL(`../assets/${INFO_FILENAME}`, import.meta.url), { encoding });
}
