import {
  composeMessage,
  getExample,
  getInfo,
  getSchema,
  multipleLineBreaker,
  parseScope,
  parseSubject,
} from '@/commit-message';
import { extractSubject, isConventionalCommit, parseCommit } from '@/commit-parser';
import type { Answers } from '@/types';
import { ValidationError } from '@/utils/errors';
import { getInput } from '@actions/core';
import { describe, expect, it, vi } from 'vitest';

vi.unmock('@/config');

describe('commit-message', () => {
  describe('parseScope()', () => {
    it.each(['', '   ', 'solo', '  a   b  c ', 'user service', 'a-b c', '\tx\ny '])(
      'should be idempotent for %j',
      (text) => {
        expect(parseScope(parseScope(text))).toBe(parseScope(text));
      },
    );

    it('should join words with hyphens', () => {
      expect(parseScope('  a   b  c ')).toBe('a-b-c');
      expect(parseScope('user service')).toBe('user-service');
    });

    it('should return a single word unchanged', () => {
      expect(parseScope('solo')).toBe('solo');
      expect(parseScope('  padded  ')).toBe('padded');
    });

    it('should return an empty string for absent or blank input', () => {
      expect(parseScope('')).toBe('');
      expect(parseScope('   ')).toBe('');
      expect(parseScope(null)).toBe('');
      expect(parseScope()).toBe('');
    });
  });

  describe('parseSubject()', () => {
    it('should remove trailing periods and surrounding whitespace', () => {
      expect(parseSubject('  fix the bug...')).toBe('fix the bug');
      expect(parseSubject('done.')).toBe('done');
      expect(parseSubject('v1.2 support')).toBe('v1.2 support');
    });

    it('should reject a subject that is empty after cleanup', () => {
      expect(() => parseSubject('...')).toThrow(new ValidationError('Subject is required.'));
      expect(() => parseSubject('   ')).toThrow(ValidationError);
      expect(() => parseSubject('')).toThrow(ValidationError);
    });

    it('should reject an absent subject', () => {
      expect(() => parseSubject(null)).toThrow('Subject is required.');
      expect(() => parseSubject()).toThrow('Subject is required.');
    });
  });

  describe('multipleLineBreaker()', () => {
    it('should turn the separator into line breaks', () => {
      expect(multipleLineBreaker('first line | second line')).toBe('first line\nsecond line');
    });

    it('should drop empty segments', () => {
      expect(multipleLineBreaker('a||b|')).toBe('a\nb');
      expect(multipleLineBreaker('')).toBe('');
    });

    it('should accept a custom separator', () => {
      expect(multipleLineBreaker('a; b', ';')).toBe('a\nb');
      expect(multipleLineBreaker('a | b', ';')).toBe('a | b');
    });
  });

  describe('composeMessage()', () => {
    it('should render a header-only message', () => {
      expect(composeMessage({ prefix: 'fix', scope: 'parser', subject: 'handle empty input' })).toBe(
        'fix(parser): handle empty input',
      );
      expect(composeMessage({ prefix: 'docs', scope: '', subject: 'update readme' })).toBe('docs: update readme');
    });

    it('should separate body and footer with blank lines', () => {
      expect(
        composeMessage({ prefix: 'feat', subject: 'add users', body: 'supports paging', footer: 'closes #12' }),
      ).toBe('feat: add users\n\nsupports paging\n\ncloses #12');
    });

    it('should prefix the footer of a breaking change', () => {
      expect(
        composeMessage({
          prefix: 'feat',
          scope: 'api',
          subject: 'add users',
          body: 'supports paging',
          isBreakingChange: true,
          footer: 'closes #12',
        }),
      ).toBe('feat(api): add users\n\nsupports paging\n\nBREAKING CHANGE: closes #12');
    });

    it('should add a breaking footer even when the footer answer is empty', () => {
      expect(composeMessage({ prefix: 'feat', subject: 'x', isBreakingChange: true, footer: '' })).toBe(
        'feat: x\n\nBREAKING CHANGE: ',
      );
    });

    it('should produce messages that satisfy the strict schema', () => {
      const message = composeMessage({ prefix: 'refactor', scope: 'core', subject: 'split module', body: 'no change' });
      expect(isConventionalCommit(message)).toBe(true);
    });
  });

  describe('composeMessage() round trip', () => {
    // Raw answers pass through the same cleanup the question flow applies before rendering
    const toAnswers = (raw: Answers): Answers => ({
      ...raw,
      scope: parseScope(raw.scope),
      subject: parseSubject(raw.subject),
      body: raw.body === undefined ? undefined : multipleLineBreaker(raw.body),
    });

    it.each<[string, Answers]>([
      ['header only', { prefix: 'fix', subject: 'correct typo' }],
      ['a multi-word scope', { prefix: 'feat', scope: ' user  service ', subject: 'add login' }],
      ['trailing periods and spaces', { prefix: 'docs', subject: '  update readme... ' }],
      ['trailing periods', { prefix: 'perf', scope: 'cache', subject: 'reuse buffers...' }],
      ['a body', { prefix: 'refactor', subject: 'split module.', body: 'first line | second line' }],
      ['a footer', { prefix: 'fix', subject: 'handle null', footer: 'closes #12' }],
      [
        'a breaking change with body and footer',
        { prefix: 'feat', scope: 'api', subject: 'drop v1.', body: 'migrate now', isBreakingChange: true, footer: 'v1 is gone' },
      ],
      ['a breaking change with an empty footer', { prefix: 'feat', subject: 'drop legacy api', isBreakingChange: true, footer: '' }],
    ])('should extract the cleaned subject from a message with %s', (_label, raw) => {
      const answers = toAnswers(raw);
      const message = composeMessage(answers);

      expect(extractSubject(message)).toBe(parseSubject(raw.subject));
      expect(parseCommit(message)).toMatchObject({
        type: answers.prefix,
        scope: answers.scope === '' ? null : answers.scope,
        subject: answers.subject,
        breaking: answers.isBreakingChange === true,
      });
    });

    it('should keep the empty breaking footer when re-parsed', () => {
      const message = composeMessage({ prefix: 'feat', subject: 'drop legacy api', isBreakingChange: true, footer: '' });
      expect(parseCommit(message)).toEqual({
        type: 'feat',
        scope: null,
        breaking: true,
        subject: 'drop legacy api',
        body: null,
        footer: 'BREAKING CHANGE: ',
      });
    });
  });

  describe('getExample() / getSchema()', () => {
    it('should return a conforming example', () => {
      expect(getExample()).toBe(
        'fix: correct minor typos in code\n\nsee the issue for details on the typos fixed\n\ncloses issue #12',
      );
      expect(isConventionalCommit(getExample())).toBe(true);
    });

    it('should return the schema', () => {
      expect(getSchema()).toBe(
        '<type>(<scope>): <subject>\n<BLANK LINE>\n<body>\n<BLANK LINE>\n(BREAKING CHANGE: )<footer>',
      );
    });
  });

  describe('getInfo()', () => {
    it('should read the bundled document', () => {
      const info = getInfo();
      expect(info.startsWith('The commit contains the following structural elements, to communicate\n')).toBe(true);
      expect(getInfo('utf8')).toBe(info);
    });

    it('should default to UTF-8 without reading action inputs', () => {
      expect(getInfo()).toBe(getInfo('utf-8'));
      expect(getInput).not.toHaveBeenCalled();
    });
  });
});
