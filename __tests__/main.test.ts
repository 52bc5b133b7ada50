import { run } from '@/main';
import { config } from '@/mocks/config';
import { getPullRequestCommitMessages } from '@/pull-request';
import { info, setFailed, setOutput, warning } from '@actions/core';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

// Fetching commits is tested elsewhere
vi.mock('@/pull-request');

describe('main', () => {
  const mockDate = new Date('2024-05-01T12:00:00Z');

  beforeEach(() => {
    vi.setSystemTime(mockDate);
    config.resetDefaults();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('run()', () => {
    it('should compute the bump, next version and changelog', async () => {
      vi.mocked(getPullRequestCommitMessages).mockResolvedValue([
        'feat(api): add users',
        'fix: typo\n\nCloses #7',
        'docs: readme',
      ]);

      await run();

      expect(setFailed).not.toHaveBeenCalled();
      expect(vi.mocked(setOutput).mock.calls).toEqual([
        ['bump', 'minor'],
        ['next-version', 'v1.1.0'],
        ['changelog', '## v1.1.0 (2024-05-01)\n\n### Feat\n\n- **api**: add users\n\n### Fix\n\n- typo (#7)'],
        ['invalid-commits', '[]'],
      ]);
      expect(info).toHaveBeenCalledWith('Bump: minor');
    });

    it('should warn about invalid commits and skip them', async () => {
      vi.mocked(getPullRequestCommitMessages).mockResolvedValue(['fix: typo', 'Merge branch main\n\nmore']);

      await run();

      expect(warning).toHaveBeenCalledTimes(1);
      expect(warning).toHaveBeenCalledWith(
        'Commit message does not follow the conventional commit schema: Merge branch main',
      );
      expect(setOutput).toHaveBeenCalledWith('bump', 'patch');
      expect(setOutput).toHaveBeenCalledWith('invalid-commits', '["Merge branch main\\n\\nmore"]');
    });

    it('should fail when invalid commits are not allowed', async () => {
      config.set({ failOnInvalidCommits: true });
      vi.mocked(getPullRequestCommitMessages).mockResolvedValue(['fix: typo', 'WIP', 'oops']);

      await run();

      expect(setFailed).toHaveBeenCalledWith(
        'Found 2 commit messages that do not follow the conventional commit schema.',
      );
      expect(setOutput).not.toHaveBeenCalled();
    });

    it('should use the singular form for a single invalid commit', async () => {
      config.set({ failOnInvalidCommits: true });
      vi.mocked(getPullRequestCommitMessages).mockResolvedValue(['WIP']);

      await run();

      expect(setFailed).toHaveBeenCalledWith(
        'Found 1 commit message that does not follow the conventional commit schema.',
      );
    });

    it('should report no bump when nothing is releasable', async () => {
      vi.mocked(getPullRequestCommitMessages).mockResolvedValue(['docs: readme', 'ci: cache deps']);

      await run();

      expect(vi.mocked(setOutput).mock.calls).toEqual([
        ['bump', 'none'],
        ['next-version', ''],
        ['changelog', ''],
        ['invalid-commits', '[]'],
      ]);
    });

    it('should bump minor for breaking changes at major version zero', async () => {
      config.set({ currentVersion: '0.4.2', majorVersionZero: true });
      vi.mocked(getPullRequestCommitMessages).mockResolvedValue(['feat!: rename options']);

      await run();

      expect(setOutput).toHaveBeenCalledWith('bump', 'minor');
      expect(setOutput).toHaveBeenCalledWith('next-version', '0.5.0');
      expect(setOutput).toHaveBeenCalledWith(
        'changelog',
        '## 0.5.0 (2024-05-01)\n\n### BREAKING CHANGES\n\n- rename options',
      );
    });

    it('should report errors through setFailed', async () => {
      vi.mocked(getPullRequestCommitMessages).mockRejectedValue(new Error('Error getting pull request commits: boom'));

      await run();

      expect(setFailed).toHaveBeenCalledWith('Error getting pull request commits: boom');
    });

    it('should report non-Error values through setFailed', async () => {
      vi.mocked(getPullRequestCommitMessages).mockRejectedValue('unexpected');

      await run();

      expect(setFailed).toHaveBeenCalledWith('unexpected');
    });
  });
});
