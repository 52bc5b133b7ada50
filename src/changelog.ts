import type { ClassifiedCommit } from '@/types';
import { CHANGELOG_SECTION_ORDER } from '@/utils/constants';

/**
 * Formats a single changelog line for a commit.
 *
 * @example
 * ```typescript
 * // - **parser**: handle empty input (#12)
 * ```
 */
function formatChangelogEntry(commit: ClassifiedCommit): string {
  const scope = commit.scope ? `**${commit.scope}**: ` : '';
  const references = commit.references.length > 0 ? ` (${commit.references.join(', ')})` : '';

  return `- ${scope}${commit.message}${references}`;
}

/**
 * Creates a markdown changelog entry from classified commits.
 *
 * Commits are grouped under their changelog section, in the order breaking changes first, then
 * Feat, Fix, Refactor and Perf. Commits without a section (e.g. `docs`, `chore`) are left out.
 * Within a section the commits keep their input order.
 *
 * @param {string} heading - The version or title heading for the changelog entry.
 * @param {readonly ClassifiedCommit[]} commits - The classified commits to include.
 * @param {Date} date - Release date shown next to the heading. Defaults to today.
 * @returns {string} The markdown changelog entry, or an empty string when no commit belongs in a changelog.
 *
 * @example
 * ```typescript
 * generateChangelog('v1.3.0', classifyCommits(['feat(api): add users', 'fix: typo']))
 * // ## v1.3.0 (2024-05-01)
 * //
 * // ### Feat
 * //
 * // - **api**: add users
 * //
 * // ### Fix
 * //
 * // - typo
 * ```
 */
export function generateChangelog(
  heading: string,
  commits: readonly ClassifiedCommit[],
  date: Date = new Date(),
): string {
  const sections = new Map<string, string[]>();

  for (const commit of commits) {
    if (commit.section === null) {
      continue;
    }

    const entries = sections.get(commit.section) ?? [];
    entries.push(formatChangelogEntry(commit));
    sections.set(commit.section, entries);
  }

  if (sections.size === 0) {
    return '';
  }

  const currentDate = date.toISOString().split('T')[0]; // Format: YYYY-MM-DD
  const changelogContent: string[] = [`## ${heading} (${currentDate})`];

  for (const section of CHANGELOG_SECTION_ORDER) {
    const entries = sections.get(section);
    if (entries) {
      changelogContent.push(`### ${section}`, entries.join('\n'));
    }
  }

  return changelogContent.join('\n\n');
}
