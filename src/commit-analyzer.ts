import { extractChange } from '@/commit-parser';
import type { BumpSeverity, ChangeEntry, ClassifiedCommit, CommitType } from '@/types';
import {
  BREAKING_CHANGES_SECTION,
  BUMP_MAP,
  BUMP_MAP_MAJOR_VERSION_ZERO,
  BUMP_SEVERITY,
  BUMP_SEVERITY_PRIORITY,
  CHANGE_TYPE_MAP,
  COMMIT_TYPE,
  OTHER_BREAKING_CHANGES_SECTION,
} from '@/utils/constants';
import { debug } from '@actions/core';

//////////////////////////////////////////////////////////////////////////////////////////////////////////////////////
// Single-commit classification
//////////////////////////////////////////////////////////////////////////////////////////////////////////////////////

/**
 * Determines the bump severity implied by a single commit.
 *
 * - A breaking change bumps MAJOR, or MINOR while the project is at major version zero
 * - Otherwise the type is looked up in the bump map: `feat` → MINOR, `fix`/`perf`/`refactor` → PATCH,
 *   everything else → NONE
 * - An unrecognized type without a breaking marker → NONE
 *
 * @param changeType - The commit type token, or `null` when the header used an unrecognized word
 * @param breaking - Whether the commit is a breaking change
 * @param majorVersionZero - Whether the project is at major version zero
 *
 * @example
 * ```typescript
 * classifyChange('feat', false, false) // → 'minor'
 * classifyChange('fix', true, false)   // → 'major'
 * classifyChange('fix', true, true)    // → 'minor'
 * classifyChange('docs', false, false) // → 'none'
 * ```
 */
export function classifyChange(
  changeType: CommitType | null,
  breaking: boolean,
  majorVersionZero: boolean,
): BumpSeverity {
  const bumpMap = majorVersionZero ? BUMP_MAP_MAJOR_VERSION_ZERO : BUMP_MAP;

  if (breaking) {
    return bumpMap[COMMIT_TYPE.BREAKING_CHANGE];
  }

  if (changeType === null) {
    return BUMP_SEVERITY.NONE;
  }

  return bumpMap[changeType];
}

/**
 * Returns the changelog section a change belongs to, or `null` when it is left out of changelogs.
 *
 * Breaking changes get their own section whatever their type. A breaking change written as a bare
 * `word!:` header with an unrecognized word goes to a separate section.
 */
export function getChangelogSection(entry: ChangeEntry): string | null {
  if (entry.breaking) {
    return entry.changeType === null ? OTHER_BREAKING_CHANGES_SECTION : BREAKING_CHANGES_SECTION;
  }

  if (entry.changeType === null) {
    return null;
  }

  return CHANGE_TYPE_MAP[entry.changeType];
}

//////////////////////////////////////////////////////////////////////////////////////////////////////////////////////
// Multi-commit orchestration
//////////////////////////////////////////////////////////////////////////////////////////////////////////////////////

/**
 * Returns the higher-priority bump severity of the two (MAJOR > MINOR > PATCH > NONE).
 *
 * @example
 * ```typescript
 * higherPrioritySeverity('none', 'patch')  // → 'patch'
 * higherPrioritySeverity('minor', 'patch') // → 'minor'
 * ```
 */
export function higherPrioritySeverity(current: BumpSeverity, candidate: BumpSeverity): BumpSeverity {
  return BUMP_SEVERITY_PRIORITY[candidate] > BUMP_SEVERITY_PRIORITY[current] ? candidate : current;
}

/**
 * Classifies a batch of commit messages, e.g. the commits of a pull request.
 *
 * Messages whose header does not match the classification pattern (merge commits, free-form messages)
 * are skipped silently. The result keeps the order of the input.
 *
 * @param messages - The raw commit messages
 * @param majorVersionZero - Whether the project is at major version zero
 * @returns One classified entry per recognized message
 *
 * @example
 * ```typescript
 * classifyCommits(['feat: add login', 'Merge branch main', 'fix!: drop md5'], false)
 * // → [{ changeType: 'feat', severity: 'minor', section: 'Feat', ... },
 * //    { changeType: 'fix', severity: 'major', section: 'BREAKING CHANGES', ... }]
 * ```
 */
export function classifyCommits(
  messages: ReadonlyArray<string>,
  majorVersionZero = false,
): ClassifiedCommit[] {
  const classified: ClassifiedCommit[] = [];

  for (const message of messages) {
    const entry = extractChange(message);
    if (entry === null) {
      debug(`Skipping non-conventional commit: ${message.split('\n', 1)[0]}`);
      continue;
    }

    classified.push({
      ...entry,
      severity: classifyChange(entry.changeType, entry.breaking, majorVersionZero),
      section: getChangelogSection(entry),
    });
  }

  return classified;
}

/**
 * Computes the bump for a batch of classified commits: the highest severity among them, or NONE when
 * the batch is empty.
 */
export function computeBump(commits: ReadonlyArray<ClassifiedCommit>): BumpSeverity {
  let result: BumpSeverity = BUMP_SEVERITY.NONE;

  for (const commit of commits) {
    result = higherPrioritySeverity(result, commit.severity);
  }

  return result;
}
