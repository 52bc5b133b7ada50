/**
 * Library entry point: the commit grammar, classification and the interactive question flow,
 * usable without the GitHub Action runtime.
 */
export { generateChangelog } from '@/changelog';
export {
  classifyChange,
  classifyCommits,
  computeBump,
  getChangelogSection,
  higherPrioritySeverity,
} from '@/commit-analyzer';
export {
  composeMessage,
  getExample,
  getInfo,
  getSchema,
  multipleLineBreaker,
  parseScope,
  parseSubject,
} from '@/commit-message';
export {
  extractChange,
  extractSubject,
  findInvalidCommitMessages,
  hasBreakingFooter,
  isCommitType,
  isConventionalCommit,
  parseCommit,
} from '@/commit-parser';
export { collectAnswers, getQuestions, runQuestionFlow } from '@/questions';
export { getNextVersion, isMajorVersionZero } from '@/semver';
export { getSupportedLanguages, translateTextFromEnglish } from '@/translation';
export type {
  Answers,
  BumpSeverity,
  ChangeEntry,
  ClassifiedCommit,
  CommitType,
  ConfirmQuestion,
  InputQuestion,
  InvalidAnswerAction,
  ListQuestion,
  ParsedCommit,
  Prompter,
  Question,
  QuestionChoice,
  TranslateFn,
} from '@/types';
export {
  BUMP_MAP,
  BUMP_MAP_MAJOR_VERSION_ZERO,
  BUMP_SEVERITY,
  CHANGE_TYPE_MAP,
  COMMIT_PARSER_PATTERN,
  COMMIT_TYPE,
  SCHEMA_PATTERN,
} from '@/utils/constants';
export { ValidationError } from '@/utils/errors';
