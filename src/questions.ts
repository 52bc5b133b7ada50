import { composeMessage, multipleLineBreaker, parseScope, parseSubject } from '@/commit-message';
import { isCommitType } from '@/commit-parser';
import { translateTextFromEnglish } from '@/translation';
import type {
  Answers,
  CommitType,
  ConfirmQuestion,
  InputQuestion,
  ListQuestion,
  Prompter,
  Question,
  QuestionChoice,
  TranslateFn,
} from '@/types';
import { COMMIT_TYPE } from '@/utils/constants';
import { ValidationError } from '@/utils/errors';

/**
 * Commit types offered by the type selection step, with their English description and shortcut key.
 */
const TYPE_CHOICES: ReadonlyArray<{ value: CommitType; description: string; key: string }> = [
  { value: COMMIT_TYPE.FIX, description: 'A bug fix. Correlates with PATCH in SemVer', key: 'x' },
  { value: COMMIT_TYPE.FEAT, description: 'A new feature. Correlates with MINOR in SemVer', key: 'f' },
  { value: COMMIT_TYPE.DOCS, description: 'Documentation only changes', key: 'd' },
  {
    value: COMMIT_TYPE.STYLE,
    description:
      'Changes that do not affect the meaning of the code (white-space, formatting, missing semi-colons, etc)',
    key: 's',
  },
  {
    value: COMMIT_TYPE.REFACTOR,
    description: 'A code change that neither fixes a bug nor adds a feature',
    key: 'r',
  },
  { value: COMMIT_TYPE.PERF, description: 'A code change that improves performance', key: 'p' },
  { value: COMMIT_TYPE.TEST, description: 'Adding missing or correcting existing tests', key: 't' },
  {
    value: COMMIT_TYPE.BUILD,
    description: 'Changes that affect the build system or external dependencies (example scopes: pip, docker, npm)',
    key: 'b',
  },
  {
    value: COMMIT_TYPE.CI,
    description: 'Changes to CI configuration files and scripts (example scopes: GitLabCI)',
    key: 'c',
  },
];

/**
 * Builds the ordered list of steps of the interactive flow:
 * type selection → scope → subject → body → breaking change confirmation → footer.
 *
 * Every message goes through `translate`; the filters are bound here, once.
 *
 * @param language - Locale code handed to `translate`
 * @param translate - Translation lookup, defaults to the bundled translations
 */
export function getQuestions(language: string, translate: TranslateFn = translateTextFromEnglish): readonly Question[] {
  const choices: QuestionChoice[] = TYPE_CHOICES.map(({ value, description, key }) => ({
    value,
    name: `${value}: ${translate(description, language, value)}`,
    key,
  }));

  const prefix: ListQuestion = {
    type: 'list',
    name: 'prefix',
    message: translate('Select the type of change you are committing', language, 'prefix'),
    choices,
  };

  const scope: InputQuestion = {
    type: 'input',
    name: 'scope',
    message: translate(
      'What is the scope of this change? (class or file name): (press [enter] to skip)\n',
      language,
      'scope',
    ),
    filter: parseScope,
  };

  const subject: InputQuestion = {
    type: 'input',
    name: 'subject',
    message: translate(
      'Write a short and imperative summary of the code changes: (lower case and no period)\n',
      language,
      'subject',
    ),
    filter: parseSubject,
  };

  const body: InputQuestion = {
    type: 'input',
    name: 'body',
    message: translate(
      'Provide additional contextual information about the code changes: (press [enter] to skip)\n',
      language,
      'body',
    ),
    filter: (value) => multipleLineBreaker(value),
  };

  const isBreakingChange: ConfirmQuestion = {
    type: 'confirm',
    name: 'isBreakingChange',
    message: translate('Is this a BREAKING CHANGE? Correlates with MAJOR in SemVer', language, 'is_breaking_change'),
    default: false,
  };

  const footer: InputQuestion = {
    type: 'input',
    name: 'footer',
    message: translate(
      'Footer. Information about Breaking Changes and reference issues that this commit closes: (press [enter] to skip)\n',
      language,
      'footer',
    ),
  };

  return [prefix, scope, subject, body, isBreakingChange, footer];
}

/**
 * Accepts a selected choice only when it is one of the commit type tokens.
 */
function parsePrefix(value: string): CommitType {
  if (!isCommitType(value)) {
    throw new ValidationError(`Unknown commit type: ${value}`);
  }

  return value;
}

/**
 * Asks a text or choice step until its filter accepts the answer, or the prompter gives up.
 */
async function askUntilValid<T>(
  prompter: Prompter,
  question: ListQuestion | InputQuestion,
  ask: () => Promise<string>,
  filter: (value: string) => T,
): Promise<T> {
  while (true) {
    const raw = await ask();
    try {
      return filter(raw);
    } catch (error) {
      if (!(error instanceof ValidationError) || !prompter.onInvalid) {
        throw error;
      }

      const action = await prompter.onInvalid(question, error);
      if (action === 'abort') {
        throw error;
      }
    }
  }
}

/**
 * Runs the steps strictly in order and collects the filtered answers.
 *
 * A step whose filter rejects the answer (an empty subject) is handed to the prompter's `onInvalid`
 * policy, which either retries the same step or aborts. Aborting, or any error raised by the prompter,
 * abandons the whole flow.
 *
 * @param prompter - The terminal prompt collaborator
 * @param language - Locale code for the prompt texts
 * @param translate - Translation lookup, defaults to the bundled translations
 */
export async function collectAnswers(
  prompter: Prompter,
  language: string,
  translate: TranslateFn = translateTextFromEnglish,
): Promise<Answers> {
  let prefix: CommitType | null = null;
  let subject: string | null = null;
  const optional: Pick<Answers, 'scope' | 'body' | 'footer' | 'isBreakingChange'> = {};

  for (const question of getQuestions(language, translate)) {
    switch (question.type) {
      case 'list': {
        prefix = await askUntilValid(prompter, question, () => prompter.select(question), parsePrefix);
        break;
      }
      case 'input': {
        const filter = question.filter ?? ((value: string) => value);
        const value = await askUntilValid(prompter, question, () => prompter.input(question), filter);
        if (question.name === 'subject') {
          subject = value;
        } else {
          optional[question.name] = value;
        }
        break;
      }
      case 'confirm': {
        optional[question.name] = await prompter.confirm(question);
        break;
      }
    }
  }

  if (prefix === null || subject === null) {
    throw new ValidationError('The question flow ended without a commit type and subject.');
  }

  return { prefix, subject, ...optional };
}

/**
 * Runs the interactive flow and renders the resulting commit message.
 *
 * @example
 * ```typescript
 * const message = await runQuestionFlow(prompter, 'en');
 * // → 'fix(parser): handle empty input'
 * ```
 */
export async function runQuestionFlow(
  prompter: Prompter,
  language: string,
  translate: TranslateFn = translateTextFromEnglish,
): Promise<string> {
  return composeMessage(await collectAnswers(prompter, language, translate));
}
