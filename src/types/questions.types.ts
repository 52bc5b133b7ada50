import type { CommitType } from '@/types/common.types';
import type { ValidationError } from '@/utils/errors';

/**
 * Types for the interactive question flow.
 */

/**
 * Values collected by the question flow and consumed once by `composeMessage()`.
 */
export interface Answers {
  prefix: CommitType;
  scope?: string;
  subject: string;
  body?: string;
  isBreakingChange?: boolean;
  footer?: string;
}

/**
 * Looks up the localized text of a prompt. Must return `text` unchanged for an unknown language.
 */
export type TranslateFn = (text: string, language: string, key: string) => string;

/**
 * A pure transform applied to a raw answer before it is stored. May throw a `ValidationError`.
 */
export type AnswerFilter = (value: string) => string;

/**
 * A selectable entry of a single-choice question.
 */
export interface QuestionChoice {
  value: CommitType;
  /** Display text, including the translated description */
  name: string;
  /** Keyboard shortcut offered by prompt widgets that support one */
  key: string;
}

/**
 * Single-choice step.
 */
export interface ListQuestion {
  type: 'list';
  name: 'prefix';
  message: string;
  choices: readonly QuestionChoice[];
}

/**
 * Free text step. Empty answers are accepted unless the filter rejects them.
 */
export interface InputQuestion {
  type: 'input';
  name: 'scope' | 'subject' | 'body' | 'footer';
  message: string;
  filter?: AnswerFilter;
}

/**
 * Yes/no step.
 */
export interface ConfirmQuestion {
  type: 'confirm';
  name: 'isBreakingChange';
  message: string;
  default: boolean;
}

export type Question = ListQuestion | InputQuestion | ConfirmQuestion;

/**
 * What the prompter wants to happen after a filter rejected an answer.
 */
export type InvalidAnswerAction = 'retry' | 'abort';

/**
 * The terminal prompt collaborator. Each method suspends until the user answers the step.
 */
export interface Prompter {
  select(question: ListQuestion): Promise<string>;
  input(question: InputQuestion): Promise<string>;
  confirm(question: ConfirmQuestion): Promise<boolean>;

  /**
   * Re-prompt policy for answers rejected by a step's filter. When omitted the error aborts the flow.
   */
  onInvalid?(question: Question, error: ValidationError): Promise<InvalidAnswerAction> | InvalidAnswerAction;
}
