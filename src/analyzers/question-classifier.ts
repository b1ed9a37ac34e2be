/**
 * question-classifier.ts
 * Decide how each block element is treated by the reports.
 *
 * Every element resolves to exactly one disposition; consumers switch on
 * `kind` exhaustively. Precedence, highest first:
 *   skip → unprocessable → descriptive → textEntry → textColumns → standard
 */

import type { BlockElement, Choice, Question, ResponseTable } from '../models/survey.js';
import { isQuestion } from '../models/survey.js';

/** Response columns containing this marker hold free-text answers. */
export const TEXT_COLUMN_MARKER = 'TEXT';

/** Selectors of single-answer multiple choice questions. */
const SINGLE_ANSWER_SELECTORS: ReadonlySet<string> = new Set(['SAVR', 'SAHR', 'SACOL', 'DL', 'SB']);

// ---------------------------------------------------------------------------
// Disposition
// ---------------------------------------------------------------------------

export type QuestionDisposition =
  | { kind: 'skip' }
  | { kind: 'unprocessable' }
  | { kind: 'descriptive'; question: Question }
  | { kind: 'textEntry'; question: Question }
  | { kind: 'textColumns'; question: Question; textColumns: string[] }
  | { kind: 'standard'; question: Question };

export type DispositionKind = QuestionDisposition['kind'];

export function classifyElement(element: BlockElement): QuestionDisposition {
  if (element.qtSkip === true) return { kind: 'skip' };
  if (!isQuestion(element)) return { kind: 'unprocessable' };

  const type = element.Payload.QuestionType;
  if (type === 'DB') return { kind: 'descriptive', question: element };
  if (type === 'TE') return { kind: 'textEntry', question: element };

  const textColumns = textColumnNames(element.Responses);
  if (textColumns.length > 0) return { kind: 'textColumns', question: element, textColumns };

  return { kind: 'standard', question: element };
}

// ---------------------------------------------------------------------------
// Response columns
// ---------------------------------------------------------------------------

export function responseColumnNames(responses: ResponseTable | undefined): string[] {
  return responses === undefined ? [] : Object.keys(responses);
}

export function isTextColumn(columnName: string): boolean {
  return columnName.includes(TEXT_COLUMN_MARKER);
}

export function textColumnNames(responses: ResponseTable | undefined): string[] {
  return responseColumnNames(responses).filter(isTextColumn);
}

// ---------------------------------------------------------------------------
// Flags
// ---------------------------------------------------------------------------

/** Display logic on the question itself or on any of its choices/answers. */
export function hasDisplayLogic(element: BlockElement): boolean {
  const payload = element.Payload;
  if (payload === undefined) return false;
  if (payload.DisplayLogic !== undefined) return true;
  return (
    someEntry(payload.Choices, (c) => c.DisplayLogic !== undefined) ||
    someEntry(payload.Answers, (a) => a.DisplayLogic !== undefined)
  );
}

export function isSingleAnswerMultipleChoice(question: Question): boolean {
  const { QuestionType, Selector } = question.Payload;
  return QuestionType === 'MC' && Selector !== undefined && SINGLE_ANSWER_SELECTORS.has(Selector);
}

export function isTextEntryChoice(choice: Choice): boolean {
  return choice.TextEntry === true || choice.TextEntry === 'true';
}

/**
 * Single-answer multiple choice with more than one text-entry choice. The
 * response export does not separate those components, so the question's
 * verbatim responses cannot be tabled per component.
 */
export function isMultiTextSingleAnswer(question: Question): boolean {
  if (!isSingleAnswerMultipleChoice(question)) return false;
  const choices = Object.values(question.Payload.Choices ?? {});
  return choices.filter(isTextEntryChoice).length > 1;
}

function someEntry(entries: Record<string, Choice> | undefined, predicate: (c: Choice) => boolean): boolean {
  if (entries === undefined) return false;
  return Object.values(entries).some(predicate);
}
