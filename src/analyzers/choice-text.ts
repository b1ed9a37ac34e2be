/**
 * choice-text.ts
 * Find the choice a text-entry response column belongs to, so appendix
 * headers can read "<question>-<choice>".
 *
 * Lookup order:
 *   1. The export's descriptive header row: "<question> - <choice> - Text".
 *   2. The choice id embedded in the column name: "<tag>_<choiceId>_TEXT".
 * Returns "" when neither yields a choice.
 */

import type { Question } from '../models/survey.js';
import { TEXT_COLUMN_MARKER } from './question-classifier.js';
import { cleanHtml } from './logic-utils.js';

const HEADER_SEPARATOR = ' - ';
const CHOICE_ID_PATTERN = new RegExp(`_([^_]+)_${TEXT_COLUMN_MARKER}$`);

export function choiceTextFromResponseColumn(
  question: Question,
  column: string,
  originalFirstRow?: Record<string, string>,
): string {
  const header = originalFirstRow?.[column];
  if (header !== undefined) {
    const fromHeader = choiceTextFromHeader(header, question.Payload.QuestionTextClean);
    if (fromHeader !== '') return fromHeader;
  }

  const match = CHOICE_ID_PATTERN.exec(column);
  const choiceId = match?.[1];
  if (choiceId === undefined) return '';
  const display = question.Payload.Choices?.[choiceId]?.Display;
  return display !== undefined ? cleanHtml(display) : '';
}

/**
 * "How did you hear? - Other - Text" → "Other". When the header starts with
 * the question text, only what follows it is read, so separators inside the
 * question do not leak into the choice. Headers without a choice segment
 * yield "".
 */
export function choiceTextFromHeader(header: string, questionText?: string): string {
  const prefix = questionText !== undefined && questionText !== '' ? questionText + HEADER_SEPARATOR : undefined;
  const choiceSegments = prefix !== undefined && header.startsWith(prefix)
    ? header.slice(prefix.length).split(HEADER_SEPARATOR).map((s) => s.trim())
    : header.split(HEADER_SEPARATOR).map((s) => s.trim()).slice(1);
  if (choiceSegments.at(-1) === 'Text') choiceSegments.pop();
  return choiceSegments.join(HEADER_SEPARATOR);
}

/** Question text, suffixed with the column's choice text when there is one. */
export function questionTextForColumn(
  question: Question,
  column: string,
  originalFirstRow?: Record<string, string>,
): string {
  const questionText = question.Payload.QuestionTextClean ?? '';
  const choiceText = choiceTextFromResponseColumn(question, column, originalFirstRow);
  return choiceText !== '' ? `${questionText}-${choiceText}` : questionText;
}
