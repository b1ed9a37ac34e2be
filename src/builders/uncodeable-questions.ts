/**
 * uncodeable-questions.ts
 * Summary message naming the questions whose results could not be tabled.
 */

import type { Block, BlockElement, Question } from '../models/survey.js';
import { isQuestion } from '../models/survey.js';
import { escapeHtml } from '../renderers/html-table-renderer.js';

/** Every question in the given blocks, in declaration order. */
export function questionsFromBlocks(blocks: readonly Block[]): Question[] {
  const questions: Question[] = [];
  for (const block of blocks) {
    for (const element of block.BlockElements ?? []) {
      if (isQuestion(element)) questions.push(element);
    }
  }
  return questions;
}

/**
 * Questions without a results table that are not text entry, descriptive
 * or text-entry-selector questions.
 */
export function uncodeableQuestions(elements: readonly BlockElement[]): Question[] {
  return elements.filter(isQuestion).filter((q) => {
    const { QuestionType, Selector } = q.Payload;
    return q.Table === undefined && QuestionType !== 'TE' && QuestionType !== 'DB' && Selector !== 'TE';
  });
}

export function uncodeableQuestionsMessage(elements: readonly BlockElement[]): string {
  const tags = uncodeableQuestions(elements).map((q) => escapeHtml(q.Payload.DataExportTag ?? ''));
  const message = tags.length > 0
    ? `The following questions could not be automatically processed: ${tags.join(', ')}`
    : 'All questions were successfully processed!';
  return `<b>${message}</b>`;
}
