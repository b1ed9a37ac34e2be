/**
 * description-renderer.ts
 * Per-question entry of the results-table report: a description table
 * (export tag, text, notes, logic referral, availability notes) followed by
 * the pre-computed results table when one is attached.
 */

import type { Question } from '../models/survey.js';
import {
  hasDisplayLogic,
  isTextColumn,
  responseColumnNames,
  textColumnNames,
} from '../analyzers/question-classifier.js';
import { TABLE_CLASSES, singleColumn, type TableRenderer } from './html-table-renderer.js';

export const DISPLAY_LOGIC_REFERRAL = "Refer to the Display Logic panel for this question's logic.";

/** Ordered lines of the question's description table. */
export function questionDescriptionLines(question: Question): string[] {
  const { Payload } = question;
  const tag = Payload.DataExportTag ?? '';
  const isTextEntry = Payload.QuestionType === 'TE';
  const hasTable = question.Table !== undefined;

  const lines: string[] = [`Export Tag: ${tag}`, Payload.QuestionTextClean ?? ''];

  if (question.qtNotes !== undefined) lines.push(...question.qtNotes);
  if (hasDisplayLogic(question)) lines.push(DISPLAY_LOGIC_REFERRAL);

  const columns = responseColumnNames(question.Responses);
  if (!hasTable && isTextEntry) {
    lines.push(`Question ${tag} is a text entry question. See Appendix.`);
  } else if (!hasTable && !columns.every(isTextColumn)) {
    lines.push(`The results table for Question ${tag} could not be automatically processed.`);
  }

  if (!isTextEntry) {
    const textColumns = textColumnNames(question.Responses).length;
    if (textColumns === 1) {
      lines.push('This question has a text entry component. See Appendix.');
    } else if (textColumns > 1) {
      lines.push('This question has multiple text entry components. See Appendices.');
    }
  }

  return lines;
}

export function renderQuestionDescription(question: Question, renderer: TableRenderer): string[] {
  const fragments = [
    renderer.render(singleColumn(TABLE_CLASSES.questionDescription, questionDescriptionLines(question))),
    '&nbsp;',
  ];

  if (question.Table !== undefined) {
    fragments.push(
      renderer.render({
        className: TABLE_CLASSES.results,
        header: question.Table.header,
        rows: question.Table.rows,
      }),
    );
  }

  fragments.push('<br><br>');
  return fragments;
}
