/**
 * appendix-renderer.ts
 * Table fragments of the text-appendix report.
 *
 * Each function renders one unit and returns its fragments (table + spacer).
 * Numbering is decided by the caller; these functions only print the label.
 */

import type { Cell, CodedComment, Question } from '../models/survey.js';
import { questionTextForColumn } from '../analyzers/choice-text.js';
import { appendixTitle } from './appendix-labeler.js';
import { TABLE_CLASSES, type TableRenderer } from './html-table-renderer.js';

export const VERBATIM_DISCLAIMER = 'Verbatim responses -- these have not been edited in any way.';
export const CODED_COMMENTS_TAG = 'Coded Comments';
export const NO_RESPONDENTS = 'No respondents answered this question';
export const NOT_AUTOMATABLE =
  'This question could not be automatically processed because the CSV response dataset ' +
  'does not separate the responses for each text entry component of this question.';

export interface AppendixContext {
  renderer: TableRenderer;
  originalFirstRow?: Record<string, string>;
}

function exportTagHeader(value: string): string {
  return `Export Tag: ${value}`;
}

// ---------------------------------------------------------------------------
// Coded comments
// ---------------------------------------------------------------------------

export function renderCodedCommentsAppendix(
  question: Question,
  comment: CodedComment,
  appendixNumber: number,
  ctx: AppendixContext,
): string[] {
  const tag = question.Payload.DataExportTag ?? '';
  const questionText = questionTextForColumn(question, comment.responseColumn, ctx.originalFirstRow);
  const headerLines = [appendixTitle(appendixNumber), questionText, CODED_COMMENTS_TAG, ''];

  const rows: Cell[][] = [
    ...headerLines.map((line) => [line, line]),
    ['Responses', 'N'],
    ...comment.breakdown.rows,
  ];

  return [
    ctx.renderer.render({
      className: TABLE_CLASSES.textAppendices,
      header: [exportTagHeader(tag), exportTagHeader(tag) + ' '],
      rows,
    }),
    '<br>',
  ];
}

// ---------------------------------------------------------------------------
// No respondents
// ---------------------------------------------------------------------------

export function renderNoRespondentsAppendix(
  question: Question,
  appendixNumber: number,
  ctx: AppendixContext,
): string[] {
  const tag = question.Payload.DataExportTag ?? '';
  const lines = [
    appendixTitle(appendixNumber),
    question.Payload.QuestionTextClean ?? '',
    VERBATIM_DISCLAIMER,
    '',
    NO_RESPONDENTS,
  ];

  return [
    ctx.renderer.render({
      className: TABLE_CLASSES.textAppendices,
      header: [exportTagHeader(tag)],
      rows: lines.map((line) => [line]),
    }),
    '<br>',
  ];
}

// ---------------------------------------------------------------------------
// Verbatim responses
// ---------------------------------------------------------------------------

/**
 * One appendix over one or more response columns: a five-line header per
 * column stacked above the respondent rows.
 */
export function renderVerbatimAppendix(
  question: Question,
  columns: readonly string[],
  rows: readonly Cell[][],
  appendixNumber: number,
  ctx: AppendixContext,
): string[] {
  const title = appendixTitle(appendixNumber);
  const responseCount = `Responses: (${rows.length})`;
  const headerColumns = columns.map((column) => [
    title,
    questionTextForColumn(question, column, ctx.originalFirstRow),
    VERBATIM_DISCLAIMER,
    '',
    responseCount,
  ]);

  const headerRows: Cell[][] = [];
  for (let line = 0; line < 5; line++) {
    headerRows.push(headerColumns.map((col) => col[line] ?? ''));
  }

  return [
    ctx.renderer.render({
      className: TABLE_CLASSES.textAppendices,
      header: columns.map(exportTagHeader),
      rows: [...headerRows, ...rows],
    }),
    '<br>',
  ];
}

// ---------------------------------------------------------------------------
// Not automatable
// ---------------------------------------------------------------------------

/** Informational notice; not a numbered appendix. */
export function renderNotAutomatableNotice(question: Question, ctx: AppendixContext): string[] {
  const tag = question.Payload.DataExportTag ?? '';
  return [
    ctx.renderer.render({
      className: TABLE_CLASSES.textAppendices,
      header: [exportTagHeader(tag)],
      rows: [[question.Payload.QuestionTextClean ?? ''], [''], [NOT_AUTOMATABLE]],
    }),
    '<br>',
  ];
}
