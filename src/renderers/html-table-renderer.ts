/**
 * html-table-renderer.ts
 * Table markup shared by every report renderer.
 *
 * Cell text is HTML-escaped (&, <, >) and otherwise reproduced verbatim.
 * No row names are emitted; the header row is optional.
 */

import type { Cell } from '../models/survey.js';

// ---------------------------------------------------------------------------
// CSS classes
// ---------------------------------------------------------------------------

export const TABLE_CLASSES = {
  questionDescription: 'question_description data table table-bordered table-condensed',
  results: 'data table table-bordered table-condensed',
  textAppendices: 'text_appendices data table table-bordered table-condensed',
  surveyLogic: 'survey_logic data table table-bordered table-condensed',
} as const;

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface TableSpec {
  className: string;
  /** Column headers. Omitted for header-less tables. */
  header?: readonly string[];
  rows: readonly (readonly Cell[])[];
}

export interface TableRenderer {
  render(table: TableSpec): string;
}

// ---------------------------------------------------------------------------
// HtmlTableRenderer
// ---------------------------------------------------------------------------

export class HtmlTableRenderer implements TableRenderer {
  render(table: TableSpec): string {
    const lines: string[] = [`<table class="${escapeHtml(table.className)}">`];
    if (table.header !== undefined) {
      lines.push('<tr>' + table.header.map((h) => `<th>${escapeHtml(h)}</th>`).join('') + '</tr>');
    }
    for (const row of table.rows) {
      lines.push('<tr>' + row.map((c) => `<td>${escapeHtml(cellText(c))}</td>`).join('') + '</tr>');
    }
    lines.push('</table>');
    return lines.join('\n');
  }
}

/** Build a header-less one-column table spec from a list of lines. */
export function singleColumn(className: string, lines: readonly Cell[]): TableSpec {
  return { className, rows: lines.map((line) => [line]) };
}

export function cellText(cell: Cell | undefined): string {
  if (cell === null || cell === undefined) return '';
  return String(cell);
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;');
}
