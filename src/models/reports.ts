/**
 * reports.ts
 * Output types produced by the report builders.
 */

import type { ReportConfig } from './report-config.js';

/**
 * A linearized HTML report. `fragments` keeps the pieces in emission order;
 * `html` is their newline-joined form.
 */
export interface HtmlReport {
  fragments: string[];
  html: string;
}

export interface TextAppendixReport extends HtmlReport {
  /** Number of lettered appendices emitted (A, B, ... counts). */
  appendixCount: number;
}

/** A Flow entry that could not be mapped onto exactly one block. */
export interface FlowSkip {
  blockId: string;
  reason: 'unmatched' | 'ambiguous';
}

export interface BlockOrdering {
  /** 0-based block indices in display order. */
  indices: number[];
  skipped: FlowSkip[];
}

export interface ReportStats {
  blockCount: number;
  orderedBlockCount: number;
  questionCount: number;
  appendixCount: number;
  displayLogicTableCount: number;
  uncodeableTags: string[];
}

/** Everything one orchestrator run produces. */
export interface ReportBundle {
  config: ReportConfig;
  results: HtmlReport;
  textAppendices: TextAppendixReport;
  displayLogic: HtmlReport;
  uncodeableMessage: string;
  stats: ReportStats;
}

export function toHtmlReport(fragments: string[]): HtmlReport {
  return { fragments, html: fragments.join('\n') };
}
