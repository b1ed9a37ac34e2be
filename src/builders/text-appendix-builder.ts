/**
 * text-appendix-builder.ts
 * Produces the text-appendix report: lettered appendices of coded comment
 * breakdowns and verbatim text responses, in survey display order.
 *
 * Numbering:
 *   - Starts at A for every build() call.
 *   - Advances by one per appendix unit (coded comments, verbatim table,
 *     no-respondents placeholder).
 *   - The not-automatable notice is informational and takes no number.
 * Each question's step returns its fragments together with the count of
 * numbers it consumed; build() threads the running number through.
 */

import type { BlockElement, Cell, CodedComment, Question, SurveyDocument } from '../models/survey.js';
import type { BlockOrdering, TextAppendixReport } from '../models/reports.js';
import type { ReportConfig } from '../models/report-config.js';
import { resolveReportConfig } from '../models/report-config.js';
import { toHtmlReport } from '../models/reports.js';
import { orderedNonEmptyBlocks, resolveBlockOrder } from '../analyzers/block-order.js';
import {
  classifyElement,
  isMultiTextSingleAnswer,
  responseColumnNames,
  type QuestionDisposition,
} from '../analyzers/question-classifier.js';
import { answeredRows } from '../analyzers/response-utils.js';
import {
  renderCodedCommentsAppendix,
  renderNoRespondentsAppendix,
  renderNotAutomatableNotice,
  renderVerbatimAppendix,
  type AppendixContext,
} from '../renderers/appendix-renderer.js';
import { HtmlTableRenderer, escapeHtml, type TableRenderer } from '../renderers/html-table-renderer.js';
import { ReportContractError } from '../services/errors.js';
import { SilentLogger } from '../services/logger.js';
import type { Logger } from '../services/logger.js';

export interface AppendixStep {
  fragments: string[];
  /** Appendix numbers used by this step. */
  consumed: number;
}

function emptyStep(): AppendixStep {
  return { fragments: [], consumed: 0 };
}

type AnsweredDisposition = Exclude<QuestionDisposition, { kind: 'skip' } | { kind: 'unprocessable' }>;

export class TextAppendixBuilder {
  private readonly _cfg: ReportConfig;
  private readonly _log: Logger;
  private readonly _renderer: TableRenderer;

  constructor(cfg: ReportConfig, logger?: Logger, renderer?: TableRenderer) {
    this._cfg = cfg;
    this._log = logger ?? new SilentLogger();
    this._renderer = renderer ?? new HtmlTableRenderer();
  }

  build(survey: SurveyDocument, ordering?: BlockOrdering): TextAppendixReport {
    const order = ordering ?? resolveBlockOrder(survey.blocks, survey.flow);
    const ctx: AppendixContext = {
      renderer: this._renderer,
      ...(survey.originalFirstRow !== undefined && { originalFirstRow: survey.originalFirstRow }),
    };

    const fragments: string[] = [];
    let next = 1;

    for (const block of orderedNonEmptyBlocks(survey.blocks, order)) {
      fragments.push(`<h5>${escapeHtml(block.Description ?? '')}</h5><br>`);
      for (const element of block.BlockElements) {
        const step = this.appendicesForElement(element, next, ctx);
        fragments.push(...step.fragments);
        next += step.consumed;
      }
    }

    const appendixCount = next - 1;
    this._log.debug('Text appendices built', { appendices: appendixCount });
    return { ...toHtmlReport(fragments), appendixCount };
  }

  /** All appendices of one block element, numbered from `first`. */
  appendicesForElement(element: BlockElement, first: number, ctx: AppendixContext): AppendixStep {
    const disposition = classifyElement(element);

    switch (disposition.kind) {
      case 'skip':
        return emptyStep();
      case 'unprocessable':
        if (
          element.CodedComments !== undefined ||
          (element.verbatimSkip !== true && responseColumnNames(element.Responses).length > 0)
        ) {
          throw new ReportContractError(
            `Block element ${element.QuestionID ?? '(no QuestionID)'} carries responses or coded ` +
            `comments but has no Payload with a QuestionType.`,
          );
        }
        return emptyStep();
      case 'descriptive':
      case 'textEntry':
      case 'textColumns':
      case 'standard': {
        const coded = this.codedCommentAppendices(disposition.question, first, ctx);
        const verbatim = this.verbatimAppendices(disposition, first + coded.consumed, ctx);
        return {
          fragments: [...coded.fragments, ...verbatim.fragments],
          consumed: coded.consumed + verbatim.consumed,
        };
      }
      default: {
        const unreachable: never = disposition;
        throw new Error(`Unhandled disposition ${JSON.stringify(unreachable)}`);
      }
    }
  }

  // ---------------------------------------------------------------------------
  // Coded comments
  // ---------------------------------------------------------------------------

  private codedCommentAppendices(question: Question, first: number, ctx: AppendixContext): AppendixStep {
    const fragments: string[] = [];
    let consumed = 0;

    for (const comment of question.CodedComments ?? []) {
      const count = codedCommentCount(question, comment);
      if (count > this._cfg.nThreshold) {
        fragments.push(...renderCodedCommentsAppendix(question, comment, first + consumed, ctx));
        consumed++;
      } else {
        this._log.debug('Coded comments below threshold', {
          tag: question.Payload.DataExportTag,
          column: comment.responseColumn,
          count,
        });
      }
    }

    return { fragments, consumed };
  }

  // ---------------------------------------------------------------------------
  // Verbatim responses
  // ---------------------------------------------------------------------------

  private verbatimAppendices(disposition: AnsweredDisposition, first: number, ctx: AppendixContext): AppendixStep {
    const { question } = disposition;
    if (question.verbatimSkip === true || question.Responses === undefined) return emptyStep();
    const responses = question.Responses;
    const columns = responseColumnNames(responses);
    if (columns.length === 0) return emptyStep();

    switch (disposition.kind) {
      case 'textEntry': {
        const rows = answeredRows(responses, columns);
        const fragments = rows.length === 0
          ? renderNoRespondentsAppendix(question, first, ctx)
          : renderVerbatimAppendix(question, columns, rows, first, ctx);
        return { fragments, consumed: 1 };
      }
      case 'textColumns': {
        const fragments: string[] = [];
        let consumed = 0;
        for (const column of disposition.textColumns) {
          const rows = answeredRows(responses, [column]);
          if (rows.length === 0) {
            fragments.push(...renderNoRespondentsAppendix(question, first + consumed, ctx));
            consumed++;
            continue;
          }
          if (isMultiTextSingleAnswer(question)) {
            this._log.warn('Text entry components cannot be separated', { tag: question.Payload.DataExportTag });
            fragments.push(...renderNotAutomatableNotice(question, ctx));
            break;
          }
          fragments.push(...renderVerbatimAppendix(question, [column], rows, first + consumed, ctx));
          consumed++;
        }
        return { fragments, consumed };
      }
      case 'descriptive':
      case 'standard':
        return emptyStep();
      default: {
        const unreachable: never = disposition;
        throw new Error(`Unhandled disposition ${JSON.stringify(unreachable)}`);
      }
    }
  }
}

/** Categorized-response total: last breakdown row, second cell, as an integer. */
export function codedCommentCount(question: Question, comment: CodedComment): number {
  const last = comment.breakdown.rows.at(-1);
  const cell: Cell | undefined = last?.[1];
  const value = typeof cell === 'number' ? cell : typeof cell === 'string' && cell.trim() !== '' ? Number(cell) : NaN;
  if (!Number.isFinite(value)) {
    throw new ReportContractError(
      `Coded comments for ${question.Payload.DataExportTag ?? '(no tag)'} column ` +
      `"${comment.responseColumn}" have no numeric total in their last row.`,
    );
  }
  return Math.trunc(value);
}

export function buildTextAppendixReport(
  survey: SurveyDocument,
  config: Partial<ReportConfig> = {},
  logger?: Logger,
): TextAppendixReport {
  return new TextAppendixBuilder(resolveReportConfig(config), logger).build(survey);
}
