/**
 * results-report-builder.ts
 * Produces the results-table report: a description table per question,
 * followed by its pre-computed results table when present.
 *
 * Skipped questions, descriptive boxes and elements without a question type
 * contribute nothing.
 */

import type { SurveyDocument } from '../models/survey.js';
import type { BlockOrdering, HtmlReport } from '../models/reports.js';
import type { ReportConfig } from '../models/report-config.js';
import { resolveReportConfig } from '../models/report-config.js';
import { toHtmlReport } from '../models/reports.js';
import { orderedNonEmptyBlocks, resolveBlockOrder } from '../analyzers/block-order.js';
import { classifyElement } from '../analyzers/question-classifier.js';
import { renderQuestionDescription } from '../renderers/description-renderer.js';
import { HtmlTableRenderer, escapeHtml, type TableRenderer } from '../renderers/html-table-renderer.js';
import { SilentLogger } from '../services/logger.js';
import type { Logger } from '../services/logger.js';

export class ResultsReportBuilder {
  private readonly _cfg: ReportConfig;
  private readonly _log: Logger;
  private readonly _renderer: TableRenderer;

  constructor(cfg: ReportConfig, logger?: Logger, renderer?: TableRenderer) {
    this._cfg = cfg;
    this._log = logger ?? new SilentLogger();
    this._renderer = renderer ?? new HtmlTableRenderer();
  }

  build(survey: SurveyDocument, ordering?: BlockOrdering): HtmlReport {
    const order = ordering ?? resolveBlockOrder(survey.blocks, survey.flow);
    const fragments: string[] = ['<br>'];
    let described = 0;

    for (const block of orderedNonEmptyBlocks(survey.blocks, order)) {
      if (this._cfg.includeBlockHeaders) {
        fragments.push(`<h5>${escapeHtml(block.Description ?? '')}</h5><br>`);
      }

      for (const element of block.BlockElements) {
        const disposition = classifyElement(element);
        switch (disposition.kind) {
          case 'skip':
          case 'unprocessable':
          case 'descriptive':
            break;
          case 'textEntry':
          case 'textColumns':
          case 'standard':
            fragments.push(...renderQuestionDescription(disposition.question, this._renderer));
            described++;
            break;
          default: {
            const unreachable: never = disposition;
            throw new Error(`Unhandled disposition ${JSON.stringify(unreachable)}`);
          }
        }
      }
    }

    this._log.debug('Results tables built', { questions: described });
    return toHtmlReport(fragments);
  }
}

export function buildResultsReport(
  survey: SurveyDocument,
  config: Partial<ReportConfig> = {},
  logger?: Logger,
): HtmlReport {
  return new ResultsReportBuilder(resolveReportConfig(config), logger).build(survey);
}
