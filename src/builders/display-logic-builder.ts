/**
 * display-logic-builder.ts
 * Produces the display-logic report: one table per question that carries
 * display or skip logic, listing export tag, question text and the logic.
 * No block headers are emitted.
 */

import type { SurveyDocument } from '../models/survey.js';
import type { BlockOrdering, HtmlReport } from '../models/reports.js';
import { toHtmlReport } from '../models/reports.js';
import { orderedNonEmptyBlocks, resolveBlockOrder } from '../analyzers/block-order.js';
import { logicLines } from '../analyzers/logic-utils.js';
import { HtmlTableRenderer, TABLE_CLASSES, singleColumn, type TableRenderer } from '../renderers/html-table-renderer.js';
import { SilentLogger } from '../services/logger.js';
import type { Logger } from '../services/logger.js';

export class DisplayLogicBuilder {
  private readonly _log: Logger;
  private readonly _renderer: TableRenderer;

  constructor(logger?: Logger, renderer?: TableRenderer) {
    this._log = logger ?? new SilentLogger();
    this._renderer = renderer ?? new HtmlTableRenderer();
  }

  build(survey: SurveyDocument, ordering?: BlockOrdering): HtmlReport {
    const order = ordering ?? resolveBlockOrder(survey.blocks, survey.flow);
    const fragments: string[] = [];

    for (const block of orderedNonEmptyBlocks(survey.blocks, order)) {
      for (const element of block.BlockElements) {
        if (element.Payload === undefined) continue;

        const lines = logicLines(element.Payload);
        // A lone header line means nothing was attached under it.
        if (lines.length <= 1) continue;

        const rows = [element.Payload.DataExportTag ?? '', element.Payload.QuestionTextClean ?? '', ...lines];
        fragments.push(this._renderer.render(singleColumn(TABLE_CLASSES.surveyLogic, rows)), '<br>');
      }
    }

    this._log.debug('Display logic tables built', { tables: fragments.length / 2 });
    return toHtmlReport(fragments);
  }
}

export function buildDisplayLogicReport(survey: SurveyDocument, logger?: Logger): HtmlReport {
  return new DisplayLogicBuilder(logger).build(survey);
}
