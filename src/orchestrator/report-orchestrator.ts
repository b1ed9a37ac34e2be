/**
 * report-orchestrator.ts
 * Single entry-point for a complete report generation run.
 *
 * Pipeline order:
 *   1. Resolve block order (flow → indices), warn on skipped flow entries
 *   2. ResultsReportBuilder.build
 *   3. TextAppendixBuilder.build
 *   4. DisplayLogicBuilder.build
 *   5. Uncodeable-questions message
 *   6. Assemble ReportBundle (reports + stats)
 *   7. Optional disk output
 */

import type { SurveyDocument } from '../models/survey.js';
import type { ReportConfig, ReportConfigInput } from '../models/report-config.js';
import { resolveReportConfig } from '../models/report-config.js';
import type { ReportBundle } from '../models/reports.js';
import { resolveBlockOrder } from '../analyzers/block-order.js';
import { ResultsReportBuilder } from '../builders/results-report-builder.js';
import { TextAppendixBuilder } from '../builders/text-appendix-builder.js';
import { DisplayLogicBuilder } from '../builders/display-logic-builder.js';
import {
  questionsFromBlocks,
  uncodeableQuestions,
  uncodeableQuestionsMessage,
} from '../builders/uncodeable-questions.js';
import { HtmlTableRenderer, type TableRenderer } from '../renderers/html-table-renderer.js';
import { ReportExporter } from '../services/report-exporter.js';
import { SilentLogger } from '../services/logger.js';
import type { Logger } from '../services/logger.js';

export interface ReportOrchestratorOptions {
  /** When set, report files are written to this directory. */
  outputDir?: string;
  logger?: Logger;
  renderer?: TableRenderer;
}

export class ReportOrchestrator {
  private readonly _cfg: ReportConfig;
  private readonly _options: ReportOrchestratorOptions;
  private readonly _log: Logger;

  constructor(cfg: ReportConfigInput = {}, options: ReportOrchestratorOptions = {}) {
    this._cfg = resolveReportConfig(cfg);
    this._options = options;
    this._log = options.logger ?? new SilentLogger();
  }

  run(survey: SurveyDocument): ReportBundle {
    this._log.info('Report generation starting', { blocks: survey.blocks.length });
    const renderer = this._options.renderer ?? new HtmlTableRenderer();

    // Step 1: Block order
    const ordering = resolveBlockOrder(survey.blocks, survey.flow);
    for (const skip of ordering.skipped) {
      this._log.warn('Flow entry skipped', { blockId: skip.blockId, reason: skip.reason });
    }
    this._log.info('Step 1/5  Block order resolved', {
      ordered: ordering.indices.length,
      flow: survey.flow !== undefined,
    });

    // Step 2: Results tables
    const results = new ResultsReportBuilder(this._cfg, this._log, renderer).build(survey, ordering);
    this._log.info('Step 2/5  Results tables built', { fragments: results.fragments.length });

    // Step 3: Text appendices
    const textAppendices = new TextAppendixBuilder(this._cfg, this._log, renderer).build(survey, ordering);
    this._log.info('Step 3/5  Text appendices built', { appendices: textAppendices.appendixCount });

    // Step 4: Display logic
    const displayLogic = new DisplayLogicBuilder(this._log, renderer).build(survey, ordering);
    const displayLogicTableCount = displayLogic.fragments.length / 2;
    this._log.info('Step 4/5  Display logic built', { tables: displayLogicTableCount });

    // Step 5: Uncodeable questions
    const questions = questionsFromBlocks(survey.blocks);
    const uncodeableTags = uncodeableQuestions(questions).map((q) => q.Payload.DataExportTag ?? '');
    const uncodeableMessage = uncodeableQuestionsMessage(questions);
    if (uncodeableTags.length > 0) {
      this._log.warn('Questions without results tables', { tags: uncodeableTags });
    }
    this._log.info('Step 5/5  Uncodeable questions listed', { count: uncodeableTags.length });

    const bundle: ReportBundle = {
      config: this._cfg,
      results,
      textAppendices,
      displayLogic,
      uncodeableMessage,
      stats: {
        blockCount: survey.blocks.length,
        orderedBlockCount: ordering.indices.length,
        questionCount: questions.length,
        appendixCount: textAppendices.appendixCount,
        displayLogicTableCount,
        uncodeableTags,
      },
    };

    if (this._options.outputDir !== undefined) {
      this._log.info('Writing reports', { dir: this._options.outputDir });
      const files = ReportExporter.writeReports(bundle, this._options.outputDir);
      this._log.info('Reports written', { files: files.length });
    }

    this._log.info('Report generation complete');
    return bundle;
  }
}
