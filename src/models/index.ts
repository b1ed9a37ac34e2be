/**
 * models/index.ts
 * Barrel export for the survey and report model types.
 */

export type {
  Cell,
  ResponseTable,
  DataTable,
  LogicTree,
  SkipLogicEntry,
  Choice,
  QuestionPayload,
  CodedComment,
  BlockElement,
  Question,
  Block,
  SurveyDocument,
} from './survey.js';

export { isQuestion } from './survey.js';

export type { ReportConfig, ReportConfigInput } from './report-config.js';
export { ReportConfigSchema, resolveReportConfig, DEFAULT_N_THRESHOLD } from './report-config.js';

export type {
  HtmlReport,
  TextAppendixReport,
  FlowSkip,
  BlockOrdering,
  ReportStats,
  ReportBundle,
} from './reports.js';

export { toHtmlReport } from './reports.js';
