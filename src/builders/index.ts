/**
 * builders/index.ts
 * Barrel export for the report builders.
 */

export { ResultsReportBuilder, buildResultsReport } from './results-report-builder.js';
export { TextAppendixBuilder, buildTextAppendixReport, codedCommentCount } from './text-appendix-builder.js';
export type { AppendixStep } from './text-appendix-builder.js';
export { DisplayLogicBuilder, buildDisplayLogicReport } from './display-logic-builder.js';
export {
  questionsFromBlocks,
  uncodeableQuestions,
  uncodeableQuestionsMessage,
} from './uncodeable-questions.js';
