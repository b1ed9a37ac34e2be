/**
 * index.ts
 * Public API of the survey report engine.
 */

export * from './models/index.js';
export * from './builders/index.js';
export * from './renderers/index.js';
export * from './services/index.js';
export * from './orchestrator/index.js';
export { resolveBlockOrder } from './analyzers/block-order.js';
export {
  classifyElement,
  hasDisplayLogic,
  isMultiTextSingleAnswer,
  TEXT_COLUMN_MARKER,
} from './analyzers/question-classifier.js';
export type { QuestionDisposition, DispositionKind } from './analyzers/question-classifier.js';
