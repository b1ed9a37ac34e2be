/**
 * renderers/index.ts
 * Barrel export for table and fragment renderers.
 */

export { HtmlTableRenderer, TABLE_CLASSES, escapeHtml, singleColumn } from './html-table-renderer.js';
export type { TableRenderer, TableSpec } from './html-table-renderer.js';
export { appendixLabel, appendixTitle } from './appendix-labeler.js';
export { questionDescriptionLines, renderQuestionDescription } from './description-renderer.js';
export {
  renderCodedCommentsAppendix,
  renderNoRespondentsAppendix,
  renderVerbatimAppendix,
  renderNotAutomatableNotice,
  VERBATIM_DISCLAIMER,
  NOT_AUTOMATABLE,
} from './appendix-renderer.js';
export type { AppendixContext } from './appendix-renderer.js';
