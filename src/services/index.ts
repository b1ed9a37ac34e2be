/**
 * services/index.ts
 * Barrel export for loading, exporting, logging and error services.
 */

export { SurveyLoader, SurveyDocumentSchema } from './survey-loader.js';
export { ReportExporter, REPORT_FILES } from './report-exporter.js';
export { SurveyValidationError, ReportContractError } from './errors.js';
export { ConsoleLogger, FileLogger, TeeLogger, SilentLogger } from './logger.js';
export type { Logger, LogLevel } from './logger.js';
