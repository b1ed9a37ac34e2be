/**
 * orchestrator/index.ts
 * Barrel export for the report orchestrator.
 */

export { ReportOrchestrator } from './report-orchestrator.js';
export type { ReportOrchestratorOptions } from './report-orchestrator.js';
