/**
 * report-config.ts
 * Configuration for a report generation run.
 */

import { z } from 'zod';

/** Minimum coded-comment count (exclusive) before a breakdown is appendicized. */
export const DEFAULT_N_THRESHOLD = 15;

export const ReportConfigSchema = z.object({
  /** Insert `<h5>` block headers into the results-table report. */
  includeBlockHeaders: z.boolean().default(true),
  /** Coded comments are tabled only when their total exceeds this count. */
  nThreshold: z.number().int().min(0).default(DEFAULT_N_THRESHOLD),
});

export type ReportConfig = z.infer<typeof ReportConfigSchema>;
export type ReportConfigInput = z.input<typeof ReportConfigSchema>;

/** Fill in defaults and validate a partial configuration. */
export function resolveReportConfig(input: ReportConfigInput = {}): ReportConfig {
  return ReportConfigSchema.parse(input);
}
