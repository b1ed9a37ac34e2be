/**
 * report-exporter.ts
 * Write a ReportBundle to disk.
 *
 * Output layout:
 *   <outDir>/results-tables.html
 *   <outDir>/text-appendices.html
 *   <outDir>/display-logic.html
 *   <outDir>/uncodeable.html
 *   <outDir>/summary.json    : config + stats, keys sorted
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { ReportBundle } from '../models/reports.js';

export const REPORT_FILES = {
  results: 'results-tables.html',
  textAppendices: 'text-appendices.html',
  displayLogic: 'display-logic.html',
  uncodeable: 'uncodeable.html',
  summary: 'summary.json',
} as const;

export class ReportExporter {
  /**
   * Serialize the run summary (config and stats) to deterministic JSON:
   * same bundle → identical bytes.
   */
  static summaryJson(bundle: ReportBundle): string {
    return JSON.stringify(
      { config: bundle.config, stats: bundle.stats },
      ReportExporter._stableSortReplacer(),
      2,
    );
  }

  /** Write every report file, creating the directory as needed. Returns the paths written. */
  static writeReports(bundle: ReportBundle, outDir: string): string[] {
    const resolved = path.resolve(outDir);
    fs.mkdirSync(resolved, { recursive: true });

    const written: string[] = [];
    const write = (name: string, content: string): void => {
      const file = path.join(resolved, name);
      fs.writeFileSync(file, content, 'utf-8');
      written.push(file);
    };

    write(REPORT_FILES.results, bundle.results.html);
    write(REPORT_FILES.textAppendices, bundle.textAppendices.html);
    write(REPORT_FILES.displayLogic, bundle.displayLogic.html);
    write(REPORT_FILES.uncodeable, bundle.uncodeableMessage);
    write(REPORT_FILES.summary, ReportExporter.summaryJson(bundle));
    return written;
  }

  // ---------------------------------------------------------------------------
  // Stable sort replacer
  // ---------------------------------------------------------------------------

  /**
   * JSON.stringify replacer that sorts object keys alphabetically.
   * Arrays keep their order.
   */
  private static _stableSortReplacer(): (key: string, value: unknown) => unknown {
    return (_key: string, value: unknown): unknown => {
      if (value === null || typeof value !== 'object' || Array.isArray(value)) return value;
      const sorted: Record<string, unknown> = {};
      for (const [k, v] of Object.entries(value).sort(([a], [b]) => a.localeCompare(b))) {
        sorted[k] = v;
      }
      return sorted;
    };
  }
}
