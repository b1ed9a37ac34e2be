/**
 * report-orchestrator.integration.test.ts
 *
 * Integration tests for ReportOrchestrator using the in-repo fixture at
 * tests/fixtures/sample-survey.json.
 *
 * Fixture structure:
 *   BL_1 "Intro & Screening": Q1 (MC, table), Q2 (TE, display logic), page break
 *   BL_2 "Details": Q3 (MC with "Other" text, skip logic), Q4 (Matrix, no table),
 *                   Q5 (TE with 20 coded comments)
 *   BL_3: empty
 *   Flow: BL_2, BL_1, BL_3, BL_9 (unknown)
 *
 * These tests verify:
 *   1. Report files are written when outputDir is set
 *   2. Blocks follow the flow; the unknown entry is warned about
 *   3. Appendix lettering runs across blocks in flow order
 *   4. Display logic tables, uncodeable message and stats
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import type { ReportConfigInput } from '../../models/report-config.js';
import type { ReportBundle } from '../../models/reports.js';
import { FileLogger } from '../../services/logger.js';
import { SurveyLoader } from '../../services/survey-loader.js';
import { ReportOrchestrator } from '../report-orchestrator.js';

// ---------------------------------------------------------------------------
// Fixture paths
// ---------------------------------------------------------------------------

const FIXTURE_PATH = path.resolve('tests/fixtures/sample-survey.json');

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

let tmpDir: string;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'survey-reports-int-'));
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

function run(cfg: ReportConfigInput = {}, outputDir?: string, logger?: FileLogger): ReportBundle {
  const survey = SurveyLoader.readFile(FIXTURE_PATH);
  return new ReportOrchestrator(cfg, { outputDir, logger }).run(survey);
}

function appendixTitles(html: string): string[] {
  return [...html.matchAll(/<td>(Appendix [A-Z]+)<\/td>/g)].map((m) => m[1] ?? '');
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('ReportOrchestrator: integration (sample-survey fixture)', () => {
  describe('Output writing', () => {
    it('creates the output directory and writes every report', () => {
      const outDir = path.join(tmpDir, 'sub', 'output');
      run({}, outDir);
      expect(fs.readdirSync(outDir).sort()).toEqual([
        'display-logic.html',
        'results-tables.html',
        'summary.json',
        'text-appendices.html',
        'uncodeable.html',
      ]);
    });

    it('writes report contents matching the bundle', () => {
      const bundle = run({}, tmpDir);
      expect(fs.readFileSync(path.join(tmpDir, 'text-appendices.html'), 'utf-8')).toBe(bundle.textAppendices.html);
      expect(fs.readFileSync(path.join(tmpDir, 'uncodeable.html'), 'utf-8')).toBe(bundle.uncodeableMessage);

      const summary: unknown = JSON.parse(fs.readFileSync(path.join(tmpDir, 'summary.json'), 'utf-8'));
      expect(summary).toEqual({ config: bundle.config, stats: bundle.stats });
    });

    it('writes nothing without an outputDir', () => {
      run();
      expect(fs.readdirSync(tmpDir)).toEqual([]);
    });
  });

  describe('Block order', () => {
    it('emits block headers in flow order', () => {
      const { results } = run();
      expect(results.fragments[0]).toBe('<br>');
      expect(results.fragments[1]).toBe('<h5>Details</h5><br>');
      expect(results.fragments).toContain('<h5>Intro &amp; Screening</h5><br>');
      expect(results.html).not.toContain('<h5>Unused</h5>');
      expect(results.html.indexOf('Export Tag: Q3')).toBeLessThan(results.html.indexOf('Export Tag: Q1'));
    });

    it('warns about flow entries that match no block', () => {
      const logger = new FileLogger('warn');
      run({}, undefined, logger);
      expect(logger.lines.some((l) => l.endsWith('Flow entry skipped  {"blockId":"BL_9","reason":"unmatched"}'))).toBe(true);
    });

    it('omits block headers when configured', () => {
      const { results } = run({ includeBlockHeaders: false });
      expect(results.html).not.toContain('<h5>');
    });
  });

  describe('Text appendices', () => {
    it('letters appendices across blocks in flow order', () => {
      const { textAppendices } = run();
      expect(textAppendices.appendixCount).toBe(4);
      expect(appendixTitles(textAppendices.html)).toEqual(['Appendix A', 'Appendix B', 'Appendix C', 'Appendix D']);
    });

    it('labels the "Other" component with the header row choice text', () => {
      const { textAppendices } = run();
      expect(textAppendices.html).toContain(
        '<tr><th>Export Tag: Q3_4_TEXT</th></tr>\n' +
          '<tr><td>Appendix A</td></tr>\n' +
          '<tr><td>Why did you choose us?-Other (please specify)</td></tr>',
      );
    });

    it('tables coded comments above the threshold before verbatim responses', () => {
      const { textAppendices } = run();
      expect(textAppendices.html).toContain('<tr><td>Appendix B</td><td>Appendix B</td></tr>');
      expect(textAppendices.html).toContain('<tr><td>Total</td><td>20</td></tr>');
      expect(textAppendices.html).toContain(
        '<tr><td>Responses: (2)</td></tr>\n<tr><td>Friendly staff</td></tr>\n<tr><td>Parking was hard</td></tr>',
      );
    });

    it('drops coded comments at a higher threshold', () => {
      const { textAppendices } = run({ nThreshold: 20 });
      expect(textAppendices.appendixCount).toBe(3);
      expect(textAppendices.html).not.toContain('Coded Comments');
    });

    it('filters the missing sentinel from verbatim responses', () => {
      const { textAppendices } = run();
      expect(textAppendices.html).toContain(
        '<tr><td>Appendix D</td></tr>\n' +
          '<tr><td>What brought you back?</td></tr>\n' +
          '<tr><td>Verbatim responses -- these have not been edited in any way.</td></tr>\n' +
          '<tr><td></td></tr>\n' +
          '<tr><td>Responses: (2)</td></tr>\n' +
          '<tr><td>Great service</td></tr>\n' +
          '<tr><td>Too slow</td></tr>',
      );
      expect(textAppendices.html).not.toContain('-99');
    });
  });

  describe('Display logic', () => {
    it('tables skip logic and display logic in flow order', () => {
      const { displayLogic } = run();
      expect(displayLogic.fragments).toHaveLength(4);
      expect(displayLogic.fragments[0]).toContain(
        '<tr><td>Skip Logic:</td></tr>\n<tr><td>If Other is selected, skip to end of block</td></tr>',
      );
      expect(displayLogic.fragments[2]).toContain(
        '<tr><td>Display Logic:</td></tr>\n<tr><td>If Have you visited before? Yes Is Selected</td></tr>',
      );
    });
  });

  describe('Summary', () => {
    it('names the uncodeable question', () => {
      const bundle = run();
      expect(bundle.uncodeableMessage).toBe('<b>The following questions could not be automatically processed: Q4</b>');
    });

    it('reports run statistics', () => {
      expect(run().stats).toEqual({
        blockCount: 3,
        orderedBlockCount: 3,
        questionCount: 5,
        appendixCount: 4,
        displayLogicTableCount: 2,
        uncodeableTags: ['Q4'],
      });
    });

    it('is deterministic across runs', () => {
      const a = run();
      const b = run();
      expect(a.results.html).toBe(b.results.html);
      expect(a.textAppendices.html).toBe(b.textAppendices.html);
      expect(a.displayLogic.html).toBe(b.displayLogic.html);
    });
  });
});
