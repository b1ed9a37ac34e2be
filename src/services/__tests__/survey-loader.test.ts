/**
 * survey-loader.test.ts
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { SurveyValidationError } from '../errors.js';
import { SurveyLoader } from '../survey-loader.js';

describe('SurveyLoader.parse', () => {
  it('accepts a minimal document', () => {
    expect(SurveyLoader.parse({ blocks: [] })).toEqual({ blocks: [] });
  });

  it('keeps unknown keys on blocks, elements and payloads', () => {
    const doc = SurveyLoader.parse({
      blocks: [
        {
          ID: 'BL_1',
          Type: 'Standard',
          BlockElements: [{ Type: 'Question', Extra: 1, Payload: { QuestionType: 'MC', Language: 'EN' } }],
        },
      ],
      flow: ['BL_1'],
    });

    expect(doc.blocks[0]).toEqual({
      ID: 'BL_1',
      Type: 'Standard',
      BlockElements: [{ Type: 'Question', Extra: 1, Payload: { QuestionType: 'MC', Language: 'EN' } }],
    });
    expect(doc.flow).toEqual(['BL_1']);
  });

  it('accepts text entry flags as booleans or strings', () => {
    const doc = SurveyLoader.parse({
      blocks: [
        {
          BlockElements: [
            { Payload: { QuestionType: 'MC', Choices: { '1': { Display: 'A', TextEntry: 'true' }, '2': { TextEntry: true } } } },
          ],
        },
      ],
    });
    expect(doc.blocks[0]?.BlockElements?.[0]?.Payload?.Choices?.['1']?.TextEntry).toBe('true');
  });

  it('reports a missing blocks list', () => {
    expect(() => SurveyLoader.parse({})).toThrow('Survey document is invalid (1 issue):\n  blocks: Required');
  });

  it('reports a non-object document at the root', () => {
    expect(() => SurveyLoader.parse(42)).toThrow('(root): Expected object, received number');
  });

  it('lists every issue with its path', () => {
    let caught: unknown;
    try {
      SurveyLoader.parse({
        blocks: [{ BlockElements: [{ qtSkip: 'yes', Responses: { Q1: [true] } }] }],
      });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(SurveyValidationError);
    if (!(caught instanceof SurveyValidationError)) return;
    expect(caught.issues).toContain('blocks.0.BlockElements.0.qtSkip: Expected boolean, received string');
    expect(caught.issues).toHaveLength(2);
    expect(caught.message.startsWith('Survey document is invalid (2 issues):')).toBe(true);
  });
});

describe('SurveyLoader.parseJson', () => {
  it('parses and validates JSON text', () => {
    expect(SurveyLoader.parseJson('{"blocks":[{"ID":"BL_1"}]}')).toEqual({ blocks: [{ ID: 'BL_1' }] });
  });

  it('names the source of malformed JSON', () => {
    expect(() => SurveyLoader.parseJson('{blocks', 'survey.json')).toThrow(/^survey\.json is not valid JSON: /);
  });
});

describe('SurveyLoader.readFile', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'survey-loader-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('reads a survey from disk', () => {
    const file = path.join(dir, 'survey.json');
    fs.writeFileSync(file, JSON.stringify({ blocks: [], originalFirstRow: { Q1_TEXT: 'Q1 - Text' } }), 'utf-8');
    expect(SurveyLoader.readFile(file).originalFirstRow).toEqual({ Q1_TEXT: 'Q1 - Text' });
  });

  it('fails for a missing file', () => {
    const file = path.join(dir, 'absent.json');
    expect(() => SurveyLoader.readFile(file)).toThrow(`Survey file not found: ${file}`);
  });
});
