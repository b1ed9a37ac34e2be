/**
 * survey-loader.ts
 * Read and validate a decoded survey document.
 *
 * Unknown keys on blocks, elements and payloads are kept (exports carry many
 * fields the reports never read); the fields the reports do read are
 * type-checked. Any violation becomes a SurveyValidationError listing every
 * issue with its path.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import type { SurveyDocument } from '../models/survey.js';
import { SurveyValidationError } from './errors.js';

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

const CellSchema = z.union([z.string(), z.number(), z.null()]);

const DataTableSchema = z.object({
  header: z.array(z.string()),
  rows: z.array(z.array(CellSchema)),
});

const LogicTreeSchema = z.record(z.unknown());

const ChoiceSchema = z
  .object({
    Display: z.string().optional(),
    TextEntry: z.union([z.boolean(), z.string()]).optional(),
    DisplayLogic: LogicTreeSchema.optional(),
  })
  .passthrough();

const PayloadSchema = z
  .object({
    QuestionType: z.string().optional(),
    Selector: z.string().optional(),
    DataExportTag: z.string().optional(),
    QuestionTextClean: z.string().optional(),
    Choices: z.record(ChoiceSchema).optional(),
    Answers: z.record(ChoiceSchema).optional(),
    DisplayLogic: LogicTreeSchema.optional(),
    SkipLogic: z.array(z.object({ Description: z.string() }).passthrough()).optional(),
  })
  .passthrough();

const BlockElementSchema = z
  .object({
    Type: z.string().optional(),
    QuestionID: z.string().optional(),
    Payload: PayloadSchema.optional(),
    Responses: z.record(z.array(CellSchema)).optional(),
    Table: DataTableSchema.optional(),
    CodedComments: z
      .array(z.object({ responseColumn: z.string(), breakdown: DataTableSchema }))
      .optional(),
    qtSkip: z.boolean().optional(),
    verbatimSkip: z.boolean().optional(),
    qtNotes: z.array(z.string()).optional(),
  })
  .passthrough();

const BlockSchema = z
  .object({
    ID: z.string().optional(),
    Description: z.string().optional(),
    BlockElements: z.array(BlockElementSchema).optional(),
  })
  .passthrough();

export const SurveyDocumentSchema: z.ZodType<SurveyDocument, z.ZodTypeDef, unknown> = z.object({
  blocks: z.array(BlockSchema),
  flow: z.array(z.string()).optional(),
  originalFirstRow: z.record(z.string()).optional(),
});

// ---------------------------------------------------------------------------
// SurveyLoader
// ---------------------------------------------------------------------------

export class SurveyLoader {
  /** Validate an already-decoded value. */
  static parse(value: unknown): SurveyDocument {
    const result = SurveyDocumentSchema.safeParse(value);
    if (!result.success) {
      const issues = result.error.issues.map(
        (issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`,
      );
      throw new SurveyValidationError(
        `Survey document is invalid (${issues.length} issue${issues.length === 1 ? '' : 's'}):\n  ` +
        issues.join('\n  '),
        issues,
      );
    }
    return result.data;
  }

  /** Parse JSON text and validate it. */
  static parseJson(text: string, source = '(input)'): SurveyDocument {
    let decoded: unknown;
    try {
      decoded = JSON.parse(text);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new SurveyValidationError(`${source} is not valid JSON: ${reason}`);
    }
    return SurveyLoader.parse(decoded);
  }

  static readFile(filePath: string): SurveyDocument {
    const resolved = path.resolve(filePath);
    if (!fs.existsSync(resolved)) {
      throw new SurveyValidationError(`Survey file not found: ${resolved}`);
    }
    return SurveyLoader.parseJson(fs.readFileSync(resolved, 'utf-8'), resolved);
  }
}
