/**
 * errors.ts
 * Error types raised to callers of the report engine.
 */

/** Input document failed schema validation. */
export class SurveyValidationError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = 'SurveyValidationError';
    this.issues = issues;
  }
}

/**
 * A precondition of the engine was violated by well-formed but
 * inconsistent input, e.g. an element without a question type that carries
 * responses to appendicize.
 */
export class ReportContractError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ReportContractError';
  }
}
