/**
 * survey.ts
 * Read-only input model: a decoded survey definition with responses and
 * pre-computed results already attached to each question.
 *
 * Field names follow the survey platform's export format (PascalCase) so that
 * decoded documents can be passed through unchanged.
 */

// ---------------------------------------------------------------------------
// Tabular values
// ---------------------------------------------------------------------------

/** A single table cell as it appears in a response export. */
export type Cell = string | number | null;

/**
 * Column-major response set. Keys are response-field identifiers
 * (e.g. `Q1_TEXT`, `Q4_3_TEXT`); every column has one entry per respondent.
 */
export type ResponseTable = Record<string, Cell[]>;

/** Row-major table with a header row, used for results and breakdowns. */
export interface DataTable {
  header: string[];
  rows: Cell[][];
}

// ---------------------------------------------------------------------------
// Logic
// ---------------------------------------------------------------------------

/**
 * Display logic tree as exported by the survey platform. Conditions are
 * nested objects keyed by position; each condition carries a `Description`
 * (HTML) string. The tree is walked generically.
 */
export type LogicTree = Record<string, unknown>;

export interface SkipLogicEntry {
  /** HTML description of the skip condition. */
  Description: string;
}

// ---------------------------------------------------------------------------
// Questions
// ---------------------------------------------------------------------------

export interface Choice {
  Display?: string;
  /** Platform exports write this as the string "true". */
  TextEntry?: boolean | string;
  DisplayLogic?: LogicTree;
}

export interface QuestionPayload {
  QuestionType?: string;
  Selector?: string;
  DataExportTag?: string;
  QuestionTextClean?: string;
  Choices?: Record<string, Choice>;
  Answers?: Record<string, Choice>;
  DisplayLogic?: LogicTree;
  SkipLogic?: SkipLogicEntry[];
}

/** One manually categorized open-ended component. */
export interface CodedComment {
  /** Response column the comments were coded from. */
  responseColumn: string;
  /** Frequency breakdown; the last row's second cell holds the total. */
  breakdown: DataTable;
}

/**
 * A block element. Only elements with a Payload carrying a QuestionType are
 * questions; anything else is passed over by the reports.
 */
export interface BlockElement {
  Type?: string;
  QuestionID?: string;
  Payload?: QuestionPayload;
  Responses?: ResponseTable;
  Table?: DataTable;
  CodedComments?: CodedComment[];
  qtSkip?: boolean;
  verbatimSkip?: boolean;
  qtNotes?: string[];
}

/** A BlockElement whose Payload is known to carry a QuestionType. */
export interface Question extends BlockElement {
  Payload: QuestionPayload & { QuestionType: string };
}

export interface Block {
  ID?: string;
  Description?: string;
  BlockElements?: BlockElement[];
}

/** A survey as handed over by the upstream decoder. */
export interface SurveyDocument {
  blocks: Block[];
  /** Block IDs in display order. Absent means declaration order. */
  flow?: string[];
  /** Descriptive header row of the response export, keyed by column. */
  originalFirstRow?: Record<string, string>;
}

// ---------------------------------------------------------------------------
// Guards
// ---------------------------------------------------------------------------

export function isQuestion(element: BlockElement): element is Question {
  return element.Payload !== undefined && typeof element.Payload.QuestionType === 'string';
}
