/**
 * logic-utils.ts
 * Pure helpers for turning exported display/skip logic into text lines.
 */

import type { Choice, LogicTree, QuestionPayload } from '../models/survey.js';

/** Strip markup from an exported HTML snippet and normalize whitespace. */
export function cleanHtml(html: string): string {
  return html
    .replace(/<[^>]*>/g, ' ')
    .replace(/&nbsp;/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Collect every condition `Description` in a logic tree, depth-first in key
 * order, cleaned of markup. Empty descriptions are dropped.
 */
export function collectLogicDescriptions(tree: LogicTree): string[] {
  const out: string[] = [];
  walk(tree, out);
  return out;
}

function walk(node: unknown, out: string[]): void {
  if (Array.isArray(node)) {
    for (const child of node) walk(child, out);
    return;
  }
  if (node === null || typeof node !== 'object') return;

  for (const [key, value] of Object.entries(node)) {
    if (key === 'Description') {
      if (typeof value === 'string') {
        const text = cleanHtml(value);
        if (text !== '') out.push(text);
      }
    } else {
      walk(value, out);
    }
  }
}

/**
 * Lines describing all display and skip logic attached to a question.
 * Returns an empty list when the question carries none.
 */
export function logicLines(payload: QuestionPayload): string[] {
  const lines: string[] = [];

  if (payload.DisplayLogic !== undefined) {
    lines.push('Display Logic:', ...collectLogicDescriptions(payload.DisplayLogic));
  }
  lines.push(...entryLogicLines('Choice', payload.Choices));
  lines.push(...entryLogicLines('Answer', payload.Answers));

  if (payload.SkipLogic !== undefined && payload.SkipLogic.length > 0) {
    lines.push('Skip Logic:');
    for (const entry of payload.SkipLogic) {
      lines.push(cleanHtml(entry.Description));
    }
  }

  return lines;
}

function entryLogicLines(label: 'Choice' | 'Answer', entries: Record<string, Choice> | undefined): string[] {
  if (entries === undefined) return [];
  const lines: string[] = [];
  for (const [id, entry] of Object.entries(entries)) {
    if (entry.DisplayLogic === undefined) continue;
    const display = entry.Display !== undefined ? cleanHtml(entry.Display) : id;
    lines.push(`${label} Display Logic for ${display}:`, ...collectLogicDescriptions(entry.DisplayLogic));
  }
  return lines;
}
