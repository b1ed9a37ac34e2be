/**
 * block-order.ts
 * Resolve the display order of survey blocks.
 *
 * Without a flow, blocks are visited in declaration order. With a flow,
 * each flow entry maps to the single block carrying that ID; entries that
 * match no block or several blocks are left out and reported in `skipped`.
 */

import type { Block } from '../models/survey.js';
import type { BlockOrdering, FlowSkip } from '../models/reports.js';

export function resolveBlockOrder(blocks: readonly Block[], flow?: readonly string[]): BlockOrdering {
  if (flow === undefined) {
    return { indices: blocks.map((_, i) => i), skipped: [] };
  }

  const indices: number[] = [];
  const skipped: FlowSkip[] = [];

  for (const blockId of flow) {
    const matches: number[] = [];
    blocks.forEach((block, i) => {
      if (block.ID !== undefined && block.ID === blockId) matches.push(i);
    });

    const [only] = matches;
    if (matches.length === 1 && only !== undefined) {
      indices.push(only);
    } else {
      skipped.push({ blockId, reason: matches.length === 0 ? 'unmatched' : 'ambiguous' });
    }
  }

  return { indices, skipped };
}

/**
 * Blocks in resolved order, keeping only those with at least one element.
 * Empty blocks produce no output in any report.
 */
export function orderedNonEmptyBlocks(
  blocks: readonly Block[],
  ordering: BlockOrdering,
): Array<Block & { BlockElements: NonNullable<Block['BlockElements']> }> {
  const result: Array<Block & { BlockElements: NonNullable<Block['BlockElements']> }> = [];
  for (const i of ordering.indices) {
    const block = blocks[i];
    if (block === undefined) continue;
    const elements = block.BlockElements;
    if (elements === undefined || elements.length === 0) continue;
    result.push({ ...block, BlockElements: elements });
  }
  return result;
}
