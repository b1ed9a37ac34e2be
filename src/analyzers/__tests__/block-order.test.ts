/**
 * block-order.test.ts
 *
 * Covers display-order resolution:
 *   1. Declaration order without a flow
 *   2. Flow order applied to blocks
 *   3. Unknown and duplicated IDs dropped and reported
 *   4. Empty blocks filtered from the walk
 */

import type { Block } from '../../models/survey.js';
import { orderedNonEmptyBlocks, resolveBlockOrder } from '../block-order.js';

function makeBlock(id: string | undefined, elementCount = 1): Block {
  return {
    ...(id !== undefined && { ID: id }),
    Description: `Block ${id ?? '?'}`,
    BlockElements: Array.from({ length: elementCount }, (_, i) => ({ QuestionID: `QID${i + 1}` })),
  };
}

describe('resolveBlockOrder', () => {
  it('uses declaration order when no flow is given', () => {
    const blocks = [makeBlock('b1'), makeBlock('b2'), makeBlock('b3')];
    expect(resolveBlockOrder(blocks)).toEqual({ indices: [0, 1, 2], skipped: [] });
  });

  it('follows the flow', () => {
    const blocks = [makeBlock('b1'), makeBlock('b2')];
    expect(resolveBlockOrder(blocks, ['b2', 'b1']).indices).toEqual([1, 0]);
  });

  it('drops unknown flow entries without throwing', () => {
    const blocks = [makeBlock('b1'), makeBlock('b2')];
    const ordering = resolveBlockOrder(blocks, ['b2', 'missing', 'b1']);
    expect(ordering.indices).toEqual([1, 0]);
    expect(ordering.skipped).toEqual([{ blockId: 'missing', reason: 'unmatched' }]);
  });

  it('drops flow entries that match more than one block', () => {
    const blocks = [makeBlock('dup'), makeBlock('b2'), makeBlock('dup')];
    const ordering = resolveBlockOrder(blocks, ['dup', 'b2']);
    expect(ordering.indices).toEqual([1]);
    expect(ordering.skipped).toEqual([{ blockId: 'dup', reason: 'ambiguous' }]);
  });

  it('never matches blocks without an ID', () => {
    const blocks = [makeBlock(undefined), makeBlock('b2')];
    expect(resolveBlockOrder(blocks, ['b2']).indices).toEqual([1]);
  });

  it('returns an empty order for an empty flow', () => {
    expect(resolveBlockOrder([makeBlock('b1')], []).indices).toEqual([]);
  });
});

describe('orderedNonEmptyBlocks', () => {
  it('keeps order and removes blocks without elements', () => {
    const blocks: Block[] = [
      makeBlock('b1'),
      makeBlock('b2', 0),
      { ID: 'b3', Description: 'No elements key' },
      makeBlock('b4', 2),
    ];
    const result = orderedNonEmptyBlocks(blocks, { indices: [3, 2, 1, 0], skipped: [] });
    expect(result.map((b) => b.ID)).toEqual(['b4', 'b1']);
  });
});
