import type { RepeatNode } from '../types/ast.js';

/**
 * Highest repetition count an engine will produce for `node`.
 * An open-ended quantifier stops at `limit`, or at `min` when that is larger.
 */
export function effectiveUpperBound(
  node: Pick<RepeatNode, 'min' | 'max'>,
  limit: number
): number {
  return node.max === 'unbounded' ? Math.max(node.min, limit) : node.max;
}
