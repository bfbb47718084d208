/**
 * noderange — Sorter / Deduplicator
 */

import type { NodeName } from './types';
import { compareNodes } from './node';
import { expand } from './expander';
import type { ExpandOptions } from './expander';

/**
 * Sort nodes by the canonical order. Returns a new array; the input is
 * left untouched. Array.prototype.sort is stable.
 */
export function sortNodes(nodes: readonly NodeName[]): NodeName[] {
  return [...nodes].sort(compareNodes);
}

/**
 * Drop all but the first node of each run of equal nodes.
 * Input must already be sorted (see sortNodes).
 */
export function dedup(sorted: readonly NodeName[]): NodeName[] {
  const result: NodeName[] = [];

  for (const node of sorted) {
    const last = result[result.length - 1];
    if (last === undefined || compareNodes(last, node) !== 0) {
      result.push(node);
    }
  }

  return result;
}

/**
 * Expand input into a sorted, duplicate-free list of nodes.
 */
export function expandUnique(input: string | readonly string[], options?: ExpandOptions): NodeName[] {
  return dedup(sortNodes(expand(input, options)));
}
