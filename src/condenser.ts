/**
 * noderange — Condenser
 *
 * Produces the shortest range notation for a set of nodes: every
 * maximal run of successive nodes becomes one token.
 */

import type { NodeName } from './types';
import { formatNode, isSuccessor } from './node';
import { expandUnique } from './sorter';
import type { ExpandOptions } from './expander';

interface Run {
  first: NodeName;
  last: NodeName;
}

function formatRun(run: Run): string {
  if (run.first === run.last) {
    return formatNode(run.first);
  }
  return `${run.first.prefix}[${run.first.digits}-${run.last.digits}]`;
}

/**
 * Condense a sorted, duplicate-free node list into range notation.
 *
 * @example
 * ```ts
 * condenseNodes(expandUnique('node03 node01 node02 node07'));
 * // 'node[01-03],node07'
 * ```
 */
export function condenseNodes(sorted: readonly NodeName[]): string {
  const runs: Run[] = [];
  let current: Run | undefined;

  for (const node of sorted) {
    if (current !== undefined && isSuccessor(current.last, node)) {
      current.last = node;
      continue;
    }
    if (current !== undefined) {
      runs.push(current);
    }
    current = { first: node, last: node };
  }

  // End of input closes the last open run
  if (current !== undefined) {
    runs.push(current);
  }

  return runs.map(formatRun).join(',');
}

/**
 * Expand, sort and deduplicate the input, then condense it.
 *
 * @example
 * ```ts
 * condense(['node00', 'node02', 'node01', 'node09']);
 * // 'node[00-02],node09'
 * ```
 */
export function condense(input: string | readonly string[], options?: ExpandOptions): string {
  return condenseNodes(expandUnique(input, options));
}
