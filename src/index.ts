/**
 * noderange
 *
 * Converts between explicit lists of cluster node names and compact
 * range notation such as node[00-06],node08,node[10-23].
 */

import { parseNode, nodeEquals } from './node';
import { expand } from './expander';
import type { ExpandOptions } from './expander';
import { condense } from './condenser';

export type { NodeName, RangeToken, Token, Ordering } from './types';

export { ParseError } from './errors';
export type { ParseErrorCode } from './errors';
export {
  parseNode,
  makeNode,
  formatNode,
  compareNodes,
  nodeEquals,
  incrementDigits,
  isSuccessor,
} from './node';
export { tokenize, parseToken, parseTokens, DEFAULT_SEPARATORS } from './parser';
export { expand, expandTokens, expansionSize, ExpansionError, DEFAULT_MAX_EXPANSION } from './expander';
export type { ExpandOptions } from './expander';
export { sortNodes, dedup, expandUnique } from './sorter';
export { condense, condenseNodes } from './condenser';

/**
 * Test whether a node name belongs to the expansion of a range.
 *
 * @example
 * ```ts
 * isNodeInRange('node-00', 'node-[00-63]'); // true
 * isNodeInRange('node-02', 'node-[00-01],node-04'); // false
 * ```
 */
export function isNodeInRange(
  target: string,
  range: string | readonly string[],
  options?: ExpandOptions,
): boolean {
  const node = parseNode(target);
  return expand(range, options).some(candidate => nodeEquals(candidate, node));
}

/**
 * Expand range notation into a space-separated node list.
 *
 * @example
 * ```ts
 * r2n('node[01-03],node07'); // 'node01 node02 node03 node07'
 * ```
 */
export function r2n(input: string | readonly string[], options?: ExpandOptions): string {
  return expand(input, options).map(node => node.name).join(' ');
}

/** Condense a node list into range notation. Alias of condense(). */
export const n2r = condense;
