/**
 * noderange — Expander
 *
 * Turns parsed tokens into the explicit list of node names. Output
 * keeps token order and is ascending inside each range; it is neither
 * sorted across tokens nor deduplicated.
 */

import type { NodeName, Token } from './types';
import { parseTokens } from './parser';
import { incrementDigits, makeNode } from './node';

export class ExpansionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ExpansionError';
  }
}

/** Expansion limit the command line applies unless told otherwise. */
export const DEFAULT_MAX_EXPANSION = 1_000_000;

export interface ExpandOptions {
  /**
   * Maximum number of node names to produce. If the input would
   * expand beyond this limit, an ExpansionError is thrown.
   * Unset, 0 or Infinity: no limit.
   */
  maxExpansion?: number;
  /** Token separator characters. Default: comma and whitespace */
  separators?: string;
}

/**
 * Calculate the total expansion size without actually expanding.
 */
export function expansionSize(tokens: readonly Token[]): number {
  let total = 0;

  for (const token of tokens) {
    if (token.type === 'node') {
      total += 1;
    } else {
      // Digit runs may be wider than a double can hold exactly
      total += Number(BigInt(token.end) - BigInt(token.start) + 1n);
    }
  }

  return total;
}

/**
 * Expand raw input (one string, or several fragments) into node names.
 *
 * @example
 * ```ts
 * expand('node[01-03],node00').map(n => n.name);
 * // ['node01', 'node02', 'node03', 'node00']
 * ```
 */
export function expand(input: string | readonly string[], options?: ExpandOptions): NodeName[] {
  return expandTokens(parseTokens(input, options?.separators), options);
}

/**
 * Expand already parsed tokens.
 *
 * Throws ExpansionError if maxExpansion is set and would be exceeded.
 */
export function expandTokens(tokens: readonly Token[], options?: ExpandOptions): NodeName[] {
  const maxExpansion = options?.maxExpansion ?? 0;

  if (maxExpansion > 0 && maxExpansion !== Infinity) {
    const size = expansionSize(tokens);
    if (size > maxExpansion) {
      throw new ExpansionError(
        `Input would expand to ${size.toLocaleString('en-US')} nodes, ` +
        `which exceeds the limit of ${maxExpansion.toLocaleString('en-US')}`,
      );
    }
  }

  const nodes: NodeName[] = [];

  for (const token of tokens) {
    if (token.type === 'node') {
      nodes.push(token);
      continue;
    }

    let digits: string | null = token.start;
    while (digits !== null) {
      nodes.push(makeNode(token.prefix, digits));
      if (digits === token.end) break;
      digits = incrementDigits(digits);
    }
  }

  return nodes;
}
