/**
 * noderange — Value Types
 *
 * Typed values produced by the parser and consumed by the expander,
 * sorter and condenser. Nothing here is mutated after construction.
 */

/**
 * A single host name split into prefix and zero-padded numeric suffix.
 * e.g. "node-007" → prefix "node-", digits "007", width 3, value 7
 */
export interface NodeName {
  type: 'node';
  /** Full name as written: prefix + digits */
  name: string;
  prefix: string;
  /** Suffix digits as written, leading zeros included */
  digits: string;
  width: number;
  value: number;
}

/**
 * A range token: prefix[start-end]
 * start and end always have the same width, and start <= end.
 */
export interface RangeToken {
  type: 'range';
  prefix: string;
  start: string;
  end: string;
}

/** One parsed token: either a literal node or a range. */
export type Token = NodeName | RangeToken;

/** Result of comparing two nodes under the canonical order. */
export type Ordering = -1 | 0 | 1;
