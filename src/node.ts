/**
 * noderange — Node Model
 *
 * Parsing of single node names and the canonical order between them.
 * Width is part of a node's identity: node9 and node09 are different
 * nodes, and node99 is never followed by node100.
 */

import type { NodeName, Ordering } from './types';
import { ParseError } from './errors';

const NODE_PATTERN = /^([A-Za-z_]+[-_]?)([0-9]+)$/;

/**
 * Parse a node name into prefix and numeric suffix.
 *
 * @example
 * ```ts
 * parseNode('node-07');
 * // { type: 'node', name: 'node-07', prefix: 'node-', digits: '07', width: 2, value: 7 }
 * ```
 */
export function parseNode(text: string): NodeName {
  if (text.length === 0) {
    throw new ParseError('EmptyInput', 'Empty node name', text, 0);
  }

  const match = NODE_PATTERN.exec(text);
  if (!match) {
    throw new ParseError('InvalidNodeSyntax', 'Expected a prefix followed by digits', text, 0);
  }

  return makeNode(match[1], match[2]);
}

/** Build a node from an already validated prefix and digit run. */
export function makeNode(prefix: string, digits: string): NodeName {
  return {
    type: 'node',
    name: prefix + digits,
    prefix,
    digits,
    width: digits.length,
    value: parseInt(digits, 10),
  };
}

export function formatNode(node: NodeName): string {
  return node.prefix + node.digits;
}

/**
 * Compare digit strings of equal width. Lexicographic order on
 * same-width digit strings is numeric order, for any length.
 */
function compareDigits(a: string, b: string): Ordering {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Canonical order: prefix, then suffix width, then suffix value.
 */
export function compareNodes(a: NodeName, b: NodeName): Ordering {
  if (a.prefix !== b.prefix) {
    return a.prefix < b.prefix ? -1 : 1;
  }
  if (a.width !== b.width) {
    return a.width < b.width ? -1 : 1;
  }
  return compareDigits(a.digits, b.digits);
}

export function nodeEquals(a: NodeName, b: NodeName): boolean {
  return compareNodes(a, b) === 0;
}

/**
 * Add one to a digit string, keeping its width.
 * Returns null when the result would need another digit ("99" → null).
 */
export function incrementDigits(digits: string): string | null {
  const chars = [...digits];
  let i = chars.length - 1;

  while (i >= 0) {
    if (chars[i] !== '9') {
      chars[i] = String.fromCharCode(chars[i].charCodeAt(0) + 1);
      return chars.join('');
    }
    chars[i] = '0';
    i--;
  }

  return null;
}

/**
 * True if b directly follows a: same prefix, same width, and b's value
 * is a's value plus one without growing the digit count.
 */
export function isSuccessor(a: NodeName, b: NodeName): boolean {
  if (a.prefix !== b.prefix || a.width !== b.width) {
    return false;
  }
  return incrementDigits(a.digits) === b.digits;
}
