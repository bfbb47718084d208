/**
 * noderange — Parser
 *
 * Splits raw input into tokens and parses each token into a typed
 * value (see types.ts). The grammar is small:
 *
 *   token  = prefix, ( digits | range ) ;
 *   range  = "[", digits, "-", digits, "]" ;
 *   prefix = letter-or-underscore, { letter-or-underscore }, [ "-" | "_" ] ;
 *   digits = digit, { digit } ;
 */

import type { RangeToken, Token } from './types';
import { ParseError } from './errors';
import { parseNode } from './node';

/** Commas and whitespace are interchangeable token separators. */
export const DEFAULT_SEPARATORS = ', \t\n\r';

const PREFIX_CHAR = /^[A-Za-z_]$/;
const DIGIT = /^[0-9]$/;

function isPrefixChar(ch: string): boolean {
  return PREFIX_CHAR.test(ch);
}

function isDigit(ch: string): boolean {
  return DIGIT.test(ch);
}

/**
 * Split input on any of the separator characters, dropping empty pieces.
 *
 * @example
 * ```ts
 * tokenize('node[00-03], node09 node12');
 * // ['node[00-03]', 'node09', 'node12']
 * ```
 */
export function tokenize(input: string, separators: string = DEFAULT_SEPARATORS): string[] {
  const tokens: string[] = [];
  let current = '';

  for (const ch of input) {
    if (separators.includes(ch)) {
      if (current.length > 0) {
        tokens.push(current);
        current = '';
      }
    } else {
      current += ch;
    }
  }

  if (current.length > 0) {
    tokens.push(current);
  }

  return tokens;
}

/**
 * Parse one token into a literal node or a range.
 *
 * Throws ParseError with code:
 * - InvalidNodeSyntax if a token without '[' is not a node name
 * - InvalidRangeSyntax if a token with '[' is not prefix[digits-digits]
 * - MismatchedRangeWidth if the two digit runs differ in length
 * - EmptyInput for an empty token
 */
export function parseToken(text: string): Token {
  if (text.length === 0) {
    throw new ParseError('EmptyInput', 'Empty token', text, 0);
  }

  if (!text.includes('[')) {
    return parseNode(text);
  }

  return parseRange(text);
}

function parseRange(src: string): RangeToken {
  let pos = 0;

  function peek(): string | undefined {
    return src[pos];
  }

  function advance(): string {
    return src[pos++];
  }

  function fail(detail: string): never {
    throw new ParseError('InvalidRangeSyntax', detail, src, pos);
  }

  function expect(ch: string): void {
    if (peek() !== ch) {
      fail(`Expected '${ch}' but found ${peek() === undefined ? 'end of input' : `'${peek()}'`}`);
    }
    advance();
  }

  function parsePrefix(): string {
    let prefix = '';
    while (pos < src.length && isPrefixChar(src[pos])) {
      prefix += advance();
    }
    if (prefix.length === 0) {
      fail('Expected a prefix of letters or underscores');
    }
    // A trailing '_' has already been taken by the loop above
    if (peek() === '-') {
      prefix += advance();
    }
    return prefix;
  }

  function parseDigits(): string {
    let digits = '';
    while (pos < src.length && isDigit(src[pos])) {
      digits += advance();
    }
    if (digits.length === 0) {
      fail('Expected digits');
    }
    return digits;
  }

  const prefix = parsePrefix();
  expect('[');
  const bracketPos = pos;
  let start = parseDigits();
  expect('-');
  let end = parseDigits();
  expect(']');

  if (pos < src.length) {
    fail(`Unexpected character '${src[pos]}'`);
  }

  if (start.length !== end.length) {
    throw new ParseError(
      'MismatchedRangeWidth',
      `Range bounds '${start}' and '${end}' have different widths`,
      src,
      bracketPos,
    );
  }

  // Same width, so string order is numeric order
  if (start > end) {
    [start, end] = [end, start];
  }

  return { type: 'range', prefix, start, end };
}

/**
 * Tokenize and parse every input fragment. Any failure aborts the
 * whole call; no partial list is returned.
 */
export function parseTokens(input: string | readonly string[], separators?: string): Token[] {
  const fragments = typeof input === 'string' ? [input] : input;
  const tokens: Token[] = [];

  for (const fragment of fragments) {
    for (const text of tokenize(fragment, separators)) {
      tokens.push(parseToken(text));
    }
  }

  return tokens;
}
