import { describe, it, expect } from 'vitest';
import { tokenize, parseToken, parseTokens } from '../src/parser';
import { ParseError } from '../src/errors';

function parseFailure(text: string): ParseError {
  try {
    parseToken(text);
  } catch (e) {
    if (e instanceof ParseError) return e;
    throw e;
  }
  throw new Error(`Expected "${text}" to fail`);
}

describe('parser', () => {
  describe('tokenize', () => {
    it('splits on commas and whitespace alike', () => {
      expect(tokenize('node[00-03], node09 node12')).toEqual(['node[00-03]', 'node09', 'node12']);
    });

    it('collapses empty pieces', () => {
      expect(tokenize('a1,,\t\na2  ')).toEqual(['a1', 'a2']);
    });

    it('returns nothing for separator-only input', () => {
      expect(tokenize('  ,, ')).toEqual([]);
    });

    it('accepts a custom separator set', () => {
      expect(tokenize('a1;b2 c3', ';')).toEqual(['a1', 'b2 c3']);
    });
  });

  describe('literal nodes', () => {
    it('parses a bare node name', () => {
      const token = parseToken('node07');
      expect(token.type).toBe('node');
      expect(token.prefix).toBe('node');
    });

    it('reports InvalidNodeSyntax for bad names', () => {
      expect(parseFailure('node').code).toBe('InvalidNodeSyntax');
      expect(parseFailure('node-x1').code).toBe('InvalidNodeSyntax');
      expect(parseFailure('123').code).toBe('InvalidNodeSyntax');
    });

    it('reports EmptyInput for an empty token', () => {
      expect(parseFailure('').code).toBe('EmptyInput');
    });
  });

  describe('ranges', () => {
    it('parses prefix[start-end]', () => {
      expect(parseToken('node[00-03]')).toEqual({ type: 'range', prefix: 'node', start: '00', end: '03' });
    });

    it('keeps a separator at the end of the prefix', () => {
      expect(parseToken('node-[00-63]')).toEqual({ type: 'range', prefix: 'node-', start: '00', end: '63' });
      expect(parseToken('gpu_[1-4]')).toEqual({ type: 'range', prefix: 'gpu_', start: '1', end: '4' });
    });

    it('swaps reversed bounds', () => {
      expect(parseToken('node[05-02]')).toEqual({ type: 'range', prefix: 'node', start: '02', end: '05' });
    });

    it('rejects bounds of different widths', () => {
      const error = parseFailure('node[0-999]');
      expect(error.code).toBe('MismatchedRangeWidth');
      expect(error.position).toBe(5);
      expect(error.message).toBe(
        `Parse error in "node[0-999]" at position 5: Range bounds '0' and '999' have different widths`,
      );
    });

    it('reports an unterminated range', () => {
      const error = parseFailure('node[00-03');
      expect(error.code).toBe('InvalidRangeSyntax');
      expect(error.position).toBe(10);
      expect(error.message).toBe(
        `Parse error in "node[00-03" at position 10: Expected ']' but found end of input`,
      );
    });

    it('reports other malformed ranges', () => {
      expect(parseFailure('node[00]').code).toBe('InvalidRangeSyntax');
      expect(parseFailure('node[-03]').code).toBe('InvalidRangeSyntax');
      expect(parseFailure('[00-03]').code).toBe('InvalidRangeSyntax');
      expect(parseFailure('node[00-03]x').code).toBe('InvalidRangeSyntax');
      expect(parseFailure('node[a-b]').code).toBe('InvalidRangeSyntax');
      expect(parseFailure('node1[2-3]').code).toBe('InvalidRangeSyntax');
    });
  });

  describe('parseTokens', () => {
    it('parses every fragment in order', () => {
      const tokens = parseTokens(['a1,a[2-3]', 'b1']);
      expect(tokens.map(t => t.type)).toEqual(['node', 'range', 'node']);
    });

    it('aborts on the first bad token', () => {
      expect(() => parseTokens('a1 b[1-22] c3')).toThrow(ParseError);
    });
  });
});
