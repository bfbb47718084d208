/**
 * noderange — Errors
 *
 * Every failure to read a node name or range is a ParseError; code
 * tells which rule was broken.
 */

export type ParseErrorCode =
  | 'InvalidNodeSyntax'
  | 'InvalidRangeSyntax'
  | 'MismatchedRangeWidth'
  | 'EmptyInput';

export class ParseError extends Error {
  constructor(
    public readonly code: ParseErrorCode,
    detail: string,
    public readonly token: string,
    public readonly position: number,
  ) {
    super(`Parse error in "${token}" at position ${position}: ${detail}`);
    this.name = 'ParseError';
  }
}
