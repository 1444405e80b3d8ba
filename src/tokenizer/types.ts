/**
 * Types for the CSS tokenizer
 *
 * Token kinds follow CSS Syntax Module Level 3, restricted to what the
 * stylesheet grammar needs.
 *
 * @since 2025-12-08
 */

/**
 * Bracket and punctuation kinds that get a token type of their own
 */
export type CSSPunctuation = '{' | '}' | '(' | ')' | '[' | ']' | ':' | ';' | ',';

/**
 * Token kind
 */
export type CSSTokenType =
  | 'ident'
  | 'hash'
  | 'string'
  | 'number'
  | 'percentage'
  | 'dimension'
  | 'function'
  | 'at-keyword'
  | 'url'
  | 'bad-string'
  | 'bad-url'
  | 'whitespace'
  | 'comment'
  | 'bad-comment'
  | 'cdo'
  | 'cdc'
  | 'include-match'
  | 'dash-match'
  | 'prefix-match'
  | 'suffix-match'
  | 'substring-match'
  | 'column'
  | 'delim'
  | 'eof'
  | CSSPunctuation;

/**
 * A token produced by CSSTokenizer
 */
export interface CSSToken {
  /** Token kind */
  readonly type: CSSTokenType;

  /**
   * Decoded payload: identifier/hash/function/at-keyword name, string or
   * url contents, delimiter character, comment text, or numeric text
   */
  readonly value?: string;

  /** Parsed number for number, percentage and dimension tokens */
  readonly numericValue?: number;

  /** Unit of a dimension ("px", "em"), "%" for percentages */
  readonly unit?: string;

  /** Exact source text */
  readonly raw: string;

  /** Line number (1-indexed) */
  readonly line: number;

  /** Start offset in the source */
  readonly start: number;

  /** End offset in the source (exclusive) */
  readonly end: number;
}
