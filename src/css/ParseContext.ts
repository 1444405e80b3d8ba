/**
 * Per-call parser state
 *
 * One context is created by each top-level parse call and threaded
 * through every grammar function, so a CSSParser holds no mutable state
 * between calls.
 *
 * @since 2025-12-08
 */

import { CSSTokenizer } from '../tokenizer/CSSTokenizer.js';
import type { CSSToken } from '../tokenizer/types.js';
import type { CSSParseError } from './errors.js';

export interface ParseContext {
  readonly tokenizer: CSSTokenizer;

  /** Recorded errors, in the order they were found */
  readonly errors: CSSParseError[];

  /** Top-level comments waiting for the next rule */
  comments: string[];
}

export function createParseContext(css: string): ParseContext {
  return {
    tokenizer: new CSSTokenizer(css),
    errors: [],
    comments: [],
  };
}

/**
 * Tokens with no meaning between grammar elements
 */
export function isInsignificant(token: CSSToken): boolean {
  switch (token.type) {
    case 'whitespace':
    case 'comment':
    case 'bad-comment':
    case 'cdo':
    case 'cdc':
      return true;
    default:
      return false;
  }
}

/**
 * Drop leading and trailing whitespace and comments from a token run
 */
export function trimTokens(tokens: CSSToken[]): CSSToken[] {
  let first = 0;
  let last = tokens.length;
  while (first < last && isBlank(tokens[first])) {
    first++;
  }
  while (last > first && isBlank(tokens[last - 1])) {
    last--;
  }
  return tokens.slice(first, last);
}

function isBlank(token: CSSToken): boolean {
  return token.type === 'whitespace' || token.type === 'comment' || token.type === 'bad-comment';
}
