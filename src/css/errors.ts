/**
 * Parse errors
 *
 * @since 2025-12-08
 */

import type { CSSToken } from '../tokenizer/types.js';

/**
 * Grammar violation at a specific token. Collected by CSSParser and
 * returned alongside the AST, never thrown to callers.
 */
export class CSSParseError extends Error {
  /** Line of the offending token (1-indexed) */
  readonly line: number;

  /** Start offset of the offending token */
  readonly start: number;

  /** End offset of the offending token */
  readonly end: number;

  constructor(
    message: string,
    readonly token: CSSToken
  ) {
    super(message);
    this.name = 'CSSParseError';
    this.line = token.line;
    this.start = token.start;
    this.end = token.end;
  }

  /**
   * Message with its position, for logs
   */
  describe(): string {
    return `${this.message} (line ${this.line}, offset ${this.start})`;
  }
}
