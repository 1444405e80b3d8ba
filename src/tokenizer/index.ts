/**
 * CSS Tokenizer
 *
 * Character stream → classified token stream with one-token pushback.
 *
 * @since 2025-12-08
 */

export { CSSTokenizer, tokenize } from './CSSTokenizer.js';
export type { CSSToken, CSSTokenType, CSSPunctuation } from './types.js';
