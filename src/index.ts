/**
 * css-subset-parser
 *
 * Tokenizer and error-recovering parser for the CSS subset used to style
 * drawing elements.
 *
 * ## Recommended API:
 * - CSSParser - stylesheets, inline declaration lists and file summaries
 * - readCSSSource - load stylesheet text from a path, URL, buffer or stream
 * - selectorToString, ruleToString, ... - text form of AST nodes
 *
 * ## Low-level:
 * - CSSTokenizer, tokenize - pull-based tokenizer with one-token pushback
 */

// =============================================================================
// PUBLIC API
// =============================================================================

export * from './css/index.js';
export * from './ast/index.js';
export * from './io/index.js';

// =============================================================================
// LOW-LEVEL API
// =============================================================================

export * from './tokenizer/index.js';
