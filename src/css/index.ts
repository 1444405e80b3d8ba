/**
 * CSS Parser
 *
 * Parses stylesheets and inline declaration lists with error recovery.
 *
 * @since 2025-12-06
 */

export { CSSParser } from './CSSParser.js';
export { CSSParseError } from './errors.js';
export type {
  CSSParserOptions,
  StylesheetParseResult,
  DeclarationListParseResult,
  StylesheetInfo,
  CSSParseResult,
  CSSVariable,
} from './types.js';
