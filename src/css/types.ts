/**
 * Types for CSS Parser
 *
 * Options and results of the parse operations
 *
 * @since 2025-12-06
 */

import type { Declaration, Stylesheet } from '../ast/types.js';
import type { CSSParseError } from './errors.js';

/**
 * Options for CSSParser
 */
export interface CSSParserOptions {
  /** Attach top-level comments to the rule that follows them (default: false) */
  attachComments?: boolean;

  /** Log parse warnings and source failures to the console (default: true) */
  logWarnings?: boolean;
}

/**
 * Result of parsing a stylesheet
 */
export interface StylesheetParseResult {
  stylesheet: Stylesheet;

  /** Recorded errors; the stylesheet holds whatever survived recovery */
  errors: CSSParseError[];
}

/**
 * Result of parsing an inline declaration list (e.g. a style attribute)
 */
export interface DeclarationListParseResult {
  declarations: Declaration[];
  errors: CSSParseError[];
}

/**
 * Custom property definition
 */
export interface CSSVariable {
  /** Variable name (e.g., "--primary-color") */
  name: string;

  /** Value text */
  value: string;

  /** Selector group of the defining rule (e.g., ":root") */
  scope: string;

  /** Line number */
  line: number;
}

/**
 * Stylesheet summary
 */
export interface StylesheetInfo {
  /** Unique identifier */
  uuid: string;

  /** File path as given */
  file: string;

  /** Content hash for change detection */
  hash: string;

  /** Total lines */
  linesOfCode: number;

  /** Number of top-level rules of either kind */
  ruleCount: number;

  /** Number of at-rules */
  atRuleCount: number;

  /** Number of selectors across all style rules */
  selectorCount: number;

  /** Number of declarations across all style rules */
  declarationCount: number;

  /** Custom properties defined */
  variables: CSSVariable[];

  /** @import targets */
  imports: string[];

  /** @font-face rule count */
  fontFaceCount: number;

  /** @keyframes names */
  keyframeNames: string[];

  /** @media queries */
  mediaQueries: string[];

  /** Number of recorded parse errors */
  errorCount: number;
}

/**
 * Result of parsing a CSS file
 */
export interface CSSParseResult {
  /** Summary of the file */
  document: StylesheetInfo;

  stylesheet: Stylesheet;

  errors: CSSParseError[];
}
