/**
 * Types for the stylesheet AST
 *
 * Closed tagged unions for rules and selectors. Raw token runs (at-rule
 * header/body, declaration terms) are kept verbatim for the value
 * conversion layer and at-rule interpreters.
 *
 * @since 2025-12-08
 */

import type { CSSToken } from '../tokenizer/types.js';

// =============================================================================
// Selectors
// =============================================================================

/**
 * Attribute selector operator
 *
 * exists `[a]`, equals `[a=v]`, includes `[a~=v]`, dash-match `[a|=v]`,
 * prefix `[a^=v]`, suffix `[a$=v]`, substring `[a*=v]`
 */
export type AttributeOperator =
  | 'exists'
  | 'equals'
  | 'includes'
  | 'dash-match'
  | 'prefix'
  | 'suffix'
  | 'substring';

export interface UniversalSelector {
  type: 'universal';
}

export interface TypeSelector {
  type: 'type';
  name: string;
}

export interface IdSelector {
  type: 'id';
  name: string;
}

export interface ClassSelector {
  type: 'class';
  name: string;
}

export interface AttributeSelector {
  type: 'attribute';
  name: string;
  operator: AttributeOperator;
  /** Absent for the exists operator */
  value?: string;
}

export interface PseudoClassSelector {
  type: 'pseudo-class';
  name: string;
}

/**
 * Functional pseudo-class other than :not(); arguments are kept, not interpreted
 */
export interface PseudoClassFunctionSelector {
  type: 'pseudo-class-function';
  name: string;
  arguments: CSSToken[];
}

export interface NegationSelector {
  type: 'negation';
  inner: SimpleSelector;
}

/**
 * Stands in for a selector that could not be parsed. Never matches.
 */
export interface SelectNothingSelector {
  type: 'select-nothing';
}

export type SimpleSelector =
  | UniversalSelector
  | TypeSelector
  | IdSelector
  | ClassSelector
  | AttributeSelector
  | PseudoClassSelector
  | PseudoClassFunctionSelector
  | NegationSelector
  | SelectNothingSelector;

/**
 * and: compound (`a.b`), descendant: whitespace, child: `>`,
 * adjacent-sibling: `+`, general-sibling: `~`
 */
export type CombinatorType = 'and' | 'descendant' | 'child' | 'adjacent-sibling' | 'general-sibling';

/**
 * Combinator node. Chains lean right: `a > b > c` is child(a, child(b, c)).
 */
export interface CombinatorSelector {
  type: CombinatorType;
  left: SimpleSelector;
  right: Selector;
}

export type Selector = SimpleSelector | CombinatorSelector;

/**
 * Comma separated alternatives, never empty
 */
export type SelectorGroup = [Selector, ...Selector[]];

// =============================================================================
// Declarations and rules
// =============================================================================

/**
 * Property declaration
 */
export interface Declaration {
  /** Property name (e.g., "fill") */
  property: string;

  /** Raw value tokens, bracket runs kept flat */
  terms: CSSToken[];

  /** Value ended with !important (removed from terms) */
  important: boolean;

  /** Source offsets from the property name to the end of the value */
  span: { start: number; end: number };

  /** Line of the property name */
  line: number;
}

/**
 * Directive rule (`@media ...`, `@import ...;`)
 */
export interface AtRule {
  type: 'at-rule';

  /** Keyword without the @ */
  keyword: string;

  /** Tokens between the keyword and `{` or `;` */
  header: CSSToken[];

  /** Whether the rule had a `{…}` block */
  block: boolean;

  /** Block contents without the braces; empty for `;`-terminated rules */
  body: CSSToken[];

  startLine: number;
  endLine: number;

  /** Comments preceding the rule (attachComments option) */
  comments?: string[];
}

/**
 * Selector group with its declaration block
 */
export interface StyleRule {
  type: 'style-rule';
  selectors: SelectorGroup;
  declarations: Declaration[];
  startLine: number;
  endLine: number;

  /** Comments preceding the rule (attachComments option) */
  comments?: string[];
}

export type CSSRule = AtRule | StyleRule;

/**
 * Parsed stylesheet. Rule order is significant.
 */
export interface Stylesheet {
  rules: CSSRule[];
}
