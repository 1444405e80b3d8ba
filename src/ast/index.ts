/**
 * Stylesheet AST
 *
 * Rules, selectors and declarations produced by CSSParser, plus their
 * text form.
 *
 * @since 2025-12-08
 */

export {
  tokensToString,
  escapeIdentifier,
  selectorToString,
  selectorGroupToString,
  declarationToString,
  ruleToString,
  stylesheetToString,
} from './serialize.js';
export type {
  AttributeOperator,
  UniversalSelector,
  TypeSelector,
  IdSelector,
  ClassSelector,
  AttributeSelector,
  PseudoClassSelector,
  PseudoClassFunctionSelector,
  NegationSelector,
  SelectNothingSelector,
  SimpleSelector,
  CombinatorType,
  CombinatorSelector,
  Selector,
  SelectorGroup,
  Declaration,
  AtRule,
  StyleRule,
  CSSRule,
  Stylesheet,
} from './types.js';
