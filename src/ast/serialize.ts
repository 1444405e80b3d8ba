/**
 * Text form of AST nodes
 *
 * Used for diagnostics and to hand raw token runs back to a tokenizer.
 * Token runs are written verbatim from their source text.
 *
 * @since 2025-12-08
 */

import type { CSSToken } from '../tokenizer/types.js';
import type {
  AttributeOperator,
  CSSRule,
  Declaration,
  Selector,
  SelectorGroup,
  Stylesheet,
} from './types.js';

const ATTRIBUTE_OPERATORS: Record<Exclude<AttributeOperator, 'exists'>, string> = {
  equals: '=',
  includes: '~=',
  'dash-match': '|=',
  prefix: '^=',
  suffix: '$=',
  substring: '*=',
};

/**
 * Concatenate the source text of a token run
 */
export function tokensToString(tokens: readonly CSSToken[]): string {
  return tokens.map((token) => token.raw).join('');
}

/**
 * Escape an identifier so that it tokenizes back to the same name
 */
export function escapeIdentifier(name: string): string {
  const escaped = name.replace(/[^a-zA-Z0-9_\-\u0080-\uffff]/g, (ch) => `\\${ch}`);
  return /^-?[0-9]/.test(escaped)
    ? escaped.replace(/[0-9]/, (digit) => `\\3${digit} `)
    : escaped;
}

function quote(value: string): string {
  return `"${value.replace(/["\\]/g, (ch) => `\\${ch}`).replace(/\n/g, '\\a ')}"`;
}

export function selectorToString(selector: Selector): string {
  switch (selector.type) {
    case 'universal':
      return '*';
    case 'type':
      return escapeIdentifier(selector.name);
    case 'id':
      return `#${escapeIdentifier(selector.name)}`;
    case 'class':
      return `.${escapeIdentifier(selector.name)}`;
    case 'attribute':
      if (selector.operator === 'exists' || selector.value === undefined) {
        return `[${escapeIdentifier(selector.name)}]`;
      }
      return `[${escapeIdentifier(selector.name)}${ATTRIBUTE_OPERATORS[selector.operator]}${quote(selector.value)}]`;
    case 'pseudo-class':
      return `:${escapeIdentifier(selector.name)}`;
    case 'pseudo-class-function':
      return `:${escapeIdentifier(selector.name)}(${tokensToString(selector.arguments)})`;
    case 'negation':
      return `:not(${selectorToString(selector.inner)})`;
    case 'select-nothing':
      // matches nothing, like the sentinel
      return ':not(*)';
    case 'and':
      return `${selectorToString(selector.left)}${selectorToString(selector.right)}`;
    case 'descendant':
      return `${selectorToString(selector.left)} ${selectorToString(selector.right)}`;
    case 'child':
      return `${selectorToString(selector.left)} > ${selectorToString(selector.right)}`;
    case 'adjacent-sibling':
      return `${selectorToString(selector.left)} + ${selectorToString(selector.right)}`;
    case 'general-sibling':
      return `${selectorToString(selector.left)} ~ ${selectorToString(selector.right)}`;
  }
}

export function selectorGroupToString(group: SelectorGroup): string {
  return group.map(selectorToString).join(', ');
}

export function declarationToString(declaration: Declaration): string {
  const value = tokensToString(declaration.terms);
  return `${declaration.property}: ${value}${declaration.important ? ' !important' : ''}`;
}

/**
 * Text form of a rule. An at-rule with an empty body is written
 * `;`-terminated.
 */
export function ruleToString(rule: CSSRule): string {
  if (rule.type === 'at-rule') {
    const header = rule.header.length > 0 ? ` ${tokensToString(rule.header)}` : '';
    if (!rule.block) {
      return `@${rule.keyword}${header};`;
    }
    if (rule.body.length === 0) {
      return `@${rule.keyword}${header} {}`;
    }
    return `@${rule.keyword}${header} { ${tokensToString(rule.body)} }`;
  }

  const selectors = selectorGroupToString(rule.selectors);
  if (rule.declarations.length === 0) {
    return `${selectors} {}`;
  }
  const declarations = rule.declarations.map((d) => `${declarationToString(d)};`).join(' ');
  return `${selectors} { ${declarations} }`;
}

export function stylesheetToString(stylesheet: Stylesheet): string {
  return stylesheet.rules.map(ruleToString).join('\n');
}
