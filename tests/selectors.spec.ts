/**
 * Tests for selector parsing
 */
import { describe, it, expect } from 'vitest';
import { CSSParser } from '../src/css/index.js';
import type { Selector, SelectorGroup } from '../src/ast/index.js';

const parser = new CSSParser({ logWarnings: false });

function group(selectorText: string): SelectorGroup {
  const { stylesheet, errors } = parser.parseStylesheet(`${selectorText} {}`);
  expect(errors).toEqual([]);

  const rule = stylesheet.rules[0];
  if (rule?.type !== 'style-rule') {
    throw new Error('expected a style rule');
  }
  return rule.selectors;
}

function selector(selectorText: string): Selector {
  const selectors = group(selectorText);
  expect(selectors).toHaveLength(1);
  return selectors[0];
}

describe('Selector parsing', () => {
  describe('simple selectors', () => {
    it('should parse type, universal, id and class selectors', () => {
      expect(selector('a')).toEqual({ type: 'type', name: 'a' });
      expect(selector('*')).toEqual({ type: 'universal' });
      expect(selector('#main')).toEqual({ type: 'id', name: 'main' });
      expect(selector('.note')).toEqual({ type: 'class', name: 'note' });
    });

    it('should decode escapes in names', () => {
      expect(selector('.a\\:b')).toEqual({ type: 'class', name: 'a:b' });
    });

    it('should parse pseudo-classes', () => {
      expect(selector(':first-child')).toEqual({ type: 'pseudo-class', name: 'first-child' });
    });

    it('should keep functional pseudo-class arguments as tokens', () => {
      const nth = selector(':nth-child(2n+1)');

      expect(nth).toMatchObject({ type: 'pseudo-class-function', name: 'nth-child' });
      if (nth.type !== 'pseudo-class-function') {
        throw new Error('expected a pseudo-class function');
      }
      expect(nth.arguments.map((t) => t.raw)).toEqual(['2n', '+1']);
    });

    it('should scan nested parentheses in pseudo-class arguments', () => {
      const is = selector(':is(:not(a), b)');

      if (is.type !== 'pseudo-class-function') {
        throw new Error('expected a pseudo-class function');
      }
      expect(is.name).toBe('is');
      expect(is.arguments.map((t) => t.raw)).toEqual([':', 'not(', 'a', ')', ',', ' ', 'b']);
    });

    it('should parse negation of one simple selector', () => {
      expect(selector(':not(.hidden)')).toEqual({
        type: 'negation',
        inner: { type: 'class', name: 'hidden' },
      });
      expect(selector(':not( a )')).toEqual({
        type: 'negation',
        inner: { type: 'type', name: 'a' },
      });
    });
  });

  describe('attribute selectors', () => {
    it('should parse the exists form', () => {
      expect(selector('[href]')).toEqual({ type: 'attribute', name: 'href', operator: 'exists' });
    });

    it('should parse every operator', () => {
      expect(selector('[x=a]')).toMatchObject({ operator: 'equals', value: 'a' });
      expect(selector('[x~=a]')).toMatchObject({ operator: 'includes', value: 'a' });
      expect(selector('[lang|=en]')).toMatchObject({ operator: 'dash-match', value: 'en' });
      expect(selector('[x^=a]')).toMatchObject({ operator: 'prefix', value: 'a' });
      expect(selector('[x$=a]')).toMatchObject({ operator: 'suffix', value: 'a' });
      expect(selector('[x*=a]')).toMatchObject({ operator: 'substring', value: 'a' });
    });

    it('should accept string and number values', () => {
      expect(selector('[title="x y"]')).toEqual({
        type: 'attribute',
        name: 'title',
        operator: 'equals',
        value: 'x y',
      });
      expect(selector('[cols=3]')).toMatchObject({ operator: 'equals', value: '3' });
    });

    it('should allow whitespace inside the brackets', () => {
      expect(selector('[ title = "x" ]')).toEqual({
        type: 'attribute',
        name: 'title',
        operator: 'equals',
        value: 'x',
      });
    });
  });

  describe('combinators', () => {
    it('should join adjacent simple selectors with and', () => {
      expect(selector('a.b#c')).toEqual({
        type: 'and',
        left: { type: 'type', name: 'a' },
        right: {
          type: 'and',
          left: { type: 'class', name: 'b' },
          right: { type: 'id', name: 'c' },
        },
      });
    });

    it('should parse the child combinator between id and class', () => {
      expect(selector('#id1 > .bar')).toEqual({
        type: 'child',
        left: { type: 'id', name: 'id1' },
        right: { type: 'class', name: 'bar' },
      });
    });

    it('should read whitespace as the descendant combinator', () => {
      expect(selector('div  p')).toEqual({
        type: 'descendant',
        left: { type: 'type', name: 'div' },
        right: { type: 'type', name: 'p' },
      });
    });

    it('should lean combinator chains to the right', () => {
      expect(selector('a>b>c')).toEqual({
        type: 'child',
        left: { type: 'type', name: 'a' },
        right: {
          type: 'child',
          left: { type: 'type', name: 'b' },
          right: { type: 'type', name: 'c' },
        },
      });
    });

    it('should parse sibling combinators', () => {
      expect(selector('a + b ~ c')).toEqual({
        type: 'adjacent-sibling',
        left: { type: 'type', name: 'a' },
        right: {
          type: 'general-sibling',
          left: { type: 'type', name: 'b' },
          right: { type: 'type', name: 'c' },
        },
      });
    });

    it('should mix combinators', () => {
      expect(selector('ul > li a:hover')).toEqual({
        type: 'child',
        left: { type: 'type', name: 'ul' },
        right: {
          type: 'descendant',
          left: { type: 'type', name: 'li' },
          right: {
            type: 'and',
            left: { type: 'type', name: 'a' },
            right: { type: 'pseudo-class', name: 'hover' },
          },
        },
      });
    });

    it('should ignore comments between selectors', () => {
      expect(selector('a/* x */>b')).toEqual({
        type: 'child',
        left: { type: 'type', name: 'a' },
        right: { type: 'type', name: 'b' },
      });
    });
  });

  describe('groups', () => {
    it('should split on commas', () => {
      expect(group('h1, h2,h3')).toEqual([
        { type: 'type', name: 'h1' },
        { type: 'type', name: 'h2' },
        { type: 'type', name: 'h3' },
      ]);
    });
  });
});
