/**
 * Tests for declaration and value parsing
 */
import { describe, it, expect } from 'vitest';
import { CSSParser } from '../src/css/index.js';
import type { Declaration } from '../src/ast/index.js';

const parser = new CSSParser({ logWarnings: false });

function declarations(body: string): Declaration[] {
  const { stylesheet, errors } = parser.parseStylesheet(`a { ${body} }`);
  expect(errors).toEqual([]);

  const rule = stylesheet.rules[0];
  if (rule?.type !== 'style-rule') {
    throw new Error('expected a style rule');
  }
  return rule.declarations;
}

function terms(declaration: Declaration): string[] {
  return declaration.terms.map((t) => t.raw);
}

describe('Declaration parsing', () => {
  it('should parse several declarations', () => {
    const parsed = declarations('fill: #ff0000; stroke-width: 2px');

    expect(parsed.map((d) => d.property)).toEqual(['fill', 'stroke-width']);
    expect(parsed.map(terms)).toEqual([['#ff0000'], ['2px']]);
  });

  it('should skip empty declarations', () => {
    const parsed = declarations(';; fill: red;;');

    expect(parsed.map((d) => d.property)).toEqual(['fill']);
  });

  it('should keep function terms flat', () => {
    const [fill] = declarations('fill: rgb(0, 128, 255)');

    expect(terms(fill)).toEqual(['rgb(', '0', ',', ' ', '128', ',', ' ', '255', ')']);
  });

  it('should keep inner whitespace and trim the ends', () => {
    const [margin] = declarations('margin:   1px  2px   ');

    expect(terms(margin)).toEqual(['1px', '  ', '2px']);
  });

  it('should keep square-bracketed runs whole', () => {
    const [grid] = declarations('grid: [full-start] 1fr [end];');

    expect(terms(grid)).toEqual(['[', 'full-start', ']', ' ', '1fr', ' ', '[', 'end', ']']);
  });

  it('should keep curly-bracketed runs whole, semicolons included', () => {
    const [x, y] = declarations('x: {b: c; d}; y: 1');

    expect(terms(x)).toEqual(['{', 'b', ':', ' ', 'c', ';', ' ', 'd', '}']);
    expect(terms(y)).toEqual(['1']);
  });

  it('should drop CDO and CDC from values', () => {
    const [x] = declarations('x: 1 <!-- 2');

    expect(terms(x)).toEqual(['1', ' ', ' ', '2']);
  });

  it('should report !important separately', () => {
    const { stylesheet } = parser.parseStylesheet('a { color: red !important; }');
    const rule = stylesheet.rules[0];
    if (rule?.type !== 'style-rule') {
      throw new Error('expected a style rule');
    }
    const [color] = rule.declarations;

    expect(terms(color)).toEqual(['red']);
    expect(color.important).toBe(true);
    expect(color.span).toEqual({ start: 4, end: 25 });
  });

  it('should accept whitespace and any case in ! important', () => {
    const [color] = declarations('color: red ! IMPORTANT');

    expect(terms(color)).toEqual(['red']);
    expect(color.important).toBe(true);
  });

  it('should not treat a bang in the middle as important', () => {
    const [x] = declarations('x: !important 1');

    expect(terms(x)).toEqual(['!', 'important', ' ', '1']);
    expect(x.important).toBe(false);
  });

  it('should allow an empty value', () => {
    const { stylesheet, errors } = parser.parseStylesheet('a { color: ; }');
    const rule = stylesheet.rules[0];
    if (rule?.type !== 'style-rule') {
      throw new Error('expected a style rule');
    }

    expect(errors).toEqual([]);
    expect(rule.declarations[0].terms).toEqual([]);
    expect(rule.declarations[0].span).toEqual({ start: 4, end: 10 });
  });

  it('should keep custom property names and values', () => {
    const [accent] = declarations('--accent-color: #0af');

    expect(accent.property).toBe('--accent-color');
    expect(terms(accent)).toEqual(['#0af']);
  });
});

describe('CSSParser.parseDeclarationList', () => {
  it('should parse an inline style', () => {
    const { declarations: parsed, errors } = parser.parseDeclarationList('fill: red;\nstroke: blue');

    expect(errors).toEqual([]);
    expect(parsed.map((d) => [d.property, d.line])).toEqual([
      ['fill', 1],
      ['stroke', 2],
    ]);
  });

  it('should return nothing for empty input', () => {
    expect(parser.parseDeclarationList('   ')).toEqual({ declarations: [], errors: [] });
  });

  it('should record a stray closing brace and continue', () => {
    const { declarations: parsed, errors } = parser.parseDeclarationList('a: 1; } b: 2');

    expect(parsed.map((d) => d.property)).toEqual(['a', 'b']);
    expect(errors.map((e) => e.message)).toEqual(['DeclarationList: unexpected "}".']);
  });

  it('should skip a token that cannot start a declaration', () => {
    const { declarations: parsed, errors } = parser.parseDeclarationList('a: 1; 42; b: 2');

    expect(parsed.map((d) => d.property)).toEqual(['a', 'b']);
    expect(errors.map((e) => e.message)).toEqual(['DeclarationList: declaration expected instead of "42".']);
  });
});
