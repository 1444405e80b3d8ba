/**
 * CSSParser
 *
 * Recursive-descent parser for the supported CSS subset. Drives a
 * CSSTokenizer token by token and builds the stylesheet AST bottom-up.
 *
 * Malformed input never aborts the document. Errors are recorded and
 * parsing resumes at three levels:
 *   - simple selector: replaced by select-nothing
 *   - declaration: dropped, input skipped to the next `;` or `}`
 *   - rule: dropped, rest of its block skipped
 *
 * @since 2025-12-06
 */

import { createHash } from 'crypto';
import { v4 as uuidv4 } from 'uuid';
import { selectorGroupToString, tokensToString } from '../ast/serialize.js';
import type {
  AtRule,
  AttributeOperator,
  AttributeSelector,
  CombinatorType,
  CSSRule,
  Declaration,
  Selector,
  SelectorGroup,
  SimpleSelector,
  Stylesheet,
  StyleRule,
} from '../ast/types.js';
import { readCSSSource } from '../io/readCSSSource.js';
import type { CSSSource } from '../io/types.js';
import type { CSSToken, CSSTokenType } from '../tokenizer/types.js';
import { CSSParseError } from './errors.js';
import { createParseContext, isInsignificant, trimTokens, type ParseContext } from './ParseContext.js';
import type {
  CSSParseResult,
  CSSParserOptions,
  CSSVariable,
  DeclarationListParseResult,
  StylesheetInfo,
  StylesheetParseResult,
} from './types.js';

const COMBINATORS: ReadonlyMap<string, CombinatorType> = new Map([
  ['>', 'child'],
  ['+', 'adjacent-sibling'],
  ['~', 'general-sibling'],
]);

const MATCH_OPERATORS: Partial<Record<CSSTokenType, AttributeOperator>> = {
  'include-match': 'includes',
  'dash-match': 'dash-match',
  'prefix-match': 'prefix',
  'suffix-match': 'suffix',
  'substring-match': 'substring',
};

interface SimpleBlock {
  closer: CSSTokenType;
  production: string;
}

const SIMPLE_BLOCKS: Partial<Record<CSSTokenType, SimpleBlock>> = {
  '{': { closer: '}', production: 'CurlyBlock' },
  '(': { closer: ')', production: 'RoundBlock' },
  '[': { closer: ']', production: 'SquareBlock' },
  function: { closer: ')', production: 'FunctionBlock' },
};

/**
 * CSSParser - Main parser for CSS text
 */
export class CSSParser {
  private readonly options: Required<CSSParserOptions>;

  constructor(options: CSSParserOptions = {}) {
    this.options = {
      attachComments: options.attachComments ?? false,
      logWarnings: options.logWarnings ?? true,
    };
  }

  /**
   * Parse a complete stylesheet
   */
  parseStylesheet(css: string): StylesheetParseResult {
    const ctx = createParseContext(css);
    const stylesheet = this.parseRules(ctx);
    return { stylesheet, errors: ctx.errors };
  }

  /**
   * Parse a bare declaration list, as found in a style attribute
   */
  parseDeclarationList(css: string): DeclarationListParseResult {
    const ctx = createParseContext(css);
    const tt = ctx.tokenizer;
    const declarations: Declaration[] = [];

    for (;;) {
      try {
        declarations.push(...this.parseDeclarations(ctx));
      } catch (error) {
        this.recordError(ctx, error);
        this.skipDeclaration(ctx);
        continue;
      }

      const end = tt.nextNoSkip();
      if (end.type === 'eof') {
        break;
      }
      ctx.errors.push(new CSSParseError(`DeclarationList: unexpected "${end.raw}".`, end));
    }

    return { declarations, errors: ctx.errors };
  }

  /**
   * Read a stylesheet from a file, URL, buffer or stream, then parse it
   */
  async parseStylesheetFrom(source: CSSSource): Promise<StylesheetParseResult> {
    return this.parseStylesheet(await this.read(source));
  }

  /**
   * Read a declaration list from a file, URL, buffer or stream, then parse it
   */
  async parseDeclarationListFrom(source: CSSSource): Promise<DeclarationListParseResult> {
    return this.parseDeclarationList(await this.read(source));
  }

  /**
   * Parse a CSS file and summarize it
   */
  parseFile(filePath: string, content: string): CSSParseResult {
    const { stylesheet, errors } = this.parseStylesheet(content);
    const document = this.summarize(filePath, content, stylesheet, errors.length);

    if (errors.length > 0 && this.options.logWarnings) {
      console.warn(`⚠️ ${errors.length} CSS parse error(s) in ${filePath}`);
      for (const error of errors) {
        console.warn(`   ${error.describe()}`);
      }
    }

    return { document, stylesheet, errors };
  }

  private async read(source: CSSSource): Promise<string> {
    try {
      return await readCSSSource(source);
    } catch (error) {
      if (this.options.logWarnings) {
        console.error('❌ Failed to read CSS source:', error);
      }
      throw error;
    }
  }

  // ===========================================================================
  // Rules
  // ===========================================================================

  private parseRules(ctx: ParseContext): Stylesheet {
    const tt = ctx.tokenizer;
    const rules: CSSRule[] = [];

    for (let token = tt.nextNoSkip(); token.type !== 'eof'; token = tt.nextNoSkip()) {
      switch (token.type) {
        case 'whitespace':
        case 'cdo':
        case 'cdc':
          break;
        case 'comment':
        case 'bad-comment':
          ctx.comments.push(token.value ?? '');
          break;
        case 'at-keyword':
          tt.pushBack();
          this.addRule(ctx, rules, () => this.parseAtRule(ctx));
          break;
        default:
          tt.pushBack();
          this.addRule(ctx, rules, () => this.parseStyleRule(ctx));
      }
    }

    return { rules };
  }

  /**
   * Rule-level recovery point
   */
  private addRule(ctx: ParseContext, rules: CSSRule[], parse: () => CSSRule): void {
    const comments = ctx.comments;
    ctx.comments = [];

    let rule: CSSRule;
    try {
      rule = parse();
    } catch (error) {
      this.recordError(ctx, error);
      return;
    }

    if (this.options.attachComments && comments.length > 0) {
      rules.push({ ...rule, comments });
    } else {
      rules.push(rule);
    }
  }

  /**
   * A nested at-rule, met inside a declaration block, also ends before the
   * `}` closing that block.
   */
  private parseAtRule(ctx: ParseContext, nested = false): AtRule {
    const tt = ctx.tokenizer;
    const keyword = tt.nextNoSkip();
    if (keyword.type !== 'at-keyword') {
      throw new CSSParseError('AtRule: at-keyword expected.', keyword);
    }

    const header: CSSToken[] = [];
    let last = keyword;
    let token = tt.next();
    while (token.type !== 'eof' && token.type !== '{' && token.type !== ';' && !(nested && token.type === '}')) {
      tt.pushBack();
      last = this.parseComponentValue(ctx, header);
      token = tt.nextNoSkip();
    }

    const rule = {
      type: 'at-rule' as const,
      keyword: keyword.value ?? '',
      header: trimTokens(header),
      startLine: keyword.line,
    };

    if (token.type === ';') {
      return { ...rule, block: false, body: [], endLine: token.line };
    }
    if (token.type === '}') {
      tt.pushBack();
      return { ...rule, block: false, body: [], endLine: last.line };
    }
    if (token.type !== '{') {
      throw new CSSParseError("CurlyBlock: '{' expected.", token);
    }

    tt.pushBack();
    const block: CSSToken[] = [];
    const close = this.parseComponentValue(ctx, block);
    return { ...rule, block: true, body: trimTokens(block.slice(1, -1)), endLine: close.line };
  }

  private parseStyleRule(ctx: ParseContext): StyleRule {
    const tt = ctx.tokenizer;
    const first = this.nextSignificant(ctx);
    tt.pushBack();

    const selectors: SelectorGroup =
      first.type === '{' ? [{ type: 'universal' }] : this.parseSelectorGroup(ctx);

    const open = this.nextSignificant(ctx);
    if (open.type !== '{') {
      throw new CSSParseError(`StyleRule: '{' expected instead of "${open.raw}".`, open);
    }

    let declarations: Declaration[];
    try {
      declarations = this.parseDeclarations(ctx);
    } catch (error) {
      this.skipBlockRemainder(ctx);
      throw error;
    }

    const close = tt.nextNoSkip();
    if (close.type !== '}') {
      throw new CSSParseError("StyleRule: '}' expected.", close);
    }

    return { type: 'style-rule', selectors, declarations, startLine: first.line, endLine: close.line };
  }

  // ===========================================================================
  // Component values
  // ===========================================================================

  /**
   * Append one preserved token or balanced block to `out`. Returns the last
   * token appended.
   */
  private parseComponentValue(ctx: ParseContext, out: CSSToken[]): CSSToken {
    const tt = ctx.tokenizer;
    const open: SimpleBlock[] = [];

    for (;;) {
      const token = tt.nextNoSkip();
      const innermost = open[open.length - 1];
      if (token.type === 'eof') {
        throw new CSSParseError(
          innermost ? `${innermost.production}: '${innermost.closer}' expected.` : 'ComponentValue: unexpected end of input.',
          token
        );
      }

      out.push(token);
      const block = SIMPLE_BLOCKS[token.type];
      if (block) {
        open.push(block);
      } else if (innermost && token.type === innermost.closer) {
        open.pop();
      }
      if (open.length === 0) {
        return token;
      }
    }
  }

  // ===========================================================================
  // Selectors
  // ===========================================================================

  private parseSelectorGroup(ctx: ParseContext): SelectorGroup {
    const tt = ctx.tokenizer;
    const selectors: SelectorGroup = [this.parseSelector(ctx)];

    let token = tt.nextNoSkip();
    while (token.type !== 'eof' && token.type !== '{') {
      if (token.type !== ',') {
        throw new CSSParseError(`SelectorGroup: ',' expected instead of "${token.raw}".`, token);
      }
      selectors.push(this.parseSelector(ctx));
      token = tt.nextNoSkip();
    }
    tt.pushBack();

    return selectors;
  }

  /**
   * Compound selector with combinators. Stops before `,`, `{` or end of
   * input. Chains are folded to the right: `a > b > c` is
   * child(a, child(b, c)).
   */
  private parseSelector(ctx: ParseContext): Selector {
    const tt = ctx.tokenizer;
    const links: Array<{ left: SimpleSelector; type: CombinatorType }> = [];
    let simple = this.parseSimpleSelector(ctx);

    for (;;) {
      let token = tt.nextNoSkip();
      let whitespace = false;
      while (isInsignificant(token)) {
        whitespace ||= token.type === 'whitespace';
        token = tt.nextNoSkip();
      }

      if (token.type === 'eof' || token.type === '{' || token.type === ',') {
        tt.pushBack();
        break;
      }

      const combinator = token.type === 'delim' ? COMBINATORS.get(token.value ?? '') : undefined;
      if (combinator) {
        links.push({ left: simple, type: combinator });
      } else {
        tt.pushBack();
        links.push({ left: simple, type: whitespace ? 'descendant' : 'and' });
      }
      simple = this.parseSimpleSelector(ctx);
    }

    return links.reduceRight<Selector>((right, { left, type }) => ({ type, left, right }), simple);
  }

  /**
   * Selector-level recovery point
   */
  private parseSimpleSelector(ctx: ParseContext): SimpleSelector {
    const tt = ctx.tokenizer;
    const token = this.nextSignificant(ctx);

    try {
      switch (token.type) {
        case 'ident':
          return { type: 'type', name: token.value ?? '' };
        case 'hash':
          return { type: 'id', name: token.value ?? '' };
        case ':':
          tt.pushBack();
          return this.parsePseudoClassSelector(ctx);
        case '[':
          tt.pushBack();
          return this.parseAttributeSelector(ctx);
        case 'delim':
          if (token.value === '*') {
            return { type: 'universal' };
          }
          if (token.value === '.') {
            const name = tt.nextNoSkip();
            if (name.type !== 'ident') {
              throw this.selectorError(ctx, `ClassSelector: identifier expected instead of "${name.raw}".`, name);
            }
            return { type: 'class', name: name.value ?? '' };
          }
          break;
      }
      throw this.selectorError(ctx, `SimpleSelector: selector expected instead of "${token.raw}".`, token);
    } catch (error) {
      this.recordError(ctx, error);
      return { type: 'select-nothing' };
    }
  }

  private parsePseudoClassSelector(ctx: ParseContext): SimpleSelector {
    const tt = ctx.tokenizer;
    const colon = tt.nextNoSkip();
    if (colon.type !== ':') {
      throw this.selectorError(ctx, "PseudoClassSelector: ':' expected.", colon);
    }

    const name = tt.nextNoSkip();
    if (name.type === 'ident') {
      return { type: 'pseudo-class', name: name.value ?? '' };
    }
    if (name.type === 'function') {
      return this.parseFunctionalPseudoClass(ctx, name);
    }
    throw this.selectorError(
      ctx,
      `PseudoClassSelector: identifier or function expected instead of "${name.raw}".`,
      name
    );
  }

  private parseFunctionalPseudoClass(ctx: ParseContext, fn: CSSToken): SimpleSelector {
    const tt = ctx.tokenizer;
    const name = fn.value ?? '';

    if (name.toLowerCase() === 'not') {
      const inner = this.parseSimpleSelector(ctx);
      const close = tt.next();
      if (close.type !== ')') {
        throw this.selectorError(ctx, `NegationSelector: ')' expected instead of "${close.raw}".`, close);
      }
      return { type: 'negation', inner };
    }

    const args: CSSToken[] = [];
    let depth = 0;
    for (;;) {
      const token = tt.nextNoSkip();
      if (token.type === ')' && depth === 0) {
        break;
      }
      if (token.type === '{' || token.type === '}' || token.type === 'eof') {
        throw this.selectorError(ctx, `PseudoClassSelector: ')' expected to close :${name}().`, token);
      }
      if (token.type === '(' || token.type === 'function') {
        depth++;
      } else if (token.type === ')') {
        depth--;
      }
      args.push(token);
    }

    return { type: 'pseudo-class-function', name, arguments: trimTokens(args) };
  }

  private parseAttributeSelector(ctx: ParseContext): AttributeSelector {
    const tt = ctx.tokenizer;
    const open = tt.nextNoSkip();
    if (open.type !== '[') {
      throw this.selectorError(ctx, "AttributeSelector: '[' expected.", open);
    }

    const name = this.nextSignificant(ctx);
    if (name.type !== 'ident') {
      throw this.selectorError(ctx, `AttributeSelector: identifier expected instead of "${name.raw}".`, name);
    }

    const op = this.nextSignificant(ctx);
    if (op.type === ']') {
      return { type: 'attribute', name: name.value ?? '', operator: 'exists' };
    }
    const operator = op.type === 'delim' && op.value === '=' ? 'equals' : MATCH_OPERATORS[op.type];
    if (!operator) {
      throw this.selectorError(ctx, `AttributeSelector: operator or ']' expected instead of "${op.raw}".`, op);
    }

    const value = this.nextSignificant(ctx);
    if (value.type !== 'ident' && value.type !== 'string' && value.type !== 'number') {
      throw this.selectorError(
        ctx,
        `AttributeSelector: identifier, string or number expected instead of "${value.raw}".`,
        value
      );
    }

    const close = this.nextSignificant(ctx);
    if (close.type !== ']') {
      throw this.selectorError(ctx, `AttributeSelector: ']' expected instead of "${close.raw}".`, close);
    }

    return { type: 'attribute', name: name.value ?? '', operator, value: value.value ?? '' };
  }

  /**
   * Error for a selector that failed on the token just read. A `{` is
   * handed back so that the enclosing rule still finds its block.
   */
  private selectorError(ctx: ParseContext, message: string, token: CSSToken): CSSParseError {
    if (token.type === '{') {
      ctx.tokenizer.pushBack();
    }
    return new CSSParseError(message, token);
  }

  // ===========================================================================
  // Declarations
  // ===========================================================================

  /**
   * Declarations up to (not including) the closing `}` or end of input.
   * Throws on a token that cannot start a declaration, after pushing it back.
   */
  private parseDeclarations(ctx: ParseContext): Declaration[] {
    const tt = ctx.tokenizer;
    const declarations: Declaration[] = [];

    for (let token = tt.next(); token.type !== 'eof' && token.type !== '}'; token = tt.next()) {
      switch (token.type) {
        case 'ident':
          tt.pushBack();
          try {
            declarations.push(this.parseDeclaration(ctx));
          } catch (error) {
            this.recordError(ctx, error);
            this.skipDeclaration(ctx);
          }
          break;
        case ';':
        case 'cdo':
        case 'cdc':
          break;
        case 'at-keyword':
          tt.pushBack();
          ctx.errors.push(
            new CSSParseError(`DeclarationList: @${token.value ?? ''} is not allowed in a declaration block.`, token)
          );
          try {
            this.parseAtRule(ctx, true);
          } catch (error) {
            this.recordError(ctx, error);
          }
          break;
        default:
          tt.pushBack();
          throw new CSSParseError(`DeclarationList: declaration expected instead of "${token.raw}".`, token);
      }
    }
    tt.pushBack();

    return declarations;
  }

  private parseDeclaration(ctx: ParseContext): Declaration {
    const tt = ctx.tokenizer;
    const property = tt.nextNoSkip();
    if (property.type !== 'ident') {
      throw new CSSParseError('Declaration: property name expected.', property);
    }

    const colon = this.nextSignificant(ctx);
    if (colon.type !== ':') {
      tt.pushBack();
      throw new CSSParseError(`Declaration: ':' expected instead of "${colon.raw}".`, colon);
    }

    const value = this.parseTerms(ctx);
    const end = value.length > 0 ? value[value.length - 1].end : colon.end;
    const { terms, important } = splitImportant(value);

    return {
      property: property.value ?? '',
      terms,
      important,
      span: { start: property.start, end },
      line: property.line,
    };
  }

  /**
   * Value tokens up to the next `;`, `}` or end of input, which is left
   * unread. `{…}` and `[…]` runs are kept whole.
   */
  private parseTerms(ctx: ParseContext): CSSToken[] {
    const tt = ctx.tokenizer;
    const terms: CSSToken[] = [];

    let token = tt.nextNoSkip();
    while (token.type !== 'eof' && token.type !== '}' && token.type !== ';') {
      if (token.type === '{' || token.type === '[') {
        this.collectRun(ctx, token, terms);
      } else {
        const error = termError(token);
        if (error) {
          throw error;
        }
        pushTerm(token, terms);
      }
      token = tt.nextNoSkip();
    }
    tt.pushBack();

    return trimTokens(terms);
  }

  /**
   * Append a `{…}` or `[…]` run. A bad token or a mismatched closer inside
   * fails the run once its own closer has been read, so the tokenizer is
   * back at declaration level. A `}` that no `{` of the run matches closes
   * the enclosing block and is left unread.
   */
  private collectRun(ctx: ParseContext, open: CSSToken, terms: CSSToken[]): void {
    const tt = ctx.tokenizer;
    const closers: Array<'}' | ']'> = [open.type === '{' ? '}' : ']'];
    let failure: CSSParseError | undefined;
    terms.push(open);

    while (closers.length > 0) {
      const token = tt.nextNoSkip();
      const expected = closers[closers.length - 1];

      if (token.type === 'eof') {
        tt.pushBack();
        throw failure ?? new CSSParseError(`Terms: '${expected}' expected instead of "${token.raw}".`, token);
      }

      if (token.type === '{' || token.type === '[') {
        closers.push(token.type === '{' ? '}' : ']');
        terms.push(token);
      } else if (token.type === expected) {
        closers.pop();
        terms.push(token);
      } else if (token.type === '}' || token.type === ']') {
        failure = failure ?? new CSSParseError(`Terms: '${expected}' expected instead of "${token.raw}".`, token);
        if (token.type === '}') {
          const owner = closers.lastIndexOf('}');
          if (owner < 0) {
            tt.pushBack();
            throw failure;
          }
          closers.splice(owner);
        }
      } else {
        failure = failure ?? termError(token);
        pushTerm(token, terms);
      }
    }

    if (failure) {
      throw failure;
    }
  }

  // ===========================================================================
  // Recovery
  // ===========================================================================

  private recordError(ctx: ParseContext, error: unknown): void {
    if (error instanceof CSSParseError) {
      ctx.errors.push(error);
      return;
    }
    throw error;
  }

  /**
   * Skip to just after the next top-level `;`, or to just before the next
   * top-level `}` or end of input.
   */
  private skipDeclaration(ctx: ParseContext): void {
    const tt = ctx.tokenizer;
    let depth = 0;

    for (;;) {
      const token = tt.nextNoSkip();
      if (token.type === 'eof' || (depth === 0 && token.type === '}')) {
        tt.pushBack();
        return;
      }
      if (depth === 0 && token.type === ';') {
        return;
      }
      if (token.type === '{' || token.type === '[' || token.type === '(' || token.type === 'function') {
        depth++;
      } else if ((token.type === '}' || token.type === ']' || token.type === ')') && depth > 0) {
        depth--;
      }
    }
  }

  /**
   * Skip past the `}` closing the current block
   */
  private skipBlockRemainder(ctx: ParseContext): void {
    const tt = ctx.tokenizer;
    let depth = 0;

    for (let token = tt.nextNoSkip(); token.type !== 'eof'; token = tt.nextNoSkip()) {
      if (token.type === '{') {
        depth++;
      } else if (token.type === '}') {
        if (depth === 0) {
          return;
        }
        depth--;
      }
    }
  }

  private nextSignificant(ctx: ParseContext): CSSToken {
    const tt = ctx.tokenizer;
    let token = tt.nextNoSkip();
    while (isInsignificant(token)) {
      token = tt.nextNoSkip();
    }
    return token;
  }

  // ===========================================================================
  // Summary
  // ===========================================================================

  private summarize(filePath: string, content: string, stylesheet: Stylesheet, errorCount: number): StylesheetInfo {
    const info: StylesheetInfo = {
      uuid: uuidv4(),
      file: filePath,
      hash: createHash('sha256').update(content).digest('hex').slice(0, 16),
      linesOfCode: content.split('\n').length,
      ruleCount: stylesheet.rules.length,
      atRuleCount: 0,
      selectorCount: 0,
      declarationCount: 0,
      variables: [],
      imports: [],
      fontFaceCount: 0,
      keyframeNames: [],
      mediaQueries: [],
      errorCount,
    };

    for (const rule of stylesheet.rules) {
      if (rule.type === 'style-rule') {
        info.selectorCount += rule.selectors.length;
        info.declarationCount += rule.declarations.length;
        info.variables.push(...extractVariables(rule));
        continue;
      }

      info.atRuleCount++;
      const keyword = rule.keyword.toLowerCase();
      const prelude = tokensToString(rule.header);
      if (keyword === 'import') {
        const target = importTarget(rule.header);
        if (target !== undefined) {
          info.imports.push(target);
        }
      } else if (keyword === 'media' && prelude) {
        info.mediaQueries.push(prelude);
      } else if (keyword.endsWith('keyframes') && prelude) {
        info.keyframeNames.push(prelude);
      } else if (keyword === 'font-face') {
        info.fontFaceCount++;
      }
    }

    return info;
  }
}

/**
 * Tokens that may not appear in a declaration value
 */
function termError(token: CSSToken): CSSParseError | undefined {
  switch (token.type) {
    case 'bad-string':
      return new CSSParseError('Terms: unterminated string.', token);
    case 'bad-url':
      return new CSSParseError('Terms: malformed url().', token);
    case ']':
      return new CSSParseError("Terms: unexpected ']'.", token);
    default:
      return undefined;
  }
}

function pushTerm(token: CSSToken, terms: CSSToken[]): void {
  if (token.type !== 'cdo' && token.type !== 'cdc') {
    terms.push(token);
  }
}

/**
 * Remove a trailing `! important` from a value
 */
function splitImportant(value: CSSToken[]): { terms: CSSToken[]; important: boolean } {
  const significant = value
    .map((token, index) => ({ token, index }))
    .filter(({ token }) => token.type !== 'whitespace' && token.type !== 'comment');
  const last = significant[significant.length - 1];
  const bang = significant[significant.length - 2];

  if (
    last &&
    bang &&
    last.token.type === 'ident' &&
    last.token.value?.toLowerCase() === 'important' &&
    bang.token.type === 'delim' &&
    bang.token.value === '!'
  ) {
    return { terms: trimTokens(value.slice(0, bang.index)), important: true };
  }
  return { terms: value, important: false };
}

/**
 * `@import "a.css"`, `@import url(a.css)` or `@import url("a.css")`
 */
function importTarget(header: CSSToken[]): string | undefined {
  const [first, second] = header;
  if (!first) {
    return undefined;
  }
  if (first.type === 'string' || first.type === 'url') {
    return first.value;
  }
  if (first.type === 'function' && first.value?.toLowerCase() === 'url' && second?.type === 'string') {
    return second.value;
  }
  return undefined;
}

function extractVariables(rule: StyleRule): CSSVariable[] {
  const scope = selectorGroupToString(rule.selectors);
  return rule.declarations
    .filter((declaration) => declaration.property.startsWith('--'))
    .map((declaration) => ({
      name: declaration.property,
      value: tokensToString(declaration.terms),
      scope,
      line: declaration.line,
    }));
}
