/**
 * CSSTokenizer
 *
 * Turns CSS text into a stream of classified tokens with one token of
 * pushback. Knows nothing about the stylesheet grammar: malformed strings,
 * urls and comments come out as bad-* tokens and the parser decides what
 * to do with them.
 *
 * @since 2025-12-08
 */

import {
  EOF,
  CR,
  LF,
  QUOTATION_MARK,
  APOSTROPHE,
  NUMBER_SIGN,
  LEFT_PARENTHESIS,
  RIGHT_PARENTHESIS,
  PLUS_SIGN,
  HYPHEN_MINUS,
  FULL_STOP,
  SOLIDUS,
  ASTERISK,
  LESS_THAN_SIGN,
  GREATER_THAN_SIGN,
  EXCLAMATION_MARK,
  COMMERCIAL_AT,
  REVERSE_SOLIDUS,
  PERCENT_SIGN,
  EQUALS_SIGN,
  TILDE,
  VERTICAL_LINE,
  CIRCUMFLEX_ACCENT,
  DOLLAR_SIGN,
  REPLACEMENT_CHARACTER,
  MAX_CODE_POINT,
  isDigit,
  isHexDigit,
  isNewline,
  isWhitespace,
  isName,
  isNameStart,
  isNonPrintable,
  isValidEscape,
  wouldStartIdentifier,
  wouldStartNumber,
} from './characters.js';
import type { CSSPunctuation, CSSToken, CSSTokenType } from './types.js';

type TokenPayload = Pick<CSSToken, 'value' | 'numericValue' | 'unit'>;

const PUNCTUATION = new Map<number, CSSPunctuation>([
  [0x7b, '{'],
  [0x7d, '}'],
  [0x28, '('],
  [0x29, ')'],
  [0x5b, '['],
  [0x5d, ']'],
  [0x3a, ':'],
  [0x3b, ';'],
  [0x2c, ','],
]);

/**
 * Match operators: first character followed by '='
 */
const MATCH_OPERATORS = new Map<number, CSSTokenType>([
  [TILDE, 'include-match'],
  [VERTICAL_LINE, 'dash-match'],
  [CIRCUMFLEX_ACCENT, 'prefix-match'],
  [DOLLAR_SIGN, 'suffix-match'],
  [ASTERISK, 'substring-match'],
]);

/**
 * CSSTokenizer - pull-based CSS tokenizer
 */
export class CSSTokenizer {
  private pos = 0;
  private line = 1;
  private last: CSSToken | null = null;
  private peeked: CSSToken | null = null;

  constructor(private readonly source: string) {}

  /**
   * The token returned by the last call to next() or nextNoSkip()
   */
  get current(): CSSToken {
    if (!this.last) {
      throw new Error('CSSTokenizer: no token has been read yet');
    }
    return this.last;
  }

  /**
   * Next token, skipping whitespace and comments
   */
  next(): CSSToken {
    let token = this.nextNoSkip();
    while (token.type === 'whitespace' || token.type === 'comment' || token.type === 'bad-comment') {
      token = this.nextNoSkip();
    }
    return token;
  }

  /**
   * Next token, whitespace and comments included
   */
  nextNoSkip(): CSSToken {
    if (this.peeked) {
      const token = this.peeked;
      this.peeked = null;
      return token;
    }
    this.last = this.scan();
    return this.last;
  }

  /**
   * Un-consume the current token. Only one token can be pushed back.
   */
  pushBack(): void {
    if (!this.last) {
      throw new Error('CSSTokenizer: nothing to push back');
    }
    if (this.peeked) {
      throw new Error('CSSTokenizer: a token has already been pushed back');
    }
    this.peeked = this.last;
  }

  // ---------------------------------------------------------------------------
  // Scanning
  // ---------------------------------------------------------------------------

  private scan(): CSSToken {
    const start = this.pos;
    const line = this.line;
    const c = this.at(0);

    if (c === EOF) {
      return this.token('eof', start, line);
    }

    if (c === SOLIDUS && this.at(1) === ASTERISK) {
      return this.consumeComment(start, line);
    }

    if (isWhitespace(c)) {
      while (isWhitespace(this.at(0))) {
        this.advance();
      }
      return this.token('whitespace', start, line);
    }

    if (c === QUOTATION_MARK || c === APOSTROPHE) {
      return this.consumeString(c, start, line);
    }

    const punctuation = PUNCTUATION.get(c);
    if (punctuation) {
      this.advance();
      return this.token(punctuation, start, line);
    }

    const matchOperator = MATCH_OPERATORS.get(c);
    if (matchOperator && this.at(1) === EQUALS_SIGN) {
      this.advance(2);
      return this.token(matchOperator, start, line);
    }

    switch (c) {
      case NUMBER_SIGN:
        if (isName(this.at(1)) || isValidEscape(this.at(1), this.at(2))) {
          this.advance();
          return this.token('hash', start, line, { value: this.consumeName() });
        }
        break;

      case PLUS_SIGN:
      case FULL_STOP:
        if (wouldStartNumber(c, this.at(1), this.at(2))) {
          return this.consumeNumeric(start, line);
        }
        break;

      case HYPHEN_MINUS:
        if (wouldStartNumber(c, this.at(1), this.at(2))) {
          return this.consumeNumeric(start, line);
        }
        if (this.at(1) === HYPHEN_MINUS && this.at(2) === GREATER_THAN_SIGN) {
          this.advance(3);
          return this.token('cdc', start, line);
        }
        if (wouldStartIdentifier(c, this.at(1), this.at(2))) {
          return this.consumeIdentLike(start, line);
        }
        break;

      case LESS_THAN_SIGN:
        if (
          this.at(1) === EXCLAMATION_MARK &&
          this.at(2) === HYPHEN_MINUS &&
          this.at(3) === HYPHEN_MINUS
        ) {
          this.advance(4);
          return this.token('cdo', start, line);
        }
        break;

      case COMMERCIAL_AT:
        if (wouldStartIdentifier(this.at(1), this.at(2), this.at(3))) {
          this.advance();
          return this.token('at-keyword', start, line, { value: this.consumeName() });
        }
        break;

      case REVERSE_SOLIDUS:
        if (isValidEscape(c, this.at(1))) {
          return this.consumeIdentLike(start, line);
        }
        break;

      case VERTICAL_LINE:
        if (this.at(1) === VERTICAL_LINE) {
          this.advance(2);
          return this.token('column', start, line);
        }
        break;

      default:
        if (isDigit(c)) {
          return this.consumeNumeric(start, line);
        }
        if (isNameStart(c)) {
          return this.consumeIdentLike(start, line);
        }
    }

    this.advance();
    return this.token('delim', start, line, { value: String.fromCharCode(c) });
  }

  /**
   * Comment; an unterminated one runs to the end of input
   */
  private consumeComment(start: number, line: number): CSSToken {
    const close = this.source.indexOf('*/', this.pos + 2);
    if (close === -1) {
      const value = this.source.slice(this.pos + 2);
      this.advance(this.source.length - this.pos);
      return this.token('bad-comment', start, line, { value });
    }
    const value = this.source.slice(this.pos + 2, close);
    this.advance(close + 2 - this.pos);
    return this.token('comment', start, line, { value });
  }

  /**
   * Quoted string. Reaching a newline or the end of input before the
   * closing quote yields a bad-string; the newline is left in the input.
   */
  private consumeString(quote: number, start: number, line: number): CSSToken {
    this.advance();
    let value = '';

    for (;;) {
      const c = this.at(0);
      if (c === EOF || isNewline(c)) {
        return this.token('bad-string', start, line, { value });
      }
      if (c === quote) {
        this.advance();
        return this.token('string', start, line, { value });
      }
      if (c === REVERSE_SOLIDUS) {
        const next = this.at(1);
        if (next === EOF) {
          this.advance();
        } else if (isNewline(next)) {
          this.advance();
          this.consumeNewline();
        } else {
          this.advance();
          value += this.consumeEscape();
        }
        continue;
      }
      value += this.source[this.pos];
      this.advance();
    }
  }

  /**
   * Number, percentage or dimension
   */
  private consumeNumeric(start: number, line: number): CSSToken {
    const text = this.consumeNumber();
    const numericValue = Number(text);

    if (wouldStartIdentifier(this.at(0), this.at(1), this.at(2))) {
      const unit = this.consumeName();
      return this.token('dimension', start, line, { value: text, numericValue, unit });
    }
    if (this.at(0) === PERCENT_SIGN) {
      this.advance();
      return this.token('percentage', start, line, { value: text, numericValue, unit: '%' });
    }
    return this.token('number', start, line, { value: text, numericValue });
  }

  private consumeNumber(): string {
    const begin = this.pos;

    if (this.at(0) === PLUS_SIGN || this.at(0) === HYPHEN_MINUS) {
      this.advance();
    }
    while (isDigit(this.at(0))) {
      this.advance();
    }
    if (this.at(0) === FULL_STOP && isDigit(this.at(1))) {
      this.advance();
      while (isDigit(this.at(0))) {
        this.advance();
      }
    }

    // exponent: e or E, optional sign, digits
    const e = this.at(0);
    if (e === 0x45 || e === 0x65) {
      const next = this.at(1);
      const exponentLength = isDigit(next)
        ? 1
        : (next === PLUS_SIGN || next === HYPHEN_MINUS) && isDigit(this.at(2))
          ? 2
          : 0;
      if (exponentLength > 0) {
        this.advance(exponentLength);
        while (isDigit(this.at(0))) {
          this.advance();
        }
      }
    }

    return this.source.slice(begin, this.pos);
  }

  /**
   * Identifier, function or url
   */
  private consumeIdentLike(start: number, line: number): CSSToken {
    const value = this.consumeName();

    if (this.at(0) !== LEFT_PARENTHESIS) {
      return this.token('ident', start, line, { value });
    }

    this.advance();
    if (value.toLowerCase() === 'url') {
      let offset = 0;
      while (isWhitespace(this.at(offset))) {
        offset++;
      }
      const first = this.at(offset);
      if (first !== QUOTATION_MARK && first !== APOSTROPHE) {
        return this.consumeUrl(start, line);
      }
    }
    return this.token('function', start, line, { value });
  }

  /**
   * Unquoted url( ... ); the opening parenthesis is already consumed
   */
  private consumeUrl(start: number, line: number): CSSToken {
    let value = '';
    while (isWhitespace(this.at(0))) {
      this.advance();
    }

    for (;;) {
      const c = this.at(0);
      if (c === RIGHT_PARENTHESIS) {
        this.advance();
        return this.token('url', start, line, { value });
      }
      if (c === EOF) {
        return this.token('bad-url', start, line, { value });
      }
      if (isWhitespace(c)) {
        while (isWhitespace(this.at(0))) {
          this.advance();
        }
        if (this.at(0) === RIGHT_PARENTHESIS) {
          this.advance();
          return this.token('url', start, line, { value });
        }
        this.consumeBadUrlRemnants();
        return this.token('bad-url', start, line, { value });
      }
      if (c === QUOTATION_MARK || c === APOSTROPHE || c === LEFT_PARENTHESIS || isNonPrintable(c)) {
        this.consumeBadUrlRemnants();
        return this.token('bad-url', start, line, { value });
      }
      if (c === REVERSE_SOLIDUS) {
        if (!isValidEscape(c, this.at(1))) {
          this.consumeBadUrlRemnants();
          return this.token('bad-url', start, line, { value });
        }
        this.advance();
        value += this.consumeEscape();
        continue;
      }
      value += this.source[this.pos];
      this.advance();
    }
  }

  private consumeBadUrlRemnants(): void {
    for (;;) {
      const c = this.at(0);
      if (c === EOF) {
        return;
      }
      if (c === RIGHT_PARENTHESIS) {
        this.advance();
        return;
      }
      if (isValidEscape(c, this.at(1))) {
        this.advance();
        this.consumeEscape();
      } else {
        this.advance();
      }
    }
  }

  private consumeName(): string {
    let value = '';
    for (;;) {
      const c = this.at(0);
      if (isName(c)) {
        value += this.source[this.pos];
        this.advance();
      } else if (isValidEscape(c, this.at(1))) {
        this.advance();
        value += this.consumeEscape();
      } else {
        return value;
      }
    }
  }

  /**
   * Escaped code point; the reverse solidus is already consumed
   */
  private consumeEscape(): string {
    const c = this.at(0);

    if (isHexDigit(c)) {
      let hex = '';
      while (hex.length < 6 && isHexDigit(this.at(0))) {
        hex += this.source[this.pos];
        this.advance();
      }
      if (isWhitespace(this.at(0))) {
        this.consumeNewline();
      }
      const codePoint = parseInt(hex, 16);
      if (codePoint === 0 || (codePoint >= 0xd800 && codePoint <= 0xdfff) || codePoint > MAX_CODE_POINT) {
        return String.fromCodePoint(REPLACEMENT_CHARACTER);
      }
      return String.fromCodePoint(codePoint);
    }

    if (c === EOF) {
      return String.fromCodePoint(REPLACEMENT_CHARACTER);
    }

    const ch = this.source[this.pos];
    this.advance();
    return ch;
  }

  /**
   * Consume one whitespace character, treating CR LF as one
   */
  private consumeNewline(): void {
    if (this.at(0) === CR && this.at(1) === LF) {
      this.advance(2);
    } else {
      this.advance();
    }
  }

  // ---------------------------------------------------------------------------
  // Input helpers
  // ---------------------------------------------------------------------------

  private at(offset: number): number {
    const index = this.pos + offset;
    return index < this.source.length ? this.source.charCodeAt(index) : EOF;
  }

  private advance(count = 1): void {
    for (let i = 0; i < count && this.pos < this.source.length; i++) {
      const c = this.source.charCodeAt(this.pos);
      if (c === LF || c === 0x0c || (c === CR && this.at(1) !== LF)) {
        this.line++;
      }
      this.pos++;
    }
  }

  private token(type: CSSTokenType, start: number, line: number, payload: TokenPayload = {}): CSSToken {
    return {
      type,
      ...payload,
      raw: this.source.slice(start, this.pos),
      line,
      start,
      end: this.pos,
    };
  }
}

/**
 * Tokenize a whole string, including the trailing eof token
 */
export function tokenize(css: string): CSSToken[] {
  const tokenizer = new CSSTokenizer(css);
  const tokens: CSSToken[] = [];
  let token: CSSToken;
  do {
    token = tokenizer.nextNoSkip();
    tokens.push(token);
  } while (token.type !== 'eof');
  return tokens;
}
