/**
 * Character classes used by the CSS tokenizer (CSS Syntax 3, § 4.2)
 */

export const EOF = -1;

export const TAB = 0x09;
export const LF = 0x0a;
export const FF = 0x0c;
export const CR = 0x0d;
export const SPACE = 0x20;
export const QUOTATION_MARK = 0x22;
export const NUMBER_SIGN = 0x23;
export const DOLLAR_SIGN = 0x24;
export const PERCENT_SIGN = 0x25;
export const APOSTROPHE = 0x27;
export const LEFT_PARENTHESIS = 0x28;
export const RIGHT_PARENTHESIS = 0x29;
export const ASTERISK = 0x2a;
export const PLUS_SIGN = 0x2b;
export const HYPHEN_MINUS = 0x2d;
export const FULL_STOP = 0x2e;
export const SOLIDUS = 0x2f;
export const LESS_THAN_SIGN = 0x3c;
export const EQUALS_SIGN = 0x3d;
export const GREATER_THAN_SIGN = 0x3e;
export const EXCLAMATION_MARK = 0x21;
export const COMMERCIAL_AT = 0x40;
export const REVERSE_SOLIDUS = 0x5c;
export const CIRCUMFLEX_ACCENT = 0x5e;
export const LOW_LINE = 0x5f;
export const VERTICAL_LINE = 0x7c;
export const TILDE = 0x7e;
export const DELETE = 0x7f;

export const REPLACEMENT_CHARACTER = 0xfffd;
export const MAX_CODE_POINT = 0x10ffff;

export function isDigit(c: number): boolean {
  return c >= 0x30 && c <= 0x39;
}

export function isHexDigit(c: number): boolean {
  return isDigit(c) || (c >= 0x41 && c <= 0x46) || (c >= 0x61 && c <= 0x66);
}

export function isNewline(c: number): boolean {
  return c === LF || c === CR || c === FF;
}

export function isWhitespace(c: number): boolean {
  return isNewline(c) || c === TAB || c === SPACE;
}

export function isNameStart(c: number): boolean {
  return (
    (c >= 0x41 && c <= 0x5a) ||
    (c >= 0x61 && c <= 0x7a) ||
    c >= 0x80 ||
    c === LOW_LINE
  );
}

export function isName(c: number): boolean {
  return isNameStart(c) || isDigit(c) || c === HYPHEN_MINUS;
}

export function isNonPrintable(c: number): boolean {
  return (c >= 0x00 && c <= 0x08) || c === 0x0b || (c >= 0x0e && c <= 0x1f) || c === DELETE;
}

/**
 * Two code points are a valid escape (§ 4.3.8)
 */
export function isValidEscape(c1: number, c2: number): boolean {
  return c1 === REVERSE_SOLIDUS && c2 !== EOF && !isNewline(c2);
}

/**
 * Three code points would start an ident sequence (§ 4.3.9)
 */
export function wouldStartIdentifier(c1: number, c2: number, c3: number): boolean {
  if (c1 === HYPHEN_MINUS) {
    return isNameStart(c2) || c2 === HYPHEN_MINUS || isValidEscape(c2, c3);
  }
  if (c1 === REVERSE_SOLIDUS) {
    return isValidEscape(c1, c2);
  }
  return isNameStart(c1);
}

/**
 * Three code points would start a number (§ 4.3.10)
 */
export function wouldStartNumber(c1: number, c2: number, c3: number): boolean {
  if (c1 === PLUS_SIGN || c1 === HYPHEN_MINUS) {
    return isDigit(c2) || (c2 === FULL_STOP && isDigit(c3));
  }
  if (c1 === FULL_STOP) {
    return isDigit(c2);
  }
  return isDigit(c1);
}
