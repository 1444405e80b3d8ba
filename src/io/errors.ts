/**
 * Source read failures
 *
 * @since 2025-12-08
 */

/**
 * Stylesheet text could not be read or decoded. Unlike parse errors this
 * is thrown to the caller.
 */
export class CSSSourceError extends Error {
  constructor(
    message: string,
    readonly source: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'CSSSourceError';
  }
}
