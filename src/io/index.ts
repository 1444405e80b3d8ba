/**
 * Source reader
 *
 * @since 2025-12-08
 */

export { readCSSSource } from './readCSSSource.js';
export { CSSSourceError } from './errors.js';
export type { CSSSource } from './types.js';
