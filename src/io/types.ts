/**
 * Where stylesheet text can come from
 *
 * A string is a filesystem path or a `file:`, `http:` or `https:` URL.
 *
 * @since 2025-12-08
 */
export type CSSSource = string | URL | Uint8Array | AsyncIterable<string | Uint8Array>;
