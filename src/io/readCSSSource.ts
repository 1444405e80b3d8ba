/**
 * readCSSSource
 *
 * Loads stylesheet text from files, URLs, byte buffers and streams.
 * Bytes are decoded as UTF-8 and invalid sequences are rejected.
 *
 * @since 2025-12-08
 */

import { readFile } from 'fs/promises';
import { fileURLToPath } from 'url';
import { CSSSourceError } from './errors.js';
import type { CSSSource } from './types.js';

const URL_PATTERN = /^[a-z][a-z0-9+.-]*:\/\//i;

/**
 * Read a source to a string. Any failure is raised as a CSSSourceError.
 */
export async function readCSSSource(source: CSSSource): Promise<string> {
  const description = describeSource(source);

  try {
    if (typeof source === 'string') {
      return URL_PATTERN.test(source) ? await readURL(new URL(source)) : decodeUTF8(await readFile(source));
    }
    if (source instanceof URL) {
      return await readURL(source);
    }
    if (source instanceof Uint8Array) {
      return decodeUTF8(source);
    }
    return await readStream(source);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CSSSourceError(`Failed to read CSS from ${description}: ${reason}`, description, { cause: error });
  }
}

async function readURL(url: URL): Promise<string> {
  switch (url.protocol) {
    case 'file:':
      return decodeUTF8(await readFile(fileURLToPath(url)));
    case 'http:':
    case 'https:': {
      const response = await fetch(url);
      if (!response.ok) {
        throw new Error(`HTTP ${response.status} ${response.statusText}`);
      }
      return decodeUTF8(new Uint8Array(await response.arrayBuffer()));
    }
    default:
      throw new Error(`unsupported protocol ${url.protocol}`);
  }
}

async function readStream(stream: AsyncIterable<string | Uint8Array>): Promise<string> {
  const decoder = new TextDecoder('utf-8', { fatal: true });
  let text = '';
  for await (const chunk of stream) {
    // a string chunk ends any byte run, which must hold whole characters
    text += typeof chunk === 'string' ? decoder.decode() + chunk : decoder.decode(chunk, { stream: true });
  }
  return text + decoder.decode();
}

function decodeUTF8(bytes: Uint8Array): string {
  return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
}

function describeSource(source: CSSSource): string {
  if (typeof source === 'string') {
    return source;
  }
  if (source instanceof URL) {
    return source.href;
  }
  if (source instanceof Uint8Array) {
    return `<${source.byteLength} bytes>`;
  }
  return '<stream>';
}
