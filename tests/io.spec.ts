/**
 * Tests for reading stylesheet sources
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { pathToFileURL } from 'url';
import { CSSParser } from '../src/css/index.js';
import { CSSSourceError, readCSSSource } from '../src/io/index.js';

async function* chunks(...parts: Array<string | Uint8Array>): AsyncGenerator<string | Uint8Array> {
  for (const part of parts) {
    yield part;
  }
}

describe('readCSSSource', () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'css-source-'));
    file = join(dir, 'main.css');
    await writeFile(file, 'a { color: red }', 'utf-8');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should read a file path', async () => {
    expect(await readCSSSource(file)).toBe('a { color: red }');
  });

  it('should read a file URL', async () => {
    expect(await readCSSSource(pathToFileURL(file))).toBe('a { color: red }');
    expect(await readCSSSource(pathToFileURL(file).href)).toBe('a { color: red }');
  });

  it('should decode bytes as UTF-8', async () => {
    expect(await readCSSSource(new TextEncoder().encode('.é { x: y }'))).toBe('.é { x: y }');
  });

  it('should drop a byte order mark', async () => {
    expect(await readCSSSource(Uint8Array.of(0xef, 0xbb, 0xbf, 0x61))).toBe('a');
  });

  it('should join stream chunks, including characters split between them', async () => {
    expect(await readCSSSource(chunks('a { ', Uint8Array.of(0x78, 0x3a, 0xc3), Uint8Array.of(0xa9, 0x20, 0x7d)))).toBe(
      'a { x:é }'
    );
  });

  it('should keep string and byte chunks in order', async () => {
    expect(await readCSSSource(chunks('a', Uint8Array.of(0x62), 'c'))).toBe('abc');
  });

  it('should reject a string chunk that splits a character', async () => {
    await expect(readCSSSource(chunks(Uint8Array.of(0x61, 0xc3), 'b', Uint8Array.of(0xa9)))).rejects.toBeInstanceOf(
      CSSSourceError
    );
  });

  it('should reject invalid UTF-8', async () => {
    await expect(readCSSSource(Uint8Array.of(0x61, 0xff))).rejects.toBeInstanceOf(CSSSourceError);
  });

  it('should reject a missing file with the path and cause', async () => {
    const missing = join(dir, 'missing.css');
    const error = await readCSSSource(missing).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CSSSourceError);
    if (!(error instanceof CSSSourceError)) {
      throw new Error('expected a CSSSourceError');
    }
    expect(error.source).toBe(missing);
    expect(error.cause).toBeInstanceOf(Error);
    expect(error.message.startsWith(`Failed to read CSS from ${missing}: `)).toBe(true);
  });

  it('should reject unsupported URL schemes', async () => {
    await expect(readCSSSource('ftp://example.test/a.css')).rejects.toThrow(
      'Failed to read CSS from ftp://example.test/a.css: unsupported protocol ftp:'
    );
  });
});

describe('CSSParser source operations', () => {
  it('should parse a stylesheet from bytes', async () => {
    const parser = new CSSParser({ logWarnings: false });
    const { stylesheet, errors } = await parser.parseStylesheetFrom(new TextEncoder().encode('a { b: c }'));

    expect(errors).toEqual([]);
    expect(stylesheet.rules).toHaveLength(1);
  });

  it('should parse a declaration list from a stream', async () => {
    const parser = new CSSParser({ logWarnings: false });
    const { declarations } = await parser.parseDeclarationListFrom(chunks('fill: red; ', 'stroke: blue'));

    expect(declarations.map((d) => d.property)).toEqual(['fill', 'stroke']);
  });

  it('should log and rethrow source failures', async () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const parser = new CSSParser();

    await expect(parser.parseStylesheetFrom(Uint8Array.of(0xff))).rejects.toBeInstanceOf(CSSSourceError);
    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy.mock.calls[0][0]).toBe('❌ Failed to read CSS source:');

    spy.mockRestore();
  });

  it('should stay quiet when warnings are off', async () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const parser = new CSSParser({ logWarnings: false });

    await expect(parser.parseStylesheetFrom(Uint8Array.of(0xff))).rejects.toBeInstanceOf(CSSSourceError);
    expect(spy).not.toHaveBeenCalled();

    spy.mockRestore();
  });
});
