import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import {
  parseUrlList,
  readUrlList,
  toUrlItems,
} from '../src/services/url-list.js';

describe('parseUrlList', () => {
  it('indexes every line, including blank and invalid ones', () => {
    const entries = parseUrlList(
      'https://example.com/a\n\nnot a url\nhttps://example.com/b\n'
    );

    expect(entries).toEqual([
      { index: 0, line: 'https://example.com/a', valid: true },
      { index: 1, line: '', valid: false },
      { index: 2, line: 'not a url', valid: false },
      { index: 3, line: 'https://example.com/b', valid: true },
    ]);
  });

  it('tolerates CRLF line endings and surrounding whitespace', () => {
    expect(parseUrlList('  https://example.com/a  \r\nhttps://example.com/b')).toEqual([
      { index: 0, line: 'https://example.com/a', valid: true },
      { index: 1, line: 'https://example.com/b', valid: true },
    ]);
  });

  it('splits on lone carriage returns', () => {
    expect(
      parseUrlList('https://a.example/x\rhttps://b.example/y\r')
    ).toEqual([
      { index: 0, line: 'https://a.example/x', valid: true },
      { index: 1, line: 'https://b.example/y', valid: true },
    ]);
  });

  it('treats CRLF as a single line break', () => {
    expect(parseUrlList('https://a.example/x\r\n\r\nhttps://b.example/y')).toEqual([
      { index: 0, line: 'https://a.example/x', valid: true },
      { index: 1, line: '', valid: false },
      { index: 2, line: 'https://b.example/y', valid: true },
    ]);
  });

  it('drops only one trailing empty line', () => {
    expect(parseUrlList('https://example.com/a\n\n')).toHaveLength(2);
  });

  it('returns no entries for an empty file', () => {
    expect(parseUrlList('')).toEqual([]);
  });
});

describe('toUrlItems', () => {
  it('keeps valid entries with their line index', () => {
    const items = toUrlItems(
      parseUrlList('junk\nhttps://example.com/a\n\nhttps://example.com/b')
    );

    expect(items).toEqual([
      { index: 1, url: 'https://example.com/a' },
      { index: 3, url: 'https://example.com/b' },
    ]);
  });
});

describe('readUrlList', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'url-list-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads and parses a UTF-8 file', async () => {
    const file = path.join(dir, 'urls.txt');
    await writeFile(file, 'https://example.com/ä\n', 'utf8');

    expect(await readUrlList(file)).toEqual([
      { index: 0, line: 'https://example.com/ä', valid: true },
    ]);
  });
});
