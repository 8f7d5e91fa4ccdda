import { readFile } from 'node:fs/promises';

import type { UrlItem, UrlListEntry } from '../config/types.js';

import { isValidUrl } from '../utils/url-validator.js';

/** LF, CRLF and lone CR all end a line. */
const LINE_BREAK = /\r\n|\r|\n/;

/**
 * Every line gets an index, including blank and invalid ones, so file
 * names keep pointing at the line the URL came from.
 */
export function parseUrlList(content: string): UrlListEntry[] {
  const lines = content.split(LINE_BREAK);
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }

  return lines.map((raw, index) => {
    const line = raw.trim();
    return { index, line, valid: isValidUrl(line) };
  });
}

export async function readUrlList(file: string): Promise<UrlListEntry[]> {
  const content = await readFile(file, 'utf8');
  return parseUrlList(content);
}

export function toUrlItems(entries: readonly UrlListEntry[]): UrlItem[] {
  return entries
    .filter((entry) => entry.valid)
    .map((entry) => ({ index: entry.index, url: entry.line }));
}
