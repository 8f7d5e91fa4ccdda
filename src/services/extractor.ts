import { parseHTML } from 'linkedom';

import { Readability } from '@mozilla/readability';

import type {
  ExtractedArticle,
  ExtractedDocument,
  ExtractedMetadata,
  ExtractionResult,
  FetchResult,
  ItemText,
} from '../config/types.js';

import { toPlainText } from '../utils/content-cleaner.js';
import { getErrorMessage } from '../utils/error-details.js';

import { logDebug, logError, logWarn } from './logger.js';

const EMPTY_DOCUMENT: ExtractedDocument = Object.freeze({
  title: '',
  body: '',
  text: '',
});

type MetaSource = 'og' | 'twitter' | 'standard';

function collectTitles(document: Document): Partial<Record<MetaSource, string>> {
  const titles: Partial<Record<MetaSource, string>> = {};

  for (const tag of document.querySelectorAll('meta')) {
    const content = tag.getAttribute('content')?.trim();
    if (!content) continue;
    if (tag.getAttribute('property') === 'og:title') titles.og = content;
    if (tag.getAttribute('name') === 'twitter:title') titles.twitter = content;
  }

  const titleEl = document.querySelector('title');
  if (titleEl?.textContent) {
    titles.standard = titleEl.textContent.trim();
  }
  return titles;
}

function extractMetadata(document: Document): ExtractedMetadata {
  const titles = collectTitles(document);
  const title = titles.standard || titles.og || titles.twitter;
  return title ? { title } : {};
}

function hasDocumentElement(document: unknown): document is Document {
  if (!document || typeof document !== 'object') return false;
  if (!('documentElement' in document)) return false;
  return Boolean(document.documentElement);
}

function toOptional(value: string | null | undefined): string | undefined {
  return value ?? undefined;
}

function mapReadabilityResult(
  parsed: NonNullable<ReturnType<Readability['parse']>>
): ExtractedArticle {
  return {
    title: toOptional(parsed.title),
    content: parsed.content ?? '',
  };
}

function extractArticle(document: Document): ExtractedArticle | null {
  const parsed = new Readability(document).parse();
  return parsed ? mapReadabilityResult(parsed) : null;
}

/** Relative links in the article resolve against the page URL. */
function applyBaseUri(document: object, url: string): void {
  Reflect.defineProperty(document, 'baseURI', { value: url, writable: true });
}

/**
 * Parses `html` and runs Readability over it. Readability mutates the
 * document, so metadata is collected first.
 */
export function extractContent(html: string, url: string): ExtractionResult {
  const { document } = parseHTML(html);
  applyBaseUri(document, url);

  if (!hasDocumentElement(document)) {
    return { article: null, metadata: {} };
  }

  const metadata = extractMetadata(document);
  const article = extractArticle(document);
  return { article, metadata };
}

/**
 * Main title and body of a page as plain text: `title + "\n" + body`, with
 * tags stripped and entities decoded. Throws when the parser does.
 */
export function extractReadableText(
  html: string,
  url: string
): ExtractedDocument {
  if (!html.trim()) return EMPTY_DOCUMENT;

  const { article, metadata } = extractContent(html, url);
  if (!article) {
    logDebug('No readable article found, keeping the page title', { url });
  }

  const title = toPlainText(article?.title || metadata.title || '');
  const body = toPlainText(article?.content ?? '');
  if (!title && !body) return EMPTY_DOCUMENT;

  return { title, body, text: `${title}\n${body}` };
}

/** Never throws: every failure becomes an empty text with a reason. */
export function extractFromFetchResult(result: FetchResult): ItemText {
  if (!result.ok) {
    logWarn('Request failed', {
      url: result.url,
      reason: result.reason,
      ...(result.status !== undefined ? { status: result.status } : {}),
      error: result.message,
    });
    return { ok: false, text: '', reason: result.reason, message: result.message };
  }

  try {
    const { text } = extractReadableText(result.body, result.url);
    return { ok: true, text };
  } catch (error) {
    const message = getErrorMessage(error);
    logError('Failed to extract text', { url: result.url, error: message });
    return { ok: false, text: '', reason: 'extraction', message };
  }
}
