import { FetchError } from '../../errors/app-error.js';

import { getErrorMessage } from '../../utils/error-details.js';

import { logDebug } from '../logger.js';

const DEFAULT_CHARSET = 'utf-8';

function createSizeLimitError(url: string, maxBytes: number): FetchError {
  return new FetchError(
    `Response exceeds maximum size of ${maxBytes} bytes`,
    url,
    undefined,
    { reason: 'too-large', maxBytes }
  );
}

interface HeaderReader {
  get(name: string): string | null;
}

function exceedsDeclaredLength(
  headers: HeaderReader,
  maxBytes: number
): boolean {
  const contentLengthHeader = headers.get('content-length');
  if (!contentLengthHeader) return false;
  const contentLength = Number.parseInt(contentLengthHeader, 10);
  return !Number.isNaN(contentLength) && contentLength > maxBytes;
}

/** Frees the pooled connection of a response whose body is not read. */
async function releaseBody(
  body: ReadableStream<Uint8Array> | null,
  url: string
): Promise<void> {
  await body?.cancel().catch((error: unknown) => {
    logDebug('Failed to cancel response body', {
      url,
      error: getErrorMessage(error),
    });
  });
}

export function resolveCharset(contentType: string | null): string {
  if (!contentType) return DEFAULT_CHARSET;
  const match = /charset=([^;]+)/i.exec(contentType);
  const charsetGroup = match?.[1];
  if (!charsetGroup) return DEFAULT_CHARSET;

  let charset = charsetGroup.trim();
  if (charset.startsWith('"') && charset.endsWith('"')) {
    charset = charset.slice(1, -1);
  }
  return charset.trim() || DEFAULT_CHARSET;
}

function createDecoder(charset: string): TextDecoder {
  try {
    return new TextDecoder(charset);
  } catch {
    // Unknown labels from the server fall back to UTF-8.
    return new TextDecoder(DEFAULT_CHARSET);
  }
}

async function readStreamWithLimit(
  stream: ReadableStream<Uint8Array>,
  url: string,
  maxBytes: number,
  decoder: TextDecoder
): Promise<{ text: string; size: number }> {
  const reader = stream.getReader();
  let total = 0;
  const chunks: string[] = [];

  try {
    for (;;) {
      const { value, done } = await reader.read();
      if (done) break;
      total += value.byteLength;

      if (total > maxBytes) {
        await reader.cancel();
        throw createSizeLimitError(url, maxBytes);
      }

      chunks.push(decoder.decode(value, { stream: true }));
    }

    chunks.push(decoder.decode());
    return { text: chunks.join(''), size: total };
  } finally {
    reader.releaseLock();
  }
}

interface ReadableResponse {
  readonly headers: HeaderReader;
  readonly body: ReadableStream<Uint8Array> | null;
}

export async function readResponseText(
  response: ReadableResponse,
  url: string,
  maxBytes: number
): Promise<{ text: string; size: number }> {
  if (exceedsDeclaredLength(response.headers, maxBytes)) {
    await releaseBody(response.body, url);
    throw createSizeLimitError(url, maxBytes);
  }

  const decoder = createDecoder(
    resolveCharset(response.headers.get('content-type'))
  );

  if (!response.body) {
    return { text: '', size: 0 };
  }

  return readStreamWithLimit(response.body, url, maxBytes, decoder);
}
