import { writeFile } from 'node:fs/promises';
import path from 'node:path';

import { config } from '../config/index.js';
import type {
  BatchSummary,
  FailedOutcome,
  ItemOutcome,
  ProgressFn,
  SkippedOutcome,
  UrlItem,
  UrlListEntry,
  WriteFileFn,
  WrittenOutcome,
} from '../config/types.js';

import { runWithConcurrency } from '../utils/concurrency.js';
import { getErrorMessage } from '../utils/error-details.js';
import { generateOutputName } from '../utils/filename-generator.js';

import { runWithItemContext } from './context.js';
import { extractFromFetchResult } from './extractor.js';
import type { HttpClient } from './fetcher.js';
import { logDebug, logError, logInfo } from './logger.js';
import { readUrlList, toUrlItems } from './url-list.js';

export interface BatchOptions {
  /** Newline-separated URL list */
  readonly inputFile: string;
  /** Must already exist */
  readonly outputDir: string;
  readonly client: HttpClient;
  readonly concurrency?: number;
  /** Called when an item starts, before its request is sent */
  readonly onProgress?: ProgressFn;
  readonly writeFile?: WriteFileFn;
}

interface ItemRunner {
  readonly outputDir: string;
  readonly client: HttpClient;
  readonly onProgress?: ProgressFn;
  readonly writeFile: WriteFileFn;
}

type ProcessedOutcome = WrittenOutcome | FailedOutcome;

const writeUtf8: WriteFileFn = async (filePath, data) => {
  await writeFile(filePath, data, 'utf8');
};

function toSkippedOutcome(entry: UrlListEntry): SkippedOutcome {
  logDebug('Skipping invalid URL line', {
    index: entry.index,
    line: entry.line,
  });
  return { status: 'skipped', index: entry.index, line: entry.line };
}

async function processItem(
  item: UrlItem,
  runner: ItemRunner
): Promise<ProcessedOutcome> {
  runner.onProgress?.(item);
  logInfo('Processing URL');

  const result = await runner.client.fetchPage(item.url);
  const extracted = extractFromFetchResult(result);

  const filename = generateOutputName(item.index, item.url);
  const filePath = path.join(runner.outputDir, filename);
  const target = { index: item.index, url: item.url, filename, path: filePath };

  try {
    await runner.writeFile(filePath, extracted.text);
  } catch (error) {
    const message = getErrorMessage(error);
    logError('Failed to write output file', { path: filePath, error: message });
    return { status: 'failed', ...target, reason: 'write', message };
  }

  if (!extracted.ok) {
    return {
      status: 'failed',
      ...target,
      reason: extracted.reason,
      message: extracted.message,
    };
  }

  logDebug('Wrote output file', { path: filePath });
  return {
    status: 'written',
    ...target,
    bytes: Buffer.byteLength(extracted.text, 'utf8'),
  };
}

async function processItemSafely(
  item: UrlItem,
  runner: ItemRunner
): Promise<ProcessedOutcome> {
  try {
    return await runWithItemContext(item, () => processItem(item, runner));
  } catch (error) {
    const message = getErrorMessage(error);
    const filename = generateOutputName(item.index, item.url);
    logError('Unexpected item failure', {
      index: item.index,
      url: item.url,
      error: message,
    });
    return {
      status: 'failed',
      index: item.index,
      url: item.url,
      filename,
      path: path.join(runner.outputDir, filename),
      reason: 'internal',
      message,
    };
  }
}

function summarize(
  outputDir: string,
  total: number,
  outcomes: ItemOutcome[]
): BatchSummary {
  let skipped = 0;
  let written = 0;
  let failed = 0;
  for (const outcome of outcomes) {
    if (outcome.status === 'skipped') skipped++;
    else if (outcome.status === 'written') written++;
    else failed++;
  }

  return {
    outputDir,
    total,
    valid: written + failed,
    skipped,
    written,
    failed,
    outcomes,
  };
}

/**
 * Fetches every valid URL of the list and writes one text file per URL into
 * `outputDir`. Item failures are recorded in the summary and never stop the
 * batch; the file for a failed item is still written, empty.
 */
export async function runBatch(options: BatchOptions): Promise<BatchSummary> {
  const entries = await readUrlList(options.inputFile);
  const skipped = entries
    .filter((entry) => !entry.valid)
    .map(toSkippedOutcome);
  const items = toUrlItems(entries);

  const runner: ItemRunner = {
    outputDir: options.outputDir,
    client: options.client,
    onProgress: options.onProgress,
    writeFile: options.writeFile ?? writeUtf8,
  };

  logInfo('Starting batch', {
    file: options.inputFile,
    urls: items.length,
    skipped: skipped.length,
  });

  const tasks = items.map((item) => () => processItemSafely(item, runner));
  const settled = await runWithConcurrency(
    options.concurrency ?? config.batch.concurrency,
    tasks,
    {
      onProgress: (completed, total) => {
        logDebug('Batch progress', { completed, total });
      },
    }
  );
  const processed = settled.flatMap((result) =>
    result.status === 'fulfilled' ? [result.value] : []
  );

  const outcomes: ItemOutcome[] = [...skipped, ...processed].sort(
    (a, b) => a.index - b.index
  );
  const summary = summarize(options.outputDir, entries.length, outcomes);

  logInfo('Batch complete', {
    total: summary.total,
    written: summary.written,
    failed: summary.failed,
    skipped: summary.skipped,
  });
  return summary;
}
