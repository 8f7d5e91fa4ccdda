import { createInterface } from 'node:readline/promises';
import { parseArgs } from 'node:util';

import { z } from 'zod';

import { config } from './config/index.js';
import { CONCURRENCY, TIMEOUT } from './config/constants.js';
import type { BatchSummary, ConfirmFn } from './config/types.js';

import { AppError } from './errors/app-error.js';

import { runBatch } from './services/batch.js';
import {
  type CreateHttpClientOptions,
  createHttpClient,
  type HttpClient,
} from './services/fetcher.js';
import { logError } from './services/logger.js';
import { assertInputFile, prepareOutputDirectory } from './services/output-dir.js';

import { getErrorMessage } from './utils/error-details.js';

export interface CliValues {
  readonly file?: string;
  readonly output?: string;
  readonly concurrency?: number;
  readonly timeout?: number;
  readonly yes: boolean;
  readonly help: boolean;
  readonly version: boolean;
}

interface CliParseSuccess {
  readonly ok: true;
  readonly values: CliValues;
}

interface CliParseFailure {
  readonly ok: false;
  readonly message: string;
}

export type CliParseResult = CliParseSuccess | CliParseFailure;

interface OutputStream {
  write(chunk: string): unknown;
}

export interface CliDependencies {
  readonly stdout: OutputStream;
  readonly stderr: OutputStream;
  /** Defaults to a readline prompt on stdin */
  readonly confirm?: ConfirmFn;
  readonly createClient?: (options: CreateHttpClientOptions) => HttpClient;
  /** Defaults to `config.output.defaultDir` */
  readonly defaultOutputDir?: string;
}

const usageLines = [
  'Save the readable text of every URL in a list',
  '',
  'Usage:',
  '  url-text --file <path> [--output <dir>] [--concurrency <n>] [--timeout <ms>] [--yes]',
  '',
  'Options:',
  '  --file, -f         Text file with one URL per line.',
  '  --output, -o       Directory the text files are written to.',
  `  --concurrency, -c  URLs fetched at once (1-${CONCURRENCY.MAX}).`,
  `  --timeout, -t      Request timeout in ms (${TIMEOUT.MIN_FETCH_TIMEOUT_MS}-${TIMEOUT.MAX_FETCH_TIMEOUT_MS}).`,
  '  --yes, -y          Create a missing output directory without asking.',
  '  --help, -h         Show this help message.',
  '  --version, -v      Show version.',
  '',
] as const;

const optionSchema = {
  file: { type: 'string', short: 'f' },
  output: { type: 'string', short: 'o' },
  concurrency: { type: 'string', short: 'c' },
  timeout: { type: 'string', short: 't' },
  yes: { type: 'boolean', short: 'y', default: false },
  help: { type: 'boolean', short: 'h', default: false },
  version: { type: 'boolean', short: 'v', default: false },
} as const;

function integerOption(name: string, min: number, max: number) {
  const rangeMessage = `--${name} must be between ${min} and ${max}`;
  return z
    .string()
    .regex(/^\d+$/, { error: `--${name} must be a whole number` })
    .transform(Number)
    .pipe(
      z
        .number()
        .min(min, { error: rangeMessage })
        .max(max, { error: rangeMessage })
    );
}

const cliValuesSchema = z.strictObject({
  file: z.string().trim().min(1, { error: '--file must not be empty' }).optional(),
  output: z
    .string()
    .trim()
    .min(1, { error: '--output must not be empty' })
    .optional(),
  concurrency: integerOption('concurrency', 1, CONCURRENCY.MAX).optional(),
  timeout: integerOption(
    'timeout',
    TIMEOUT.MIN_FETCH_TIMEOUT_MS,
    TIMEOUT.MAX_FETCH_TIMEOUT_MS
  ).optional(),
  yes: z.boolean(),
  help: z.boolean(),
  version: z.boolean(),
});

export function renderCliUsage(): string {
  return `${usageLines.join('\n')}\n`;
}

export function parseCliArgs(args: readonly string[]): CliParseResult {
  let raw: unknown;
  try {
    raw = parseArgs({
      args: [...args],
      options: optionSchema,
      strict: true,
      allowPositionals: false,
    }).values;
  } catch (error: unknown) {
    return { ok: false, message: getErrorMessage(error) };
  }

  const parsed = cliValuesSchema.safeParse(raw);
  if (!parsed.success) {
    return {
      ok: false,
      message: parsed.error.issues[0]?.message ?? 'Invalid arguments',
    };
  }

  const { help, version, file } = parsed.data;
  if (!help && !version && file === undefined) {
    return { ok: false, message: 'Missing required option --file' };
  }
  return { ok: true, values: parsed.data };
}

const YES_ANSWERS: ReadonlySet<string> = new Set(['y', 'yes']);

export function isAffirmative(answer: string): boolean {
  return YES_ANSWERS.has(answer.trim().toLowerCase());
}

const promptOnStdin: ConfirmFn = async (question) => {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    return isAffirmative(await rl.question(`${question} (y/n) `));
  } finally {
    rl.close();
  }
};

const confirmYes: ConfirmFn = () => Promise.resolve(true);

export function formatSummary(summary: BatchSummary): string {
  const { valid, written, failed, skipped, outputDir } = summary;
  return `Processed ${valid} URLs: ${written} written, ${failed} failed, ${skipped} skipped → ${outputDir}`;
}

async function runBatchCommand(
  values: CliValues & { readonly file: string },
  deps: CliDependencies
): Promise<number> {
  const inputFile = await assertInputFile(values.file);
  const defaultOutputDir = deps.defaultOutputDir ?? config.output.defaultDir;
  const outputDir = await prepareOutputDirectory({
    outputDir: values.output ?? defaultOutputDir,
    defaultOutputDir,
    confirm: values.yes ? confirmYes : (deps.confirm ?? promptOnStdin),
  });

  const create = deps.createClient ?? createHttpClient;
  const client = create(
    values.timeout !== undefined ? { timeoutMs: values.timeout } : {}
  );

  try {
    const summary = await runBatch({
      inputFile,
      outputDir,
      client,
      concurrency: values.concurrency ?? config.batch.concurrency,
      onProgress: (item) => {
        deps.stdout.write(`${item.url}\n`);
      },
    });
    deps.stdout.write(`${formatSummary(summary)}\n`);
    return 0;
  } finally {
    await client.close();
  }
}

/** Resolves with the process exit code. */
export async function runCli(
  args: readonly string[],
  deps: CliDependencies = { stdout: process.stdout, stderr: process.stderr }
): Promise<number> {
  const parsed = parseCliArgs(args);
  if (!parsed.ok) {
    deps.stderr.write(`Error: ${parsed.message}\n\n${renderCliUsage()}`);
    return 1;
  }

  const { values } = parsed;
  if (values.help) {
    deps.stdout.write(renderCliUsage());
    return 0;
  }
  if (values.version) {
    deps.stdout.write(`${config.app.version}\n`);
    return 0;
  }
  if (values.file === undefined) {
    deps.stderr.write(`Error: Missing required option --file\n`);
    return 1;
  }

  try {
    return await runBatchCommand({ ...values, file: values.file }, deps);
  } catch (error: unknown) {
    if (!(error instanceof AppError)) {
      logError('Batch aborted', error instanceof Error ? error : undefined);
    }
    deps.stderr.write(`Error: ${getErrorMessage(error)}\n`);
    return 1;
  }
}
