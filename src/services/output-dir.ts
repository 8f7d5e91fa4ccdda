import { mkdir, stat } from 'node:fs/promises';
import path from 'node:path';

import { config } from '../config/index.js';
import type { ConfirmFn } from '../config/types.js';

import { ConfigurationError } from '../errors/app-error.js';

import { getErrorMessage, isSystemError } from '../utils/error-details.js';

import { logInfo } from './logger.js';

type PathKind = 'file' | 'directory' | 'missing' | 'other';

async function getPathKind(target: string): Promise<PathKind> {
  try {
    const stats = await stat(target);
    if (stats.isFile()) return 'file';
    if (stats.isDirectory()) return 'directory';
    return 'other';
  } catch (error) {
    if (isSystemError(error) && error.code === 'ENOENT') return 'missing';
    throw error;
  }
}

async function createDirectory(target: string): Promise<string> {
  try {
    await mkdir(target, { recursive: true });
    return target;
  } catch (error) {
    throw new ConfigurationError(
      `Could not create output directory ${target}: ${getErrorMessage(error)}`,
      { outputDir: target }
    );
  }
}

function assertNotFile(target: string, kind: PathKind): void {
  if (kind === 'file' || kind === 'other') {
    throw new ConfigurationError(
      `Output path ${target} is not a directory.`,
      { outputDir: target }
    );
  }
}

/** Fails before any network activity when the input list is unusable. */
export async function assertInputFile(
  file: string,
  extension: string = config.input.extension
): Promise<string> {
  const resolved = path.resolve(file);
  const kind = await getPathKind(resolved);

  if (kind === 'missing') {
    throw new ConfigurationError(`File ${resolved} does not exist.`, {
      file: resolved,
    });
  }
  if (kind !== 'file' || path.extname(resolved) !== extension) {
    throw new ConfigurationError(`File ${resolved} is not a text file.`, {
      file: resolved,
    });
  }
  return resolved;
}

export interface PrepareOutputDirectoryOptions {
  readonly outputDir: string;
  readonly defaultOutputDir: string;
  /** Asked before creating a missing directory other than the default */
  readonly confirm: ConfirmFn;
}

/**
 * Resolves the directory outputs go to, creating it when needed. Declining
 * to create a custom directory falls back to the default one, which is
 * created without asking.
 */
export async function prepareOutputDirectory(
  options: PrepareOutputDirectoryOptions
): Promise<string> {
  const target = path.resolve(options.outputDir);
  const fallback = path.resolve(options.defaultOutputDir);

  const kind = await getPathKind(target);
  assertNotFile(target, kind);
  if (kind === 'directory') return target;
  if (target === fallback) return createDirectory(target);

  const confirmed = await options.confirm(
    `Output path ${target} does not exist. Would you like to make this directory?`
  );
  if (confirmed) return createDirectory(target);

  logInfo('Output path set to default', { outputDir: fallback });
  const fallbackKind = await getPathKind(fallback);
  assertNotFile(fallback, fallbackKind);
  if (fallbackKind === 'directory') return fallback;
  return createDirectory(fallback);
}
