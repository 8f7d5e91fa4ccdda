import os from 'node:os';
import path from 'node:path';

import type { LogLevel } from './types/runtime.js';

const ALLOWED_LOG_LEVELS: ReadonlySet<string> = new Set([
  'debug',
  'info',
  'warn',
  'error',
]);

function isLogLevel(value: string): value is LogLevel {
  return ALLOWED_LOG_LEVELS.has(value);
}

function isBelowMin(value: number, min: number | undefined): boolean {
  if (min === undefined) return false;
  return value < min;
}

function isAboveMax(value: number, max: number | undefined): boolean {
  if (max === undefined) return false;
  return value > max;
}

export function parseInteger(
  envValue: string | undefined,
  defaultValue: number,
  min?: number,
  max?: number
): number {
  if (!envValue) return defaultValue;
  const parsed = parseInt(envValue, 10);
  if (Number.isNaN(parsed)) return defaultValue;
  if (isBelowMin(parsed, min)) return defaultValue;
  if (isAboveMax(parsed, max)) return defaultValue;
  return parsed;
}

export function parseBoolean(
  envValue: string | undefined,
  defaultValue: boolean
): boolean {
  if (!envValue) return defaultValue;
  return envValue.trim().toLowerCase() !== 'false';
}

export function parseLogLevel(envValue: string | undefined): LogLevel {
  const level = envValue?.toLowerCase();
  if (!level) return 'info';
  return isLogLevel(level) ? level : 'info';
}

/** Expands a leading `~` to the home directory and resolves the result. */
export function parsePath(
  envValue: string | undefined,
  defaultValue: string
): string {
  const raw = envValue?.trim() ? envValue.trim() : defaultValue;
  return expandHome(raw);
}

export function expandHome(value: string): string {
  if (value === '~') return os.homedir();
  if (value.startsWith('~/')) {
    return path.join(os.homedir(), value.slice(2));
  }
  return path.resolve(value);
}
