import { config } from '../config/index.js';
import type { LogLevel, LogMetadata } from '../config/types.js';

import { getItemIndex, getItemUrl } from './context.js';

const LEVEL_SEVERITY: Readonly<Record<LogLevel, number>> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/** Item fields come first so explicit metadata can override them. */
function withItemContext(meta?: LogMetadata): LogMetadata {
  const index = getItemIndex();
  const url = getItemUrl();

  return {
    ...(index !== undefined ? { item: index } : {}),
    ...(url ? { url } : {}),
    ...meta,
  };
}

function formatLogEntry(
  level: LogLevel,
  message: string,
  meta?: LogMetadata
): string {
  const merged = withItemContext(meta);
  const suffix =
    Object.keys(merged).length > 0 ? ` ${JSON.stringify(merged)}` : '';
  return `[${new Date().toISOString()}] ${level.toUpperCase()}: ${message}${suffix}`;
}

function isEnabled(level: LogLevel): boolean {
  if (!config.logging.enabled) return false;
  return LEVEL_SEVERITY[level] >= LEVEL_SEVERITY[config.logging.level];
}

function write(level: LogLevel, message: string, meta?: LogMetadata): void {
  if (!isEnabled(level)) return;
  process.stderr.write(`${formatLogEntry(level, message, meta)}\n`);
}

export function logDebug(message: string, meta?: LogMetadata): void {
  write('debug', message, meta);
}

export function logInfo(message: string, meta?: LogMetadata): void {
  write('info', message, meta);
}

export function logWarn(message: string, meta?: LogMetadata): void {
  write('warn', message, meta);
}

export function logError(message: string, error?: Error | LogMetadata): void {
  const meta: LogMetadata | undefined =
    error instanceof Error ? { error: error.message, stack: error.stack } : error;
  write('error', message, meta);
}
