import type { ItemFailureReason } from './content.js';

export interface UrlItem {
  /** 0-based line position in the input file */
  readonly index: number;
  readonly url: string;
}

export interface UrlListEntry {
  readonly index: number;
  readonly line: string;
  readonly valid: boolean;
}

export interface WrittenOutcome {
  readonly status: 'written';
  readonly index: number;
  readonly url: string;
  readonly filename: string;
  readonly path: string;
  readonly bytes: number;
}

export interface FailedOutcome {
  readonly status: 'failed';
  readonly index: number;
  readonly url: string;
  readonly filename: string;
  readonly path: string;
  readonly reason: ItemFailureReason;
  readonly message: string;
}

export interface SkippedOutcome {
  readonly status: 'skipped';
  readonly index: number;
  readonly line: string;
}

export type ItemOutcome = WrittenOutcome | FailedOutcome | SkippedOutcome;

export interface BatchSummary {
  readonly outputDir: string;
  readonly total: number;
  readonly valid: number;
  readonly skipped: number;
  readonly written: number;
  readonly failed: number;
  readonly outcomes: readonly ItemOutcome[];
}

export type ConfirmFn = (question: string) => Promise<boolean>;

export type ProgressFn = (item: UrlItem) => void;

export type WriteFileFn = (filePath: string, data: string) => Promise<void>;
