import type { FetchFailureReason } from './runtime.js';

export interface ExtractedArticle {
  title?: string;
  /** Article HTML as serialized by Readability */
  content: string;
}

export interface ExtractedMetadata {
  title?: string;
}

export interface ExtractionResult {
  article: ExtractedArticle | null;
  metadata: ExtractedMetadata;
}

/** Title and body after tag stripping; `text` is what gets written. */
export interface ExtractedDocument {
  readonly title: string;
  readonly body: string;
  readonly text: string;
}

export type ItemFailureReason =
  | FetchFailureReason
  | 'extraction'
  | 'write'
  | 'internal';

export type ItemText =
  | { readonly ok: true; readonly text: string }
  | {
      readonly ok: false;
      readonly text: '';
      readonly reason: ItemFailureReason;
      readonly message: string;
    };
