export type * from './types/batch.js';
export type * from './types/content.js';
export type * from './types/runtime.js';
