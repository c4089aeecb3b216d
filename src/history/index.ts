/**
 * History sources - where previous manifest content comes from
 */

export { DEFAULT_GIT_TIMEOUT, GitHistory, type GitHistoryOptions, type GitRunner, type GitRunOptions } from './git.ts';
export { type HistoryFixture, MemoryHistory } from './memory.ts';
export { type HistorySource, isNullRef, NULL_REF } from './types.ts';
