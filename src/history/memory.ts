import { type HistorySource, isNullRef } from './types.ts';

/**
 * Manifest content keyed by ref, then by path
 */
export type HistoryFixture = Record<string, Record<string, string>>;

/**
 * In-memory history for tests and dry runs
 */
export class MemoryHistory implements HistorySource {
  /** Number of lookups that reached the fixture */
  lookups = 0;

  private readonly commits: HistoryFixture;
  private readonly parent?: string;

  constructor(commits: HistoryFixture = {}, parent?: string) {
    this.commits = commits;
    this.parent = parent;
  }

  show(ref: string, path: string): string | undefined {
    if (isNullRef(ref)) return undefined;
    this.lookups++;
    const files = this.commits[ref];
    if (!files) return undefined;
    return files[path];
  }

  resolveParent(): string | undefined {
    return this.parent;
  }
}
