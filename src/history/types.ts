/**
 * Ref meaning "no prior commit" (first push to a branch, first commit of a repository)
 */
export const NULL_REF = '0'.repeat(40);

/**
 * Read access to manifest content at earlier commits
 */
export interface HistorySource {
  /** Content of `path` as it existed at `ref`, undefined if unavailable */
  show(ref: string, path: string): string | undefined;
  /** Parent of the current position in history, undefined if it cannot be resolved */
  resolveParent(): string | undefined;
}

export function isNullRef(ref: string): boolean {
  return ref === '' || ref === NULL_REF;
}
