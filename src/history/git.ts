/**
 * Manifest history read from a git checkout
 *
 * Every lookup shells out to git. A failed lookup (bad ref, path missing at
 * that ref, git not installed, timeout) resolves to undefined so one
 * artifact's history never blocks another's decision.
 */

import { execFileSync } from 'child_process';
import { type HistorySource, isNullRef } from './types.ts';

export interface GitRunOptions {
  cwd: string;
  timeout: number;
}

/**
 * Runs git with the given arguments and returns stdout; throws on failure
 */
export type GitRunner = (args: string[], options: GitRunOptions) => string;

export interface GitHistoryOptions {
  /**
   * Directory git runs in; manifest paths are resolved against it
   * @default process.cwd()
   */
  cwd?: string;

  /**
   * Milliseconds before a git call is abandoned
   * @default 10000
   */
  timeout?: number;

  /**
   * Subprocess runner, replaceable for tests
   */
  run?: GitRunner;
}

export const DEFAULT_GIT_TIMEOUT = 10000;

const runGit: GitRunner = (args, options) =>
  execFileSync('git', args, {
    cwd: options.cwd,
    timeout: options.timeout,
    encoding: 'utf8',
    // stderr is captured and dropped
    stdio: ['ignore', 'pipe', 'pipe'],
  });

export class GitHistory implements HistorySource {
  private readonly cwd: string;
  private readonly timeout: number;
  private readonly run: GitRunner;

  constructor(options: GitHistoryOptions = {}) {
    this.cwd = options.cwd || process.cwd();
    this.timeout = options.timeout ?? DEFAULT_GIT_TIMEOUT;
    this.run = options.run || runGit;
  }

  show(ref: string, path: string): string | undefined {
    if (isNullRef(ref)) return undefined;

    // ./ makes git resolve the path against cwd instead of the repository root
    const spec = `${ref}:./${path.replace(/\\/g, '/').replace(/^\.\//, '')}`;
    try {
      return this.run(['show', spec], { cwd: this.cwd, timeout: this.timeout });
    } catch {
      return undefined;
    }
  }

  resolveParent(): string | undefined {
    let stdout: string;
    try {
      stdout = this.run(['rev-parse', 'HEAD^'], { cwd: this.cwd, timeout: this.timeout });
    } catch {
      return undefined;
    }
    const ref = stdout.trim();
    return ref || undefined;
  }
}
