/**
 * Types for release-gate
 */

import type { ReleaseType } from 'semver';
import type { HistorySource } from './history/types.ts';

export type { ReleaseType };

/**
 * One releasable unit and where its version is declared
 */
export interface Artifact {
  /** Release identifier, used in console output */
  name: string;
  /** Manifest path relative to the project root */
  manifest: string;
  /** Output key prefix, e.g. `server` → `server_release_needed` */
  role: string;
  /** Dotted field path overriding the format default */
  field?: string;
}

/**
 * Supported manifest formats
 */
export type ManifestFormat = 'toml' | 'json';

/**
 * Options for extracting a version from manifest text
 */
export interface ExtractVersionOptions {
  /** @default 'toml' */
  format?: ManifestFormat;
  /** @default 'package.version' for toml, 'version' for json */
  field?: string;
}

/**
 * How an artifact's version moved between the base commit and the working tree
 */
export type Transition = 'first-release' | 'bump' | 'no-change' | 'indeterminate';

/**
 * Result of the comparator alone (first-release is decided one level up)
 */
export type VersionComparison = Exclude<Transition, 'first-release'>;

/**
 * Per-artifact decision, created once per run
 */
export interface ReleaseRecord {
  readonly name: string;
  readonly role: string;
  readonly manifest: string;
  readonly previousVersion?: string;
  readonly resolvedVersion?: string;
  readonly transition: Transition;
  readonly releaseNeeded: boolean;
  readonly releaseType?: ReleaseType;
}

/**
 * Aggregate decision for all artifacts sharing a role
 */
export interface RoleDecision {
  readonly role: string;
  /** True if any of the role's artifacts needs a release */
  readonly releaseNeeded: boolean;
  /** Last resolved version among the role's artifacts */
  readonly version?: string;
  /** Whether any artifact of the role resolved a current version */
  readonly resolved: boolean;
}

/**
 * Result of a detection run
 */
export interface ReleaseReport {
  /** Base ref the working tree was compared against */
  base: string;
  records: ReleaseRecord[];
  /** Names of artifacts whose current version could not be determined */
  unresolved: string[];
  roles: RoleDecision[];
}

/**
 * Logging level
 */
export type LogLevel = 'silent' | 'warn' | 'info';

/**
 * Logger interface
 */
export type Logger = Pick<Console, 'log' | 'warn' | 'error'>;

/**
 * Configuration options for detectReleases
 */
export interface DetectReleasesOptions {
  /** Artifacts to check, processed in order */
  artifacts: readonly Artifact[];

  /**
   * Project root that manifest paths are relative to
   * @default process.cwd()
   */
  cwd?: string;

  /**
   * Base commit ref; resolved from history when empty
   */
  base?: string;

  /**
   * Where manifest history comes from
   * @default new GitHistory({ cwd })
   */
  history?: HistorySource;

  /**
   * File to append `key=value` decisions to
   */
  outputFile?: string;

  /**
   * Console stream for progress lines
   * @default console
   */
  logger?: Logger;

  /**
   * Logging level
   * @default 'info'
   */
  logLevel?: LogLevel;
}
