/**
 * release-gate
 *
 * Per-artifact release detection for CI - compares each manifest's version
 * with the version at a base commit and emits key=value release decisions
 *
 * @example
 * ```typescript
 * import { detectReleases, loadConfig } from 'release-gate';
 *
 * const { artifacts } = loadConfig('release.config.json');
 * const report = await detectReleases({ artifacts, outputFile: process.env.GITHUB_OUTPUT });
 * for (const decision of report.roles) {
 *   console.log(decision.role, decision.releaseNeeded, decision.version);
 * }
 * ```
 */

// Comparators
export { classifyTransition, compareComponents, compareVersions, isReleaseTransition, isTextFallback, parseVersion, releaseTypeOf } from './comparators/index.ts';
// Configuration
export { DEFAULT_CONFIG_FILE, loadConfig, parseConfig, type ReleaseConfig, type ReleaseEnvironment, resolveEnvironment } from './config.ts';
// Main API
export { type DetectReleasesCallback, detectReleases, detectReleasesCb, detectReleasesSync, resolveBase } from './detect-release.ts';
export { ConfigError } from './errors.ts';
// History
export { DEFAULT_GIT_TIMEOUT, GitHistory, type GitHistoryOptions, type GitRunner, type GitRunOptions, type HistoryFixture, type HistorySource, isNullRef, MemoryHistory, NULL_REF } from './history/index.ts';
export { createLogger } from './logger.ts';
// Manifests
export { defaultVersionField, extractVersion, manifestFormat, readManifestVersion } from './manifest.ts';
// Output
export { type EmitOptions, emitReport, formatOutputLines, formatSummary, roleLabel, writeOutput } from './output.ts';

// Types
export type {
  Artifact,
  DetectReleasesOptions,
  ExtractVersionOptions,
  Logger,
  LogLevel,
  ManifestFormat,
  ReleaseRecord,
  ReleaseReport,
  ReleaseType,
  RoleDecision,
  Transition,
  VersionComparison,
} from './types.ts';
