/**
 * Main orchestration logic for release-gate
 *
 * Algorithm, per artifact in configured order:
 * 1. Resolve the base ref once: explicit base → parent commit → null ref
 * 2. Read the current version from the working tree → if missing, skip the artifact
 * 3. Read the previous version from the manifest at the base ref
 * 4. Classify the transition → release needed on first release or bump
 * 5. Fold records into one decision per role
 */

import path from 'path';
import { classifyTransition, isReleaseTransition, isTextFallback, releaseTypeOf } from './comparators/index.ts';
import { GitHistory, type HistorySource, NULL_REF } from './history/index.ts';
import { createLogger } from './logger.ts';
import { readManifestVersion } from './manifest.ts';
import { emitReport, roleLabel } from './output.ts';
import type { Artifact, DetectReleasesOptions, Logger, ReleaseRecord, ReleaseReport, RoleDecision } from './types.ts';

/**
 * Callback type for detectReleases
 */
export type DetectReleasesCallback = (error: Error | null, report?: ReleaseReport) => void;

/**
 * Pick the ref to compare against
 */
export function resolveBase(base: string | undefined, history: HistorySource): string {
  if (base) return base;
  return history.resolveParent() || NULL_REF;
}

function checkArtifact(artifact: Artifact, base: string, cwd: string, history: HistorySource, logger: Logger): ReleaseRecord | undefined {
  const current = readManifestVersion(path.join(cwd, artifact.manifest), undefined, artifact.field);

  if (current === undefined) {
    logger.log(`${artifact.name}: (none) -> (none)`);
    logger.warn(`  ✗ Could not determine version for ${artifact.name}`);
    return undefined;
  }

  const previousContent = history.show(base, artifact.manifest);
  const previous = previousContent === undefined ? undefined : readManifestVersion(artifact.manifest, previousContent, artifact.field);

  logger.log(`${artifact.name}: ${previous ?? '(none)'} -> ${current}`);

  const transition = classifyTransition(previous, current);
  const textFallback = previous !== undefined && isTextFallback(previous, current);
  if (textFallback) logger.warn(`  ! ${artifact.name}: versions are not numeric, comparing as text`);

  const releaseNeeded = isReleaseTransition(transition);
  const releaseType = transition === 'bump' && previous !== undefined && !textFallback ? releaseTypeOf(previous, current) : undefined;

  if (releaseNeeded) {
    const why = transition === 'first-release' ? 'first release' : `version bumped${releaseType ? ` (${releaseType})` : ''}`;
    logger.log(`  ✓ ${roleLabel(artifact.role)} release needed: ${why}`);
  }

  return {
    name: artifact.name,
    role: artifact.role,
    manifest: artifact.manifest,
    previousVersion: previous,
    resolvedVersion: current,
    transition,
    releaseNeeded,
    releaseType,
  };
}

/**
 * Fold records into one decision per role, roles in first-appearance order
 */
function decideRoles(artifacts: readonly Artifact[], records: ReleaseRecord[]): RoleDecision[] {
  const roles: string[] = [];
  for (let i = 0; i < artifacts.length; i++) {
    if (roles.indexOf(artifacts[i].role) < 0) roles.push(artifacts[i].role);
  }

  return roles.map((role) => {
    const roleRecords = records.filter((record) => record.role === role);
    let version: string | undefined;
    for (let i = 0; i < roleRecords.length; i++) {
      if (roleRecords[i].resolvedVersion) version = roleRecords[i].resolvedVersion;
    }
    return {
      role,
      releaseNeeded: roleRecords.some((record) => record.releaseNeeded),
      version,
      resolved: roleRecords.length > 0,
    };
  });
}

/**
 * Decide, for every artifact, whether its version moved since the base ref
 *
 * Never throws for per-artifact problems; missing or unreadable versions
 * leave the artifact out of the decision.
 */
export function detectReleasesSync(options: DetectReleasesOptions): ReleaseReport {
  return detectWithLogger(options, createLogger(options.logger || console, options.logLevel));
}

function detectWithLogger(options: DetectReleasesOptions, logger: Logger): ReleaseReport {
  const cwd = options.cwd || process.cwd();
  const history = options.history || new GitHistory({ cwd });

  const base = resolveBase(options.base, history);
  const records: ReleaseRecord[] = [];
  const unresolved: string[] = [];

  for (let i = 0; i < options.artifacts.length; i++) {
    const artifact = options.artifacts[i];
    const record = checkArtifact(artifact, base, cwd, history, logger);
    if (record) records.push(record);
    else unresolved.push(artifact.name);
  }

  return {
    base,
    records,
    unresolved,
    roles: decideRoles(options.artifacts, records),
  };
}

function detectReleasesImpl(options: DetectReleasesOptions, callback: DetectReleasesCallback) {
  const logger = createLogger(options.logger || console, options.logLevel);
  let report: ReleaseReport;
  try {
    report = detectWithLogger(options, logger);
    emitReport(report, { outputFile: options.outputFile, logger });
  } catch (err) {
    callback(err instanceof Error ? err : new Error(String(err)));
    return;
  }
  callback(null, report);
}

/**
 * Callback-based detectReleases
 */
export function detectReleasesCb(options: DetectReleasesOptions, callback: DetectReleasesCallback) {
  detectReleasesImpl(options, callback);
}

/**
 * Decide which artifacts need a release and write the decisions.
 *
 * @example
 * ```ts
 * import { detectReleases } from 'release-gate';
 *
 * const report = await detectReleases({
 *   artifacts: [{ name: 'app-server', manifest: 'crates/server/Cargo.toml', role: 'server' }],
 *   outputFile: process.env.GITHUB_OUTPUT,
 * });
 * ```
 */
export function detectReleases(options: DetectReleasesOptions): Promise<ReleaseReport> {
  return new Promise((resolve, reject) => {
    detectReleasesCb(options, (error, report) => {
      if (error) reject(error);
      else if (report) resolve(report);
      else reject(new Error('No report returned'));
    });
  });
}
