/**
 * Version ordering and transition classification
 *
 * Versions are ordered by their purely numeric dot-separated components:
 * - 1.2.10 > 1.2.9
 * - 1.2.0 > 1.2 (a strict prefix is smaller, not zero-padded)
 * - 1.2.3-beta reads as [1, 2] (non-numeric components are dropped)
 *
 * When either side has no numeric component at all ("abc", "next") the
 * comparison falls back to text inequality: any difference counts as a bump,
 * a regression included.
 */

import Module from 'module';
import type { ReleaseType, Transition, VersionComparison } from '../types.ts';

const _require = typeof require === 'undefined' ? Module.createRequire(import.meta.url) : require;

// Lazy load dependencies
let _semver: typeof import('semver') | null = null;

function getSemver(): typeof import('semver') {
  if (!_semver) {
    const loaded: typeof import('semver') = _require('semver');
    _semver = loaded;
  }
  return _semver;
}

const NUMERIC_COMPONENT = /^\d+$/;

/**
 * Parse a version string into its numeric components
 *
 * Components are bigints so arbitrarily long numbers keep their order.
 */
export function parseVersion(version: string): bigint[] {
  const parts = version.split('.');
  const components: bigint[] = [];
  for (let i = 0; i < parts.length; i++) {
    if (NUMERIC_COMPONENT.test(parts[i])) components.push(BigInt(parts[i]));
  }
  return components;
}

/**
 * Compare two component sequences position by position
 *
 * @returns -1, 0 or 1
 */
export function compareComponents(a: readonly bigint[], b: readonly bigint[]): -1 | 0 | 1 {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    if (a[i] !== b[i]) return a[i] < b[i] ? -1 : 1;
  }
  if (a.length === b.length) return 0;
  return a.length < b.length ? -1 : 1;
}

/**
 * Whether a pair of versions is compared as text rather than numerically
 */
export function isTextFallback(previous: string, current: string): boolean {
  return parseVersion(previous).length === 0 || parseVersion(current).length === 0;
}

/**
 * Compare a previous and current version
 *
 * @returns 'indeterminate' when either side is missing
 */
export function compareVersions(previous: string | undefined, current: string | undefined): VersionComparison {
  if (previous === undefined || current === undefined) return 'indeterminate';

  if (isTextFallback(previous, current)) {
    return current !== previous ? 'bump' : 'no-change';
  }

  return compareComponents(parseVersion(current), parseVersion(previous)) > 0 ? 'bump' : 'no-change';
}

/**
 * Classify how an artifact's version moved
 *
 * A current version with no previous one is a first release.
 */
export function classifyTransition(previous: string | undefined, current: string | undefined): Transition {
  if (current === undefined) return 'indeterminate';
  if (previous === undefined) return 'first-release';
  return compareVersions(previous, current);
}

/**
 * Whether a transition calls for a release
 */
export function isReleaseTransition(transition: Transition): boolean {
  return transition === 'first-release' || transition === 'bump';
}

/**
 * Semver release type of an upgrade, when both versions are valid semver
 */
export function releaseTypeOf(previous: string, current: string): ReleaseType | undefined {
  const semver = getSemver();
  if (!semver.valid(previous) || !semver.valid(current)) return undefined;
  if (!semver.gt(current, previous)) return undefined;
  return semver.diff(previous, current) || undefined;
}
