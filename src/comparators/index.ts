/**
 * Comparators - Core comparison logic for release-gate
 */

export {
  classifyTransition,
  compareComponents,
  compareVersions,
  isReleaseTransition,
  isTextFallback,
  parseVersion,
  releaseTypeOf,
} from './version.ts';
