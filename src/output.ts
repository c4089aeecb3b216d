/**
 * Release decision output
 *
 * Decisions are appended to the CI output file as flat key=value lines:
 *
 *   server_release_needed=true
 *   client_release_needed=false
 *   server_version=1.2.0
 *   client_version=2.0.0
 *
 * A role is written only once one of its artifacts resolved a version, and
 * its version key only when that version is known.
 */

import fs from 'fs';
import type { Logger, ReleaseReport } from './types.ts';

/**
 * Display label for a role (server → Server)
 */
export function roleLabel(role: string): string {
  return role.charAt(0).toUpperCase() + role.slice(1);
}

export function formatOutputLines(report: ReleaseReport): string[] {
  const lines: string[] = [];
  for (let i = 0; i < report.roles.length; i++) {
    const decision = report.roles[i];
    if (decision.resolved) lines.push(`${decision.role}_release_needed=${decision.releaseNeeded ? 'true' : 'false'}`);
  }
  for (let i = 0; i < report.roles.length; i++) {
    const decision = report.roles[i];
    if (decision.version) lines.push(`${decision.role}_version=${decision.version}`);
  }
  return lines;
}

/**
 * Console summary, one flag per configured role
 */
export function formatSummary(report: ReleaseReport): string[] {
  const lines = [''];
  for (let i = 0; i < report.roles.length; i++) {
    const decision = report.roles[i];
    lines.push(`${roleLabel(decision.role)} release needed: ${decision.releaseNeeded}`);
  }
  return lines;
}

/**
 * Append lines to a file without touching what is already there
 */
export function writeOutput(file: string, lines: string[]): void {
  if (lines.length === 0) return;
  fs.appendFileSync(file, lines.map((line) => `${line}\n`).join(''), 'utf8');
}

export interface EmitOptions {
  outputFile?: string;
  logger: Logger;
}

/**
 * Print the summary and append decisions to the output file, if any
 *
 * Write errors propagate: a run that cannot record its decision has failed.
 */
export function emitReport(report: ReleaseReport, options: EmitOptions): void {
  const summary = formatSummary(report);
  for (let i = 0; i < summary.length; i++) options.logger.log(summary[i]);

  if (options.outputFile) writeOutput(options.outputFile, formatOutputLines(report));
}
