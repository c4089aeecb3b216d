/**
 * CLI for release-gate
 *
 * Usage:
 *   release-gate [options]
 *
 * Exit codes:
 *   0 - Decisions written (whether or not any release is needed)
 *   1 - Configuration or output error
 */

import { readFileSync } from 'fs';
import path, { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { parseArgs } from 'util';
import { DEFAULT_CONFIG_FILE, loadConfig, resolveEnvironment } from './config.ts';
import { detectReleases } from './detect-release.ts';
import { ConfigError } from './errors.ts';
import { GitHistory } from './history/index.ts';
import type { Logger, LogLevel } from './types.ts';

const __dirname = dirname(typeof __filename !== 'undefined' ? __filename : fileURLToPath(import.meta.url));

function getVersion(): string {
  const packagePath = join(__dirname, '..', 'package.json');
  const packageJson = JSON.parse(readFileSync(packagePath, 'utf8'));
  return packageJson.version;
}

function helpText(): string {
  return `
release-gate - Detect version bumps of independently versioned artifacts

Usage: release-gate [options]

Compares each configured artifact's manifest version with the version at a
base commit and appends <role>_release_needed / <role>_version lines to the
CI output file.

Options:
  --help, -h             Show this help message
  --version, -V          Show version number
  --cwd <path>           Project root (default: current directory)
  --config <path>        Artifact config (default: ${DEFAULT_CONFIG_FILE} in the project root)
  --base <ref>           Base commit (default: $BEFORE_SHA, then HEAD^)
  --output <path>        File to append decisions to (default: $GITHUB_OUTPUT)
  --timeout <ms>         Timeout for each git call (default: 10000)
  --json                 Output the report as JSON
  --quiet, -q            Only print warnings

Exit codes:
  0 - Decisions written
  1 - Error occurred

Examples:
  # Compare against the previous commit
  release-gate

  # Compare against an explicit commit and write to a file
  release-gate --base 4b825dc --output ./release.env
`;
}

function parseTimeout(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const timeout = Number(value);
  if (!Number.isInteger(timeout) || timeout <= 0) throw new ConfigError(`--timeout must be a positive integer, got "${value}"`);
  return timeout;
}

export default async function cli(argv: string[], logger: Logger = console, env: NodeJS.ProcessEnv = process.env): Promise<number> {
  const { values, positionals } = parseArgs({
    args: argv,
    options: {
      help: {
        type: 'boolean',
        short: 'h',
        default: false,
      },
      version: {
        type: 'boolean',
        short: 'V',
        default: false,
      },
      cwd: {
        type: 'string',
        default: process.cwd(),
      },
      config: {
        type: 'string',
      },
      base: {
        type: 'string',
      },
      output: {
        type: 'string',
      },
      timeout: {
        type: 'string',
      },
      json: {
        type: 'boolean',
        default: false,
      },
      quiet: {
        type: 'boolean',
        short: 'q',
        default: false,
      },
    },
    allowPositionals: true,
  });

  if (values.version) {
    logger.log(getVersion());
    return 0;
  }

  if (values.help) {
    logger.log(helpText());
    return 0;
  }

  // Use positional argument as cwd if provided
  const cwd = path.resolve(positionals[0] || values.cwd || process.cwd());
  const { base, outputFile } = resolveEnvironment(env);
  const logLevel: LogLevel = values.json ? 'silent' : values.quiet ? 'warn' : 'info';

  try {
    const config = loadConfig(path.resolve(cwd, values.config || DEFAULT_CONFIG_FILE));

    const report = await detectReleases({
      artifacts: config.artifacts,
      cwd,
      base: values.base || base,
      history: new GitHistory({ cwd, timeout: parseTimeout(values.timeout) }),
      outputFile: values.output || outputFile,
      logger,
      logLevel,
    });

    if (values.json) logger.log(JSON.stringify(report, null, 2));
    return 0;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    if (values.json) {
      logger.log(JSON.stringify({ error: true, message }, null, 2));
    } else {
      logger.error(`Error: ${message}`);
    }
    return 1;
  }
}
