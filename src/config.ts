/**
 * Artifact configuration and environment
 *
 * The artifact table is a JSON file at the project root:
 *
 * ```json
 * {
 *   "artifacts": [
 *     { "name": "app-server", "manifest": "crates/server/Cargo.toml", "role": "server" },
 *     { "name": "app-client", "manifest": "crates/client/Cargo.toml", "role": "client" }
 *   ]
 * }
 * ```
 */

import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { ConfigError } from './errors.ts';
import type { Artifact } from './types.ts';

export const DEFAULT_CONFIG_FILE = 'release.config.json';

// Roles become output keys (<role>_release_needed)
const ROLE_PATTERN = /^[A-Za-z][A-Za-z0-9_]*$/;

function isInsideProject(manifest: string): boolean {
  if (path.isAbsolute(manifest) || path.win32.isAbsolute(manifest)) return false;
  const first = path.posix.normalize(manifest.replace(/\\/g, '/')).split('/')[0];
  return first !== '..';
}

const artifactSchema = z.object({
  name: z.string().trim().min(1),
  manifest: z.string().min(1).refine(isInsideProject, 'must be a relative path inside the project'),
  role: z.string().regex(ROLE_PATTERN, 'must start with a letter and contain only letters, digits and underscores'),
  field: z.string().min(1).optional(),
});

const configSchema = z
  .object({
    artifacts: z.array(artifactSchema).min(1),
  })
  .superRefine((config, ctx) => {
    const seen: Record<string, boolean> = {};
    for (let i = 0; i < config.artifacts.length; i++) {
      const name = config.artifacts[i].name;
      if (seen[name]) ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['artifacts', i, 'name'], message: `duplicate artifact name "${name}"` });
      seen[name] = true;
    }
  });

export interface ReleaseConfig {
  readonly artifacts: readonly Readonly<Artifact>[];
}

/**
 * Validate a parsed config document
 *
 * @param source - Where the document came from, for error messages
 */
export function parseConfig(data: unknown, source?: string): ReleaseConfig {
  const result = configSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message));
    throw new ConfigError(`invalid config (${issues.join('; ')})`, source);
  }

  const artifacts = result.data.artifacts.map((artifact) => Object.freeze({ ...artifact }));
  return Object.freeze({ artifacts: Object.freeze(artifacts) });
}

/**
 * Read and validate a config file
 */
export function loadConfig(configPath: string): ReleaseConfig {
  let text: string;
  try {
    text = fs.readFileSync(configPath, 'utf8');
  } catch (err) {
    throw new ConfigError(`cannot read config (${err instanceof Error ? err.message : String(err)})`, configPath);
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`config is not valid JSON (${err instanceof Error ? err.message : String(err)})`, configPath);
  }

  return parseConfig(data, configPath);
}

/**
 * Values a CI runner passes through the environment
 */
export interface ReleaseEnvironment {
  /** Base commit ref (BEFORE_SHA) */
  base?: string;
  /** Output file to append decisions to (GITHUB_OUTPUT) */
  outputFile?: string;
}

export function resolveEnvironment(env: NodeJS.ProcessEnv = process.env): ReleaseEnvironment {
  return {
    base: env.BEFORE_SHA?.trim() || undefined,
    outputFile: env.GITHUB_OUTPUT || undefined,
  };
}
