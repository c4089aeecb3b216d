/**
 * Manifest version extraction
 *
 * Manifests are structured documents (Cargo.toml, package.json) holding a
 * version under a dotted field path. Anything that keeps the version from
 * being found - a missing file, a syntax error, a missing field, a
 * non-string value such as `version.workspace = true`, a value spanning
 * whitespace or line breaks - resolves to undefined, never to an exception.
 */

import fs from 'fs';
import path from 'path';
import { parse as parseToml } from 'smol-toml';
import type { ExtractVersionOptions, ManifestFormat } from './types.ts';

/**
 * Pick a format from a manifest's file extension
 */
export function manifestFormat(manifestPath: string): ManifestFormat {
  return path.extname(manifestPath).toLowerCase() === '.json' ? 'json' : 'toml';
}

/**
 * Field that holds the version for a format
 */
export function defaultVersionField(format: ManifestFormat): string {
  return format === 'json' ? 'version' : 'package.version';
}

const SINGLE_TOKEN = /^\S+$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseDocument(content: string, format: ManifestFormat): unknown {
  try {
    return format === 'json' ? JSON.parse(content) : parseToml(content);
  } catch {
    return undefined;
  }
}

function getField(doc: unknown, field: string): unknown {
  const keys = field.split('.');
  let value = doc;
  for (let i = 0; i < keys.length; i++) {
    if (!isRecord(value) || !Object.hasOwn(value, keys[i])) return undefined;
    value = value[keys[i]];
  }
  return value;
}

/**
 * Extract the declared version from manifest text
 *
 * @returns The version string, or undefined if the document does not declare one
 */
export function extractVersion(content: string, options?: ExtractVersionOptions): string | undefined {
  const format = options?.format || 'toml';
  const field = options?.field || defaultVersionField(format);

  const value = getField(parseDocument(content, format), field);
  if (typeof value !== 'string') return undefined;

  // one token; anything else could not be written as a single key=value line
  const version = value.trim();
  return SINGLE_TOKEN.test(version) ? version : undefined;
}

/**
 * Read the declared version of a manifest
 *
 * @param manifestPath - Path of the manifest; its extension selects the format
 * @param content - Manifest text; the file is read when omitted
 * @param field - Dotted field path overriding the format default
 */
export function readManifestVersion(manifestPath: string, content?: string, field?: string): string | undefined {
  let text = content;
  if (text === undefined) {
    try {
      text = fs.readFileSync(manifestPath, 'utf8');
    } catch {
      return undefined;
    }
  }
  return extractVersion(text, { format: manifestFormat(manifestPath), field });
}
