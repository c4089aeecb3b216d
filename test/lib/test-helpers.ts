/**
 * Test helper functions
 */

import fs from 'fs';
import path from 'path';
import url from 'url';
import type { Logger } from '../../src/types.ts';

const __dirname1 = path.dirname(typeof __filename !== 'undefined' ? __filename : url.fileURLToPath(import.meta.url));

// Use project .tmp directory instead of system temp
const PROJECT_ROOT = path.join(__dirname1, '../..');
const TMP_DIR = path.join(PROJECT_ROOT, '.tmp');

/**
 * Create temp directory for testing
 */
export function createTempDir(prefix: string): string {
  fs.mkdirSync(TMP_DIR, { recursive: true });
  return fs.mkdtempSync(path.join(TMP_DIR, prefix));
}

/**
 * Clean up temp directory
 */
export function cleanupTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/**
 * Write a file below a temp project, creating parent directories
 */
export function writeProjectFile(root: string, relativePath: string, content: string): string {
  const filePath = path.join(root, relativePath);
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, content);
  return filePath;
}

/**
 * Minimal Cargo.toml declaring a version
 */
export function cargoToml(name: string, version: string): string {
  return `[package]\nname = "${name}"\nversion = "${version}"\nedition = "2021"\n\n[dependencies]\nserde = "1"\n`;
}

export interface CapturedLogger {
  logger: Logger;
  log: string[];
  warn: string[];
  error: string[];
}

/**
 * Logger that records every line instead of printing it
 */
export function captureLogger(): CapturedLogger {
  const captured: CapturedLogger = {
    log: [],
    warn: [],
    error: [],
    logger: {
      log: (...args: unknown[]) => {
        captured.log.push(args.join(' '));
      },
      warn: (...args: unknown[]) => {
        captured.warn.push(args.join(' '));
      },
      error: (...args: unknown[]) => {
        captured.error.push(args.join(' '));
      },
    },
  };
  return captured;
}
