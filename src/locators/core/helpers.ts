/**
 * Shared utilities for locators
 *
 * Interpreter lookup inside an install directory and pyvenv.cfg parsing.
 */

import path from 'node:path';
import { fileExists, readFileContent } from '../../utils.js';
import { createLogger } from '../../logger.js';
import type { Platform, PyvenvConfig } from '../../types/index.js';

const log = createLogger('helpers');

export const PYVENV_CONFIG_FILE = 'pyvenv.cfg';

const VERSION_PATTERN = /^\d+\.\d+\.\d+/;

/**
 * Find the Python executable inside an install or environment directory.
 *
 * Looks for the interpreter directly in `dir` first, then in `bin`
 * (or `Scripts` on Windows).
 */
export function findPythonBinaryPath(dir: string, platform: Platform): string | null {
  const candidates =
    platform === 'win32'
      ? [path.join(dir, 'python.exe'), path.join(dir, 'Scripts', 'python.exe')]
      : [path.join(dir, 'python'), path.join(dir, 'bin', 'python')];

  return candidates.find((candidate) => fileExists(candidate)) ?? null;
}

/**
 * Locate the pyvenv.cfg belonging to an interpreter: beside the
 * executable, or one level up when it lives in bin/ or Scripts/
 */
export function findPyvenvConfigPath(executable: string): string | null {
  const binDir = path.dirname(executable);
  const candidates = [path.join(binDir, PYVENV_CONFIG_FILE), path.join(path.dirname(binDir), PYVENV_CONFIG_FILE)];

  return candidates.find((candidate) => fileExists(candidate)) ?? null;
}

/**
 * Parse pyvenv.cfg content.
 *
 * Keys are case-insensitive. `version` wins over `version_info`.
 * Returns null when no usable version is declared.
 */
export function parsePyvenvConfig(content: string): PyvenvConfig | null {
  const values = new Map<string, string>();

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#') || line.startsWith(';')) continue;

    const eqIndex = line.indexOf('=');
    if (eqIndex === -1) continue;

    const key = line.slice(0, eqIndex).trim().toLowerCase();
    const value = line.slice(eqIndex + 1).trim();
    if (key && !values.has(key)) {
      values.set(key, value);
    }
  }

  const declared = values.get('version') ?? values.get('version_info');
  const match = declared?.match(VERSION_PATTERN);
  if (!match) {
    return null;
  }

  return {
    version: match[0],
    home: values.get('home') || null,
    includeSystemSitePackages: values.get('include-system-site-packages')?.toLowerCase() === 'true',
    prompt: values.get('prompt') || null,
  };
}

/**
 * Find and parse the pyvenv.cfg associated with an interpreter
 */
export function findAndParsePyvenvConfig(executable: string): PyvenvConfig | null {
  const configPath = findPyvenvConfigPath(executable);
  if (!configPath) {
    return null;
  }

  const content = readFileContent(configPath);
  if (content === null) {
    log.debug(`Unreadable ${configPath}`);
    return null;
  }

  const config = parsePyvenvConfig(content);
  if (!config) {
    log.debug(`No version declared in ${configPath}`);
  }
  return config;
}

/**
 * Compare two version strings (for sorting, newest first).
 * Non-numeric suffixes such as `-dev` or `a3` are ignored.
 */
export function compareVersions(a: string | null, b: string | null): number {
  const parts = (v: string | null): number[] =>
    (v || '').split('.').map((segment) => parseInt(segment, 10) || 0);
  const va = parts(a);
  const vb = parts(b);

  for (let i = 0; i < 3; i++) {
    const diff = (vb[i] || 0) - (va[i] || 0);
    if (diff !== 0) return diff;
  }

  return 0;
}
