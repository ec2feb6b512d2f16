/**
 * Platform Detection & Filesystem Utilities
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { Platform } from './types/index.js';
import { createLogger } from './logger.js';

const log = createLogger('fs');

export function currentPlatform(): Platform {
  const platform = os.platform();
  if (platform === 'win32' || platform === 'darwin') {
    return platform;
  }
  return 'linux';
}

export function pathExists(targetPath: string): boolean {
  try {
    fs.statSync(targetPath);
    return true;
  } catch {
    return false;
  }
}

export function dirExists(dirPath: string): boolean {
  try {
    return fs.statSync(dirPath).isDirectory();
  } catch {
    return false;
  }
}

export function fileExists(filePath: string): boolean {
  try {
    return fs.statSync(filePath).isFile();
  } catch {
    return false;
  }
}

export function getEnv(name: string): string | null {
  const value = process.env[name];
  return value !== undefined && value !== '' ? value : null;
}

/**
 * List the immediate subdirectories of `dirPath` as absolute paths.
 *
 * Returns null when the directory itself cannot be read. Entries that
 * fail to stat (broken symlinks, permission errors, races) are skipped.
 * Symlinked directories count as directories.
 */
export function listSubdirPaths(dirPath: string): string[] | null {
  let names: string[];
  try {
    names = fs.readdirSync(dirPath);
  } catch (err) {
    log.debug(`Cannot read ${dirPath}: ${err instanceof Error ? err.message : String(err)}`);
    return null;
  }

  const dirs: string[] = [];
  for (const name of names) {
    const fullPath = path.join(dirPath, name);
    if (dirExists(fullPath)) {
      dirs.push(fullPath);
    } else {
      log.debug(`Skipping non-directory entry ${fullPath}`);
    }
  }
  return dirs;
}

export function readFileContent(filePath: string): string | null {
  try {
    return fs.readFileSync(filePath, 'utf8');
  } catch {
    // Missing file or permission denied
    return null;
  }
}
