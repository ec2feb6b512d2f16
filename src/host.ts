/**
 * Host Environment
 *
 * Default HostEnvironment backed by the running process. Locators only
 * ever see the HostEnvironment interface, so tests swap in fakes.
 */

import os from 'node:os';
import path from 'node:path';
import { currentPlatform, getEnv } from './utils.js';
import type { HostEnvironment, Platform } from './types/index.js';

const UNIX_SEARCH_LOCATIONS: string[] = [
  '/usr/bin',
  '/usr/local/bin',
  '/bin',
  '/home/bin',
  '/sbin',
  '/usr/sbin',
  '/usr/local/sbin',
  '/home/sbin',
  '/opt',
  '/opt/bin',
  '/opt/sbin',
  '/opt/homebrew/bin',
];

/**
 * Fixed search directories for the platform, followed by PATH entries
 * that are not already listed
 */
export function getKnownGlobalSearchLocations(platform: Platform, envPath: string | null): string[] {
  if (platform === 'win32') {
    return [];
  }

  const locations = [...UNIX_SEARCH_LOCATIONS];
  for (const entry of (envPath ?? '').split(path.delimiter)) {
    if (entry && !locations.includes(entry)) {
      locations.push(entry);
    }
  }
  return locations;
}

function getUserHome(): string | null {
  try {
    return os.homedir() || null;
  } catch {
    // homedir() throws when no home can be determined
    return null;
  }
}

export function createHostEnvironment(): HostEnvironment {
  const platform = currentPlatform();

  return {
    platform,
    getEnvVar: (name) => getEnv(name),
    getUserHome,
    getKnownGlobalSearchLocations: () => getKnownGlobalSearchLocations(platform, getEnv('PATH')),
  };
}
