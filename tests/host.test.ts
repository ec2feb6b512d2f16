/**
 * Tests for the default host environment
 * @module tests/host.test
 */

import { describe, it, expect, afterEach } from 'vitest';
import { createHostEnvironment, getKnownGlobalSearchLocations } from '../src/host.js';

describe('getKnownGlobalSearchLocations', () => {
  it('should return nothing on Windows', () => {
    expect(getKnownGlobalSearchLocations('win32', 'C:\\tools')).toEqual([]);
  });

  it('should list fixed unix locations before PATH entries', () => {
    const locations = getKnownGlobalSearchLocations('linux', ['/usr/bin', '/custom/bin', ''].join(':'));

    expect(locations).toEqual([
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
      '/custom/bin',
    ]);
  });

  it('should handle a missing PATH', () => {
    expect(getKnownGlobalSearchLocations('darwin', null)).toHaveLength(12);
  });
});

describe('createHostEnvironment', () => {
  const original = process.env.PYENV_LOCATOR_TEST_VAR;

  afterEach(() => {
    if (original === undefined) {
      delete process.env.PYENV_LOCATOR_TEST_VAR;
    } else {
      process.env.PYENV_LOCATOR_TEST_VAR = original;
    }
  });

  it('should read environment variables', () => {
    process.env.PYENV_LOCATOR_TEST_VAR = '/opt/pyenv';

    expect(createHostEnvironment().getEnvVar('PYENV_LOCATOR_TEST_VAR')).toBe('/opt/pyenv');
  });

  it('should treat empty variables as unset', () => {
    process.env.PYENV_LOCATOR_TEST_VAR = '';

    expect(createHostEnvironment().getEnvVar('PYENV_LOCATOR_TEST_VAR')).toBeNull();
  });

  it('should describe the running platform', () => {
    const host = createHostEnvironment();

    expect(['darwin', 'linux', 'win32']).toContain(host.platform);
    expect(Array.isArray(host.getKnownGlobalSearchLocations())).toBe(true);
  });
});
