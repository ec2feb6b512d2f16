/**
 * Tests for filesystem utilities
 * @module tests/utils.test
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import { dirExists, fileExists, getEnv, listSubdirPaths, pathExists, readFileContent } from '../src/utils.js';
import { makeTempDir, removeDir, writeFile } from './setup.js';

describe('utils', () => {
  let tmp: string;

  beforeEach(() => {
    tmp = makeTempDir();
  });

  afterEach(() => {
    removeDir(tmp);
  });

  describe('existence checks', () => {
    it('should distinguish files and directories', () => {
      const file = writeFile(path.join(tmp, 'file.txt'), 'x');

      expect(fileExists(file)).toBe(true);
      expect(dirExists(file)).toBe(false);
      expect(dirExists(tmp)).toBe(true);
      expect(fileExists(tmp)).toBe(false);
      expect(pathExists(file)).toBe(true);
      expect(pathExists(tmp)).toBe(true);
    });

    it('should return false for missing paths', () => {
      const missing = path.join(tmp, 'missing');

      expect(fileExists(missing)).toBe(false);
      expect(dirExists(missing)).toBe(false);
      expect(pathExists(missing)).toBe(false);
    });
  });

  describe('listSubdirPaths', () => {
    it('should return null for a missing directory', () => {
      expect(listSubdirPaths(path.join(tmp, 'missing'))).toBeNull();
    });

    it('should list directories only', () => {
      fs.mkdirSync(path.join(tmp, 'a'));
      fs.mkdirSync(path.join(tmp, 'b'));
      writeFile(path.join(tmp, 'c.txt'));

      expect(listSubdirPaths(tmp)?.sort()).toEqual([path.join(tmp, 'a'), path.join(tmp, 'b')]);
    });

    it('should follow symlinked directories and skip broken links', () => {
      fs.mkdirSync(path.join(tmp, 'target'));
      fs.symlinkSync(path.join(tmp, 'target'), path.join(tmp, 'alias'));
      fs.symlinkSync(path.join(tmp, 'nowhere'), path.join(tmp, 'broken'));

      expect(listSubdirPaths(tmp)?.sort()).toEqual([path.join(tmp, 'alias'), path.join(tmp, 'target')]);
    });
  });

  describe('readFileContent', () => {
    it('should read file content', () => {
      const file = writeFile(path.join(tmp, 'version'), '3.11.4\n');

      expect(readFileContent(file)).toBe('3.11.4\n');
    });

    it('should return null for missing files', () => {
      expect(readFileContent(path.join(tmp, 'missing'))).toBeNull();
    });
  });

  describe('getEnv', () => {
    const name = 'PYENV_LOCATOR_UTILS_TEST';

    afterEach(() => {
      delete process.env[name];
    });

    it('should return the value when set', () => {
      process.env[name] = 'value';
      expect(getEnv(name)).toBe('value');
    });

    it('should return null when unset or empty', () => {
      expect(getEnv(name)).toBeNull();
      process.env[name] = '';
      expect(getEnv(name)).toBeNull();
    });
  });
});
