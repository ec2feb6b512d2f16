/**
 * Tests for the interactive environment browser
 * @module tests/browse.test
 */

import { describe, it, expect, vi, beforeEach, afterAll } from 'vitest';
import { select } from '@inquirer/prompts';
import { browseEnvironments } from '../src/features/browse.js';
import { isColorEnabled, setColorEnabled } from '../src/colors.js';
import type { ScanResults } from '../src/locators/index.js';
import type { PythonEnvironment } from '../src/types/index.js';

vi.mock('@inquirer/prompts', () => ({
  select: vi.fn(),
  Separator: class Separator {},
}));

const env: PythonEnvironment = {
  name: null,
  pythonExecutablePath: '/r/versions/3.11.4/bin/python',
  category: 'PyenvPure',
  version: '3.11.4',
  envPath: '/r/versions/3.11.4',
  sysPrefixPath: '/r/versions/3.11.4',
  envManager: null,
  pythonRunCommand: ['/r/versions/3.11.4/bin/python'],
};

function results(environments: PythonEnvironment[]): ScanResults {
  return { gathered: { pyenv: environments.length > 0 }, managers: [], environments };
}

function exitError(): Error {
  const err = new Error('User force closed the prompt');
  err.name = 'ExitPromptError';
  return err;
}

describe('browseEnvironments', () => {
  const initialColor = isColorEnabled();
  const selectMock = vi.mocked(select);
  let logSpy: ReturnType<typeof spyLog>;

  function spyLog() {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
    spy.mockClear();
    return spy;
  }

  beforeEach(() => {
    setColorEnabled(false);
    selectMock.mockReset();
    logSpy = spyLog();
  });

  afterAll(() => {
    setColorEnabled(initialColor);
  });

  it('should show details for the chosen environment until exit', async () => {
    selectMock.mockResolvedValueOnce(env.pythonExecutablePath).mockResolvedValueOnce('__exit__');

    await browseEnvironments(results([env]));

    expect(selectMock).toHaveBeenCalledTimes(2);
    const lines = logSpy.mock.calls.map((call) => call[0]);
    expect(lines).toContain('  Version      3.11.4');
    expect(lines).toContain('  Manager      not found');
  });

  it('should return when the user closes the prompt', async () => {
    selectMock.mockRejectedValueOnce(exitError());

    await expect(browseEnvironments(results([env]))).resolves.toBeUndefined();
    expect(selectMock).toHaveBeenCalledTimes(1);
  });

  it('should propagate unrelated prompt errors', async () => {
    selectMock.mockRejectedValueOnce(new Error('terminal gone'));

    await expect(browseEnvironments(results([env]))).rejects.toThrow('terminal gone');
  });

  it('should not prompt when nothing was found', async () => {
    await browseEnvironments(results([]));

    expect(selectMock).not.toHaveBeenCalled();
    expect(logSpy.mock.calls.map((call) => call[0])).toContain('  No pyenv environments found.');
  });
});
