/**
 * Tests for reporters
 * @module tests/messaging.test
 */

import { describe, it, expect } from 'vitest';
import { CollectingReporter, JsonRpcReporter, formatNotification } from '../src/messaging/index.js';
import { createPyenvManager } from '../src/locators/managers/pyenv.js';
import type { PythonEnvironment } from '../src/types/index.js';

const manager = createPyenvManager('/r/bin/pyenv');

const env: PythonEnvironment = {
  name: 'myenv',
  pythonExecutablePath: '/r/versions/myenv/bin/python',
  category: 'PyenvVirtualEnv',
  version: '3.11.4',
  envPath: '/r/versions/myenv',
  sysPrefixPath: '/r/versions/myenv',
  envManager: manager,
  pythonRunCommand: ['/r/versions/myenv/bin/python'],
};

describe('formatNotification', () => {
  it('should produce a JSON-RPC 2.0 notification', () => {
    expect(formatNotification('exit', null)).toBe('{"jsonrpc":"2.0","method":"exit","params":null}');
  });
});

describe('JsonRpcReporter', () => {
  it('should write one line per notification', () => {
    const lines: string[] = [];
    const reporter = new JsonRpcReporter((line) => lines.push(line));

    reporter.reportEnvironmentManager(manager);
    reporter.reportEnvironment(env);
    reporter.exit();

    expect(lines).toHaveLength(3);
    expect(lines[0]).toBe(
      '{"jsonrpc":"2.0","method":"envManager","params":{"executablePath":"/r/bin/pyenv","version":null,"tool":"Pyenv"}}'
    );
    expect(JSON.parse(lines[1])).toEqual({ jsonrpc: '2.0', method: 'pythonEnvironment', params: env });
    expect(lines[2]).toBe('{"jsonrpc":"2.0","method":"exit","params":null}');
  });
});

describe('CollectingReporter', () => {
  it('should keep reports in arrival order', () => {
    const reporter = new CollectingReporter();

    reporter.reportEnvironment(env);
    reporter.reportEnvironmentManager(manager);

    expect(reporter.environments).toEqual([env]);
    expect(reporter.managers).toEqual([manager]);
  });
});
