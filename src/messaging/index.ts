/**
 * Reporters
 *
 * JsonRpcReporter emits one JSON-RPC 2.0 notification per line, for hosts
 * that read discovery results from stdout. CollectingReporter keeps
 * everything in memory.
 */

import type { EnvironmentManager, PythonEnvironment, Reporter } from '../types/index.js';

export type NotificationMethod = 'envManager' | 'pythonEnvironment' | 'exit';

export interface Notification<T = unknown> {
  jsonrpc: '2.0';
  method: NotificationMethod;
  params: T;
}

export type LineWriter = (line: string) => void;

const stdoutWriter: LineWriter = (line) => {
  process.stdout.write(line + '\n');
};

export function formatNotification<T>(method: NotificationMethod, params: T): string {
  const notification: Notification<T> = { jsonrpc: '2.0', method, params };
  return JSON.stringify(notification);
}

export class JsonRpcReporter implements Reporter {
  private readonly write: LineWriter;

  constructor(write: LineWriter = stdoutWriter) {
    this.write = write;
  }

  reportEnvironmentManager(manager: EnvironmentManager): void {
    this.write(formatNotification('envManager', manager));
  }

  reportEnvironment(env: PythonEnvironment): void {
    this.write(formatNotification('pythonEnvironment', env));
  }

  /**
   * Signal the end of the stream
   */
  exit(): void {
    this.write(formatNotification('exit', null));
  }
}

export class CollectingReporter implements Reporter {
  readonly managers: EnvironmentManager[] = [];
  readonly environments: PythonEnvironment[] = [];

  reportEnvironmentManager(manager: EnvironmentManager): void {
    this.managers.push(manager);
  }

  reportEnvironment(env: PythonEnvironment): void {
    this.environments.push(env);
  }
}
