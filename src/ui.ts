/**
 * UI Components - Headers, Listings and Detail Views
 */

import { c, bold, dim } from './colors.js';
import type { PythonEnvironment, PythonEnvironmentCategory } from './types/index.js';
import type { ScanResults } from './locators/index.js';

const CATEGORY_LABELS: Record<PythonEnvironmentCategory, string> = {
  PyenvPure: 'pyenv',
  PyenvVirtualEnv: 'virtualenv',
};

export function categoryLabel(category: PythonEnvironmentCategory): string {
  return CATEGORY_LABELS[category];
}

export function printHeader(): void {
  console.log();
  console.log(c('cyan', '━'.repeat(66)));
  console.log(`  🐍 ${bold('pyenv-locator')} ${dim('Python environments managed by pyenv')}`);
  console.log(c('cyan', '━'.repeat(66)));
  console.log();
}

/**
 * One listing row: version, kind, name, executable
 */
export function formatEnvironmentRow(env: PythonEnvironment): string {
  const version = (env.version ?? 'unknown').padEnd(12);
  const kind = categoryLabel(env.category).padEnd(11);
  const name = (env.name ?? '-').padEnd(16);
  return `${c('green', version)} ${kind} ${bold(name)} ${dim(env.pythonExecutablePath)}`;
}

export function printEnvironmentList(results: ScanResults): void {
  const { environments, managers } = results;

  console.log(`  ${bold('Python environments')} ${dim(`(${environments.length})`)}`);
  console.log();

  for (const manager of managers) {
    console.log(`  ${dim('Manager:')} ${manager.tool.toLowerCase()} ${dim(manager.executablePath)}`);
  }
  if (managers.length === 0) {
    console.log(`  ${dim('Manager:')} ${c('yellow', 'pyenv executable not found')}`);
  }
  console.log();

  if (environments.length === 0) {
    console.log(`  ${c('yellow', 'No pyenv environments found.')}`);
    console.log();
    return;
  }

  console.log(
    `  ${c('cyan', 'Version'.padEnd(12))} ${c('cyan', 'Kind'.padEnd(11))} ${c('cyan', 'Name'.padEnd(16))} ${c('cyan', 'Executable')}`
  );
  console.log(`  ${dim('─'.repeat(12))} ${dim('─'.repeat(11))} ${dim('─'.repeat(16))} ${dim('─'.repeat(30))}`);

  for (const env of environments) {
    console.log(`  ${formatEnvironmentRow(env)}`);
  }
  console.log();
}

/**
 * Label/value lines describing one environment
 */
export function describeEnvironment(env: PythonEnvironment): Array<[string, string]> {
  return [
    ['Name', env.name ?? '-'],
    ['Kind', categoryLabel(env.category)],
    ['Version', env.version ?? 'unknown'],
    ['Executable', env.pythonExecutablePath],
    ['Prefix', env.sysPrefixPath],
    ['Manager', env.envManager?.executablePath ?? 'not found'],
    ['Run with', env.pythonRunCommand.join(' ')],
  ];
}

export function printEnvironmentDetails(env: PythonEnvironment): void {
  console.log();
  for (const [label, value] of describeEnvironment(env)) {
    console.log(`  ${dim(label.padEnd(12))} ${value}`);
  }
  console.log();
}
