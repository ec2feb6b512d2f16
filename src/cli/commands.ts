/**
 * CLI Command Definitions
 */

import type { CLICommand, ParsedArgs } from './types.js';
import { createRegistry, scanAll, resolvePyenvRoot, resolvePyenvBinary } from '../locators/index.js';
import { createHostEnvironment } from '../host.js';
import { JsonRpcReporter } from '../messaging/index.js';
import { c, bold, dim } from '../colors.js';
import { printEnvironmentList } from '../ui.js';

// ─────────────────────────────────────────────────────────────
// Command: list
// ─────────────────────────────────────────────────────────────

function handleList(args: ParsedArgs): void {
  const results = scanAll();

  if (args.options['json']) {
    console.log(JSON.stringify(results.environments, null, 2));
    return;
  }

  console.log();
  printEnvironmentList(results);
}

export const listCommand: CLICommand = {
  name: 'list',
  aliases: ['ls'],
  description: 'List Python environments managed by pyenv',
  usage: 'pyenv-locator list [options]',
  options: [{ long: '--json', description: 'Output results as a JSON array' }],
  examples: [
    { desc: 'List all pyenv versions and virtualenvs', cmd: 'pyenv-locator list' },
    { desc: 'Output JSON', cmd: 'pyenv-locator list --json' },
  ],
  handler: handleList,
};

// ─────────────────────────────────────────────────────────────
// Command: report
// ─────────────────────────────────────────────────────────────

function handleReport(): void {
  const registry = createRegistry();
  registry.gatherAll();

  const reporter = new JsonRpcReporter();
  registry.reportAll(reporter);
  reporter.exit();
}

export const reportCommand: CLICommand = {
  name: 'report',
  description: 'Stream discovery results as JSON-RPC notifications',
  usage: 'pyenv-locator report',
  examples: [
    { desc: 'One notification per line, ending with "exit"', cmd: 'pyenv-locator report' },
  ],
  handler: handleReport,
};

// ─────────────────────────────────────────────────────────────
// Command: root
// ─────────────────────────────────────────────────────────────

function handleRoot(args: ParsedArgs): void {
  const host = createHostEnvironment();
  const root = resolvePyenvRoot(host);
  const binary = resolvePyenvBinary(host);

  if (args.options['json']) {
    console.log(JSON.stringify({ root, manager: binary }, null, 2));
    return;
  }

  console.log();
  console.log(`  ${bold('pyenv root')}     ${root ?? c('yellow', 'not resolved')}`);
  console.log(`  ${bold('pyenv binary')}   ${binary ?? c('yellow', 'not found')}`);
  if (!host.getEnvVar('PYENV_ROOT') && !host.getEnvVar('PYENV')) {
    console.log(`  ${dim('PYENV_ROOT is not set; using the default location')}`);
  }
  console.log();
}

export const rootCommand: CLICommand = {
  name: 'root',
  description: 'Show the resolved pyenv root and executable',
  usage: 'pyenv-locator root [options]',
  options: [{ long: '--json', description: 'Output results as JSON' }],
  handler: handleRoot,
};

export const commands: CLICommand[] = [listCommand, reportCommand, rootCommand];

/**
 * Find command by name or alias
 */
export function findCommand(name: string): CLICommand | undefined {
  return commands.find((cmd) => cmd.name === name || cmd.aliases?.includes(name));
}
