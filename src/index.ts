#!/usr/bin/env node
/**
 * 🐍 pyenv-locator
 *
 * Discover Python versions and pyenv-virtualenv environments managed by pyenv.
 *
 * Usage:
 *   pyenv-locator             Interactive browser (TTY) or listing
 *   pyenv-locator report      JSON-RPC notifications on stdout
 *   pyenv-locator --help      Show all commands
 */

import { dim } from './colors.js';
import { runCLI, findCommand, parseArgs } from './cli/index.js';
import { scanAll } from './locators/index.js';
import { browseEnvironments } from './features/browse.js';
import { logger } from './logger.js';

async function main(): Promise<void> {
  const handled = await runCLI();
  if (handled) {
    return;
  }

  if (process.stdin.isTTY && process.stdout.isTTY) {
    await browseEnvironments(scanAll());
    return;
  }

  const list = findCommand('list');
  if (list) {
    await list.handler(parseArgs());
  }
}

main().catch((err: unknown) => {
  if (err instanceof Error && err.name === 'ExitPromptError') {
    console.log();
    console.log(dim('  Goodbye! 👋'));
    return;
  }
  logger.error(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});
