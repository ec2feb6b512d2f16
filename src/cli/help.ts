/**
 * CLI Help Text Generation
 */

import fs from 'node:fs';
import { c, bold, dim } from '../colors.js';
import { commands } from './commands.js';
import { GLOBAL_OPTIONS } from './types.js';
import type { CLICommand } from './types.js';

/**
 * Version from package.json (two levels up from both src/cli and dist/cli)
 */
export function readPackageVersion(): string {
  try {
    const pkg: unknown = JSON.parse(fs.readFileSync(new URL('../../package.json', import.meta.url), 'utf8'));
    if (pkg && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  } catch {
    // Running from an unexpected layout
  }
  return '0.0.0';
}

function formatOption(opt: { long: string; short?: string }): string {
  const shortStr = opt.short ? `${opt.short}, ` : '    ';
  return `${shortStr}${opt.long}`.padEnd(16);
}

/**
 * Show main help (all commands)
 */
export function showHelp(): void {
  console.log();
  console.log(bold('  🐍 pyenv-locator') + dim(` v${readPackageVersion()}`));
  console.log(dim('  Discover Python versions and virtualenvs managed by pyenv.'));
  console.log();

  console.log(bold('  USAGE'));
  console.log();
  console.log(`    ${c('cyan', '$')} pyenv-locator ${dim('[command] [options]')}`);
  console.log(`    ${dim('Without a command, opens an interactive browser (or lists on non-TTY output).')}`);
  console.log();

  console.log(bold('  COMMANDS'));
  console.log();

  const maxCmdLen = Math.max(...commands.map((cmd) => cmd.name.length));
  for (const cmd of commands) {
    const padding = ' '.repeat(maxCmdLen - cmd.name.length + 2);
    console.log(`    ${c('green', cmd.name)}${padding}${cmd.description}`);
  }
  console.log();

  console.log(bold('  GLOBAL OPTIONS'));
  console.log();
  for (const opt of GLOBAL_OPTIONS) {
    console.log(`    ${formatOption(opt)} ${opt.description}`);
  }
  console.log();

  console.log(bold('  ENVIRONMENT'));
  console.log();
  console.log(`    PYENV_ROOT               ${dim('pyenv installation root (default ~/.pyenv)')}`);
  console.log(`    PYENV                    ${dim('pyenv-win installation root')}`);
  console.log(`    PYENV_LOCATOR_LOG_LEVEL  ${dim('debug | info | warn | error | silent')}`);
  console.log();

  console.log(`    ${dim('Run')} pyenv-locator <command> --help ${dim('for command-specific help.')}`);
  console.log();
}

/**
 * Show help for a specific command
 */
export function showCommandHelp(cmd: CLICommand): void {
  console.log();
  console.log(`  ${bold(cmd.name)} - ${cmd.description}`);
  console.log();

  console.log(bold('  USAGE'));
  console.log();
  console.log(`    ${c('cyan', '$')} ${cmd.usage}`);
  console.log();

  if (cmd.aliases && cmd.aliases.length > 0) {
    console.log(bold('  ALIASES'));
    console.log();
    console.log(`    ${cmd.aliases.map((a) => c('green', a)).join(', ')}`);
    console.log();
  }

  if (cmd.options && cmd.options.length > 0) {
    console.log(bold('  OPTIONS'));
    console.log();
    for (const opt of cmd.options) {
      console.log(`    ${formatOption(opt)} ${opt.description}`);
    }
    console.log();
  }

  if (cmd.examples && cmd.examples.length > 0) {
    console.log(bold('  EXAMPLES'));
    console.log();
    for (const ex of cmd.examples) {
      console.log(`    ${dim('# ' + ex.desc)}`);
      console.log(`    ${c('cyan', '$')} ${ex.cmd}`);
      console.log();
    }
  }
}

export function showVersion(): void {
  console.log(`pyenv-locator v${readPackageVersion()}`);
}
