/**
 * CLI Entry Point
 *
 * Argument parsing and command routing.
 */

import type { ParsedArgs } from './types.js';
import { findCommand } from './commands.js';
import { showHelp, showCommandHelp, showVersion } from './help.js';
import { setColorEnabled } from '../colors.js';
import { setLogLevel } from '../logger.js';

/**
 * Parse command line arguments
 */
export function parseArgs(argv: string[] = process.argv.slice(2)): ParsedArgs {
  const result: ParsedArgs = {
    command: null,
    args: [],
    options: {},
  };

  for (const arg of argv) {
    if (arg.startsWith('--')) {
      const eqIndex = arg.indexOf('=');
      if (eqIndex === -1) {
        result.options[arg.slice(2)] = true;
      } else {
        result.options[arg.slice(2, eqIndex)] = arg.slice(eqIndex + 1);
      }
    } else if (arg.startsWith('-') && arg.length > 1) {
      // Short flags may be combined: -hv
      for (const flag of arg.slice(1)) {
        result.options[flag] = true;
      }
    } else if (!result.command) {
      result.command = arg;
    } else {
      result.args.push(arg);
    }
  }

  return result;
}

/**
 * Apply options that affect every command
 */
export function applyGlobalOptions(args: ParsedArgs): void {
  if (args.options['no-color']) {
    setColorEnabled(false);
  }
  if (args.options['verbose']) {
    setLogLevel('debug');
  }
}

/**
 * Run CLI
 * Returns true if a command was handled, false to continue to interactive mode
 */
export async function runCLI(argv?: string[]): Promise<boolean> {
  const args = parseArgs(argv);
  applyGlobalOptions(args);

  if (args.options['help'] || args.options['h']) {
    const cmd = args.command ? findCommand(args.command) : undefined;
    if (cmd) {
      showCommandHelp(cmd);
    } else {
      showHelp();
    }
    return true;
  }

  if (args.options['version'] || args.options['v']) {
    showVersion();
    return true;
  }

  if (!args.command) {
    return false;
  }

  const command = findCommand(args.command);

  if (!command) {
    console.log();
    console.log(`  Unknown command: ${args.command}`);
    console.log(`  Run 'pyenv-locator --help' to see available commands.`);
    console.log();
    process.exitCode = 1;
    return true;
  }

  await command.handler(args);
  return true;
}

export type { ParsedArgs, CLICommand, CLIOption } from './types.js';
export { commands, findCommand } from './commands.js';
export { showHelp, showCommandHelp, showVersion } from './help.js';
