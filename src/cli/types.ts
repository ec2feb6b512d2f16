/**
 * CLI Type Definitions
 */

export interface CLIExample {
  cmd: string;
  desc: string;
}

/** CLI command definition */
export interface CLICommand {
  /** Command name (e.g., 'list', 'report') */
  name: string;
  aliases?: string[];
  /** Short description for help */
  description: string;
  usage: string;
  options?: CLIOption[];
  examples?: CLIExample[];
  handler: (args: ParsedArgs) => void | Promise<void>;
}

/** CLI option definition */
export interface CLIOption {
  /** Long form (e.g., '--json') */
  long: string;
  short?: string;
  description: string;
}

/** Parsed CLI arguments */
export interface ParsedArgs {
  command: string | null;
  /** Positional arguments after the command */
  args: string[];
  options: Record<string, string | boolean>;
}

export const GLOBAL_OPTIONS: CLIOption[] = [
  { long: '--help', short: '-h', description: 'Show help message' },
  { long: '--version', short: '-v', description: 'Show version number' },
  { long: '--verbose', description: 'Log discovery details to stderr' },
  { long: '--no-color', description: 'Disable colored output' },
];
