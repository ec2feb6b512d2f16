/**
 * Terminal Colors
 *
 * Color output is disabled when NO_COLOR is set or stdout is not a TTY.
 */

import type { ColorName } from './types/index.js';

const codes: Record<ColorName, string> = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',
};

let enabled: boolean = process.env.NO_COLOR === undefined && !!process.stdout.isTTY;

export function setColorEnabled(value: boolean): void {
  enabled = value;
}

export function isColorEnabled(): boolean {
  return enabled;
}

export const c = (color: ColorName, text: string): string =>
  enabled ? `${codes[color]}${text}${codes.reset}` : text;
export const bold = (text: string): string => c('bright', text);
export const dim = (text: string): string => c('dim', text);
