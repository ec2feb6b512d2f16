/**
 * Prompt helpers around @inquirer/prompts
 * with ESC / Ctrl+C mapped to "go back"
 */

import { select, Separator } from '@inquirer/prompts';

// Symbol to indicate user pressed ESC or Ctrl+C
export const BACK = Symbol('back');
export type BackSymbol = typeof BACK;

/**
 * Check if error is from ESC/Ctrl+C
 * @inquirer/prompts can throw different error types:
 * - ExitPromptError: User pressed Ctrl+C
 * - AbortPromptError: Prompt was aborted
 * - CancelPromptError: Prompt was cancelled
 */
export function isExitError(err: unknown): boolean {
  return (
    err !== null &&
    typeof err === 'object' &&
    'name' in err &&
    (err.name === 'ExitPromptError' || err.name === 'AbortPromptError' || err.name === 'CancelPromptError')
  );
}

/**
 * Await a prompt, resolving to BACK instead of rejecting when the user exits
 */
export async function orBack<T>(prompt: Promise<T>): Promise<T | BackSymbol> {
  try {
    return await prompt;
  } catch (err) {
    if (isExitError(err)) {
      return BACK;
    }
    throw err;
  }
}

export { select, Separator };
