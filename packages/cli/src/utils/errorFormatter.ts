/**
 * Standardized error formatting for the CLI
 *
 * Format:
 *   ✗ Main error message (file:line qualified where known)
 *
 *   → Next action
 */

import { ApimetaError } from '@apimeta/core';

/**
 * Print a standardized error message to stderr.
 *
 * @example
 * printError('sevenzip.txt:12: unknown command "fun"', [
 *   'Known commands: meta, dll, fn, ...'
 * ]);
 */
export function printError(title: string, nextSteps?: string[]): void {
  console.error(`✗ ${title}`);

  if (nextSteps && nextSteps.length > 0) {
    console.error('');
    for (const step of nextSteps) {
      console.error(`→ ${step}`);
    }
  }
}

/**
 * Title and next steps for anything thrown by a compile run.
 */
export function formatFailure(err: unknown): { title: string; nextSteps: string[] } {
  if (err instanceof ApimetaError) {
    return { title: err.message, nextSteps: err.suggestion ? [err.suggestion] : [] };
  }
  const message = err instanceof Error ? err.message : String(err);
  return { title: `Unexpected error: ${message}`, nextSteps: [] };
}
