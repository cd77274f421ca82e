import pc from 'picocolors';
import { PrereqError, PullRequestError, sanitizeError } from './errors.js';
import type { PrereqFailure } from './types.js';

/**
 * Print prerequisite failures as red errors with actionable help.
 */
export function printErrors(failures: PrereqFailure[]): void {
  for (const f of failures) {
    console.error(pc.red(`✖ ${f.message}`));
    console.error(pc.dim(`  ${f.help}`));
  }
}

/**
 * Print a single fatal diagnostic, with an optional dimmed hint below it.
 */
export function printError(message: string, help?: string): void {
  console.error(pc.red(`✖ ${message}`));
  if (help) {
    console.error(pc.dim(`  ${help}`));
  }
}

/**
 * Print the diagnostic for a fatal error and return the exit code for its kind.
 * Errors outside the pipeline's own classes exit with 1.
 */
export function printFailure(error: unknown): number {
  if (error instanceof PrereqError) {
    printErrors(error.failures);
  } else if (error instanceof PullRequestError) {
    printError(error.message, error.help);
  } else {
    printError(sanitizeError(error));
  }
  return error instanceof PullRequestError ? error.exitCode : 1;
}

/**
 * Print a progress message without a trailing newline.
 * Used for "Creating pull request..." where " done" is appended on the same line.
 */
export function printProgress(message: string): void {
  process.stdout.write(message);
}

/**
 * Complete a progress line by printing " done" in green with a newline.
 */
export function printProgressDone(): void {
  console.log(pc.green(' done'));
}

/**
 * Print a [debug] line in dimmed text. Only call when --verbose is active.
 */
export function printDebug(message: string): void {
  console.log(pc.dim(`[debug] ${message}`));
}

/** Print the base/head summary before submission */
export function printRequestSummary(base: string, head: string): void {
  console.log(`${pc.dim('Requesting a pull to')} ${pc.cyan(base)} ${pc.dim('from')} ${pc.cyan(head)}`);
}

/** Print the created pull request's URL; plain so it can be piped */
export function printPullRequestUrl(url: string): void {
  console.log(url);
}
