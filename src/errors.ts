import type { PrereqFailure } from './types.js';

/** Exit code for missing prerequisites (git, GitHub credentials, repository) */
export const EXIT_PREREQ = 1;

/** Exit code for scratch-file write/read failures */
export const EXIT_IO_ERROR = 2;

/** Exit code for an editor that could not start or exited non-zero */
export const EXIT_EDITOR_ERROR = 3;

/** Exit code for invalid input, including an empty pull request title */
export const EXIT_VALIDATION_ERROR = 4;

/** Exit code for GitHub API failures */
export const EXIT_API_ERROR = 5;

/** Exit code when the head branch has commits that are not pushed yet */
export const EXIT_UNPUSHED = 6;

/**
 * Base class for every failure the pull-request pipeline can raise.
 * `help` is an optional second line shown dimmed under the message.
 */
export abstract class PullRequestError extends Error {
  abstract readonly exitCode: number;

  constructor(message: string, readonly help?: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class PrereqError extends PullRequestError {
  readonly exitCode = EXIT_PREREQ;

  constructor(readonly failures: PrereqFailure[]) {
    super(failures.map((f) => f.message).join('; '));
  }
}

/** Scratch file could not be written or read back */
export class DraftIOError extends PullRequestError {
  readonly exitCode = EXIT_IO_ERROR;

  constructor(readonly path: string, cause: unknown) {
    super(`${path}: ${sanitizeError(cause)}`);
  }
}

/** Editor binary missing or non-zero exit */
export class EditorError extends PullRequestError {
  readonly exitCode = EXIT_EDITOR_ERROR;
}

export class ValidationError extends PullRequestError {
  readonly exitCode = EXIT_VALIDATION_ERROR;
}

/** Pull request creation rejected by GitHub or unreachable */
export class ServiceError extends PullRequestError {
  readonly exitCode = EXIT_API_ERROR;

  constructor(message: string, readonly status?: number) {
    super(message);
  }
}

export class UnpushedCommitsError extends PullRequestError {
  readonly exitCode = EXIT_UNPUSHED;

  constructor(readonly count: number) {
    super(
      `Aborted: ${count} commit${count === 1 ? '' : 's'} not yet pushed to a remote`,
      '(use `-f` to force submit a pull request anyway)',
    );
  }
}

/**
 * Scrub secrets and credentials from a string.
 * Replaces known token/key patterns with [REDACTED].
 */
export function scrubSecrets(text: string): string {
  return text
    // GitHub classic tokens (ghp_, gho_, ghs_, ghr_, ghu_)
    .replace(/\b(ghp_|gho_|ghs_|ghr_|ghu_)[a-zA-Z0-9_]+/g, '[REDACTED]')
    // GitHub fine-grained PATs
    .replace(/\bgithub_pat_[a-zA-Z0-9_]+/g, '[REDACTED]')
    // Bearer/token auth headers
    .replace(/(Bearer|token)\s+[a-zA-Z0-9._\-]+/gi, '$1 [REDACTED]')
    // URL-embedded credentials
    .replace(/https?:\/\/[^@\s]+@/g, 'https://[REDACTED]@');
}

/**
 * Extract a safe error message from an unknown error value.
 * Converts to string, then scrubs any embedded secrets.
 */
export function sanitizeError(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  return scrubSecrets(message);
}
