import type { ParsedIssue, RepoCoordinates } from './types.js';

const ISSUE_URL_REGEX =
  /^https?:\/\/github\.com\/([a-zA-Z0-9_.-]+)\/([a-zA-Z0-9_.-]+)\/issues\/(\d+)\/?(?:\?.*)?(?:#.*)?$/;

/** `git@github.com:owner/repo.git` */
const SCP_REMOTE_REGEX = /^[\w.-]+@github\.com:([a-zA-Z0-9_.-]+)\/([a-zA-Z0-9_.-]+?)(?:\.git)?\/?$/;

/** `https://github.com/owner/repo.git`, `ssh://git@github.com/owner/repo`, `git://...` */
const URL_REMOTE_REGEX =
  /^(?:https?|ssh|git):\/\/(?:[^@/]+@)?github\.com(?::\d+)?\/([a-zA-Z0-9_.-]+)\/([a-zA-Z0-9_.-]+?)(?:\.git)?\/?$/;

/**
 * Parse a GitHub issue URL into its components.
 *
 * Accepts URLs like:
 *   https://github.com/owner/repo/issues/123
 *   https://github.com/owner/repo/issues/123#issuecomment-1
 *
 * Returns null for any other input.
 */
export function parseIssueUrl(input: string): ParsedIssue | null {
  try {
    new URL(input);
  } catch {
    return null;
  }

  const match = input.match(ISSUE_URL_REGEX);
  if (!match) return null;

  return {
    owner: match[1],
    repo: match[2],
    issueNumber: parseInt(match[3], 10),
  };
}

/**
 * Extract owner and repository name from a git remote URL pointing at GitHub.
 * Handles scp-like SSH, ssh://, git:// and http(s) forms, with or without `.git`.
 */
export function parseRemoteUrl(remote: string): RepoCoordinates | null {
  const trimmed = remote.trim();
  const match = trimmed.match(SCP_REMOTE_REGEX) ?? trimmed.match(URL_REMOTE_REGEX);
  if (!match) return null;

  return { owner: match[1], repo: match[2] };
}

/**
 * Parse the `-i` flag value: a plain issue number, optionally prefixed with `#`.
 */
export function parseIssueNumber(input: string): number | null {
  const match = input.trim().match(/^#?(\d+)$/);
  if (!match) return null;
  const issueNumber = parseInt(match[1], 10);
  return issueNumber > 0 ? issueNumber : null;
}
