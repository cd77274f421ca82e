import { writeFileSync } from 'node:fs';
import { localBranch } from './branch-ref.js';
import { DraftIOError } from './errors.js';
import type { BranchRef } from './types.js';

/** File name of the draft inside the repository's git directory */
export const DRAFT_FILENAME = 'PULLREQ_EDITMSG';

/**
 * Turn raw `git log` output into comment lines: trimmed as a whole,
 * every line prefixed with `# ` (blank ones included), trailing spaces removed.
 */
export function formatCommitLogs(logs: string): string {
  return logs
    .trim()
    .split('\n')
    .map((line) => `# ${line}`.replace(/ +$/, ''))
    .join('\n');
}

/**
 * Build the initial draft text. The first line is intentionally empty so the
 * cursor lands on the title line.
 */
export function buildDraftMessage(base: BranchRef, head: BranchRef, logs: string): string {
  return `
# Requesting a pull to ${base} from ${head}
#
# Write a message for this pull request. The first block
# of the text is the title and the rest is description.
#
# Changes:
#
${formatCommitLogs(logs)}
`;
}

/**
 * Write a fresh draft to `path`, seeded with the commits between base and head.
 * Overwrites any draft left from an earlier run.
 *
 * @param commitLogs - log lookup, called with the local base and head branch names
 */
export function composeDraft(
  path: string,
  base: BranchRef,
  head: BranchRef,
  commitLogs: (fromRef: string, toRef: string) => string,
): void {
  const logs = commitLogs(localBranch(base), localBranch(head));
  const message = buildDraftMessage(base, head, logs);

  try {
    writeFileSync(path, message, { encoding: 'utf-8', mode: 0o644 });
  } catch (error: unknown) {
    throw new DraftIOError(path, error);
  }
}
