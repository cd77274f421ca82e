import type { BranchRef, QualifiedRef } from './types.js';

/**
 * Reduce a branch reference to the bare local branch name.
 * Returns everything after the last `:`; input without a colon is returned as-is.
 */
export function localBranch(ref: BranchRef): string {
  const segments = ref.split(':');
  return segments[segments.length - 1];
}

/**
 * Split a branch reference into owner, repo and branch.
 *
 * Only the text before the last `:` is a qualifier. A qualifier with a `/`
 * is `owner/repo`, otherwise it is just the owner.
 */
export function parseBranchRef(ref: BranchRef): QualifiedRef {
  const branch = localBranch(ref);
  const colon = ref.lastIndexOf(':');
  if (colon === -1) return { branch };

  const qualifier = ref.slice(0, colon);
  const slash = qualifier.indexOf('/');
  if (slash === -1) {
    return { owner: qualifier, branch };
  }
  return {
    owner: qualifier.slice(0, slash),
    repo: qualifier.slice(slash + 1),
    branch,
  };
}

/**
 * Format a reference the way the GitHub pulls API expects for `head`:
 * `owner:branch` when an owner is known, the bare branch otherwise.
 */
export function toApiRef(ref: BranchRef, fallbackOwner?: string): string {
  const { owner, branch } = parseBranchRef(ref);
  const resolvedOwner = owner || fallbackOwner;
  return resolvedOwner ? `${resolvedOwner}:${branch}` : branch;
}
