import { execFileSync } from 'node:child_process';
import { isAbsolute, resolve } from 'node:path';
import { parseRemoteUrl } from './remote-parser.js';
import type { RepoContext, RepoCoordinates } from './types.js';

/**
 * Run a git command and return trimmed stdout.
 * stderr is captured so git's own messages don't leak into the terminal.
 */
export function git(args: string[], cwd: string): string {
  return execFileSync('git', args, {
    cwd,
    encoding: 'utf-8',
    stdio: ['pipe', 'pipe', 'pipe'],
  }).trim();
}

/** Memoise a zero-argument function */
function once<T>(fn: () => T): () => T {
  let cached: { value: T } | undefined;
  return () => {
    if (!cached) cached = { value: fn() };
    return cached.value;
  };
}

/**
 * Build a RepoContext backed by the git CLI in `cwd`.
 *
 * Every accessor is lazy and cached, so constructing the context never
 * touches the repository.
 */
export function createRepoContext(cwd: string = process.cwd()): RepoContext {
  const coordinates = once((): RepoCoordinates => {
    const url = git(['config', '--get', 'remote.origin.url'], cwd);
    const parsed = parseRemoteUrl(url);
    if (!parsed) {
      throw new Error(`Remote 'origin' (${url}) does not point to a GitHub repository`);
    }
    return parsed;
  });

  return {
    owner: () => coordinates().owner,
    repo: () => coordinates().repo,
    currentBranch: once(() => git(['rev-parse', '--abbrev-ref', 'HEAD'], cwd)),
    editor: once(() => git(['var', 'GIT_EDITOR'], cwd)),
    gitDir: once(() => {
      const dir = git(['rev-parse', '--git-dir'], cwd);
      return isAbsolute(dir) ? dir : resolve(cwd, dir);
    }),
    commitLogs: (fromRef, toRef) =>
      git(['log', '--no-color', '--format=%h %s', `${fromRef}..${toRef}`, '--'], cwd),
    unpushedCommits: () => {
      try {
        return parseInt(git(['rev-list', '--count', '@{upstream}..HEAD'], cwd), 10) || 0;
      } catch {
        // No upstream configured: nothing can be compared
        return 0;
      }
    },
  };
}
