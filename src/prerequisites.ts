import { execFileSync } from 'node:child_process';
import type { PrereqFailure } from './types.js';

/**
 * Check all prerequisites and collect failures.
 *
 * Checks in order: git CLI existence, current directory is a git work tree,
 * GitHub credentials (a token in the environment or the gh CLI).
 * Returns an empty array when all checks pass.
 */
export function checkPrerequisites(hasToken: boolean, cwd: string = process.cwd()): PrereqFailure[] {
  const failures: PrereqFailure[] = [];
  const whichCmd = process.platform === 'win32' ? 'where' : 'which';

  // 1. git CLI
  let gitExists = false;
  try {
    execFileSync(whichCmd, ['git'], { stdio: 'pipe' });
    gitExists = true;
  } catch {
    failures.push({
      name: 'git',
      message: 'git not found',
      help: 'Install it: https://git-scm.com/downloads',
    });
  }

  // 2. Inside a repository (only meaningful when git exists)
  if (gitExists) {
    try {
      execFileSync('git', ['rev-parse', '--is-inside-work-tree'], { cwd, stdio: 'pipe' });
    } catch {
      failures.push({
        name: 'git-repo',
        message: 'Not a git repository',
        help: 'Run this command from inside the repository you want to open a pull request for',
      });
    }
  }

  // 3. Credentials: an env token wins, otherwise gh must be installed
  if (!hasToken) {
    try {
      execFileSync(whichCmd, ['gh'], { stdio: 'pipe' });
    } catch {
      failures.push({
        name: 'github-auth',
        message: 'No GitHub credentials found',
        help: 'Set GITHUB_TOKEN, or install and log in to the gh CLI: https://cli.github.com',
      });
    }
  }

  return failures;
}
