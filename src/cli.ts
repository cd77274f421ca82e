#!/usr/bin/env node
import { Command } from 'commander';
import { loadConfig } from './config.js';
import { runInteractive } from './editor.js';
import { PrereqError } from './errors.js';
import { createRepoContext } from './git.js';
import { createOctokit, octokitSubmitter } from './github.js';
import {
  printDebug,
  printFailure,
  printProgress,
  printProgressDone,
  printPullRequestUrl,
  printRequestSummary,
} from './output.js';
import { checkPrerequisites } from './prerequisites.js';
import { runPullRequest } from './pull-request.js';

interface PullRequestFlags {
  issue?: string;
  base?: string;
  head?: string;
  force?: boolean;
  verbose?: boolean;
}

/** Set while a progress line is waiting for its " done" */
let progressPending = false;

/** Print a failure and exit with the code that belongs to its kind */
function fail(error: unknown): never {
  if (progressPending) {
    console.log(); // newline after progress message
    progressPending = false;
  }
  process.exit(printFailure(error));
}

const program = new Command();

program
  .name('pullreq')
  .description('Draft and open GitHub pull requests from the command line')
  .version('0.1.0');

program
  .command('pull-request')
  .description('Open a pull request on GitHub for the repository "origin" points to')
  .helpOption('--help', 'display help for command')
  .argument('[title]', 'Pull request title, or the URL of an issue to attach to')
  .option('-i, --issue <issue>', 'Attach the pull request to an existing issue')
  .option('-b, --base <base>', 'Base branch: "branch", "owner:branch" or "owner/repo:branch" (default: <owner>:master)')
  .option('-h, --head <head>', 'Head branch, same formats as --base (default: <owner>:<current branch>)')
  .option('-f, --force', 'Skip the check for commits not yet pushed upstream')
  .option('--verbose', 'Show debug info')
  .addHelpText('after', `
If TITLE is omitted, a text editor opens in which the title and body of the
pull request are entered the same way as a git commit message.`)
  .action(async (title: string | undefined, flags: PullRequestFlags) => {
    const debug = flags.verbose ? printDebug : undefined;

    try {
      const config = loadConfig();
      const failures = checkPrerequisites(config.token !== undefined);
      if (failures.length > 0) {
        throw new PrereqError(failures);
      }

      const context = createRepoContext();
      const url = await runPullRequest(
        {
          title,
          issue: flags.issue,
          base: flags.base,
          head: flags.head,
          force: flags.force,
          defaultBase: config.defaultBase,
        },
        {
          context,
          runEditor: runInteractive,
          submit: async (repo, params) => {
            const octokit = createOctokit(config.token);
            printRequestSummary(params.base, params.head);
            printProgress('Creating pull request...');
            progressPending = true;
            const created = await octokitSubmitter(octokit)(repo, params);
            progressPending = false;
            printProgressDone();
            return created;
          },
          debug,
        },
      );
      printPullRequestUrl(url);
    } catch (error: unknown) {
      fail(error);
    }
  });

await program.parseAsync();
