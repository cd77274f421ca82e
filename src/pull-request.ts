import { join } from 'node:path';
import { composeDraft, DRAFT_FILENAME } from './draft.js';
import { buildEditorCommand, type InteractiveRunner } from './editor.js';
import { UnpushedCommitsError, ValidationError } from './errors.js';
import { readTitleAndBodyFromFile } from './message-parser.js';
import { parseIssueNumber, parseIssueUrl } from './remote-parser.js';
import type { RequestParams, RequestSubmitter } from './github.js';
import type { BranchRef, ParsedMessage, RepoContext } from './types.js';

/** Options collected from the `pull-request` command line */
export interface PullRequestOptions {
  /** Positional argument: a title or an issue URL */
  title?: string;
  /** `-i`: issue number to attach the pull request to */
  issue?: string;
  base?: BranchRef;
  head?: BranchRef;
  /** `-f`: skip the unpushed-commits check */
  force?: boolean;
  /** Branch used when `base` is omitted */
  defaultBase?: string;
}

export interface PullRequestDeps {
  context: RepoContext;
  runEditor: InteractiveRunner;
  submit: RequestSubmitter;
  debug?: (message: string) => void;
}

/** Default `-b`: owner plus the configured base branch */
export function defaultBaseRef(context: RepoContext, branch = 'master'): BranchRef {
  return `${context.owner()}:${branch}`;
}

/** Default `-h`: owner plus the current branch */
export function defaultHeadRef(context: RepoContext): BranchRef {
  return `${context.owner()}:${context.currentBranch()}`;
}

/**
 * Open the editor on a fresh draft and return what the user wrote.
 * The draft stays on disk whatever happens, so it can be recovered by hand.
 */
export function editMessage(
  context: RepoContext,
  runEditor: InteractiveRunner,
  base: BranchRef,
  head: BranchRef,
  debug?: (message: string) => void,
): ParsedMessage {
  const draftPath = join(context.gitDir(), DRAFT_FILENAME);
  composeDraft(draftPath, base, head, (from, to) => context.commitLogs(from, to));

  const command = buildEditorCommand(context.editor(), draftPath);
  debug?.(`Editor: ${command.join(' ')}`);
  runEditor(command);

  const message = readTitleAndBodyFromFile(draftPath);
  if (message.title.length === 0) {
    throw new ValidationError('Aborting due to empty pull request title');
  }
  return message;
}

/**
 * Work out the request parameters from the command-line options,
 * opening the editor when neither a title nor an issue was given.
 */
export function resolveRequestParams(
  options: PullRequestOptions,
  deps: Omit<PullRequestDeps, 'submit'>,
): RequestParams {
  const { context, runEditor, debug } = deps;
  const base = options.base ?? defaultBaseRef(context, options.defaultBase);
  const head = options.head ?? defaultHeadRef(context);

  if (options.issue !== undefined) {
    if (options.title !== undefined) {
      throw new ValidationError('Give either a title or -i ISSUE, not both');
    }
    const issue = parseIssueNumber(options.issue);
    if (issue === null) {
      throw new ValidationError(`Invalid issue number: ${options.issue}`);
    }
    return { issue, base, head };
  }

  if (options.title !== undefined) {
    const issueUrl = parseIssueUrl(options.title);
    if (issueUrl) {
      if (issueUrl.owner !== context.owner() || issueUrl.repo !== context.repo()) {
        throw new ValidationError(
          `Issue ${options.title} does not belong to ${context.owner()}/${context.repo()}`,
        );
      }
      return { issue: issueUrl.issueNumber, base, head };
    }
    if (options.title.trim().length === 0) {
      throw new ValidationError('Aborting due to empty pull request title');
    }
    return { title: options.title.trim(), body: '', base, head };
  }

  const { title, body } = editMessage(context, runEditor, base, head, debug);
  return { title, body, base, head };
}

/**
 * Run the whole pull-request flow and resolve with the new pull request's URL.
 * Every failure propagates; nothing is retried and nothing partial is submitted.
 */
export async function runPullRequest(
  options: PullRequestOptions,
  deps: PullRequestDeps,
): Promise<string> {
  const { context, submit, debug } = deps;

  if (!options.force) {
    const unpushed = context.unpushedCommits();
    if (unpushed > 0) {
      throw new UnpushedCommitsError(unpushed);
    }
  }

  const params = resolveRequestParams(options, deps);
  debug?.(`Base: ${params.base}, head: ${params.head}`);

  return submit({ owner: context.owner(), repo: context.repo() }, params);
}
