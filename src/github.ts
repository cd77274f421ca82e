import { execFileSync } from 'node:child_process';
import { Octokit } from '@octokit/rest';
import { z } from 'zod';
import { toApiRef, localBranch } from './branch-ref.js';
import { ServiceError, ValidationError, sanitizeError } from './errors.js';
import type { RepoCoordinates } from './types.js';

const refSchema = z.string().trim().min(1, 'branch reference is empty');

/** Parameters for a pull request written from scratch */
export const TitledRequestSchema = z.object({
  title: z.string().trim().min(1, 'Aborting due to empty pull request title'),
  body: z.string(),
  base: refSchema,
  head: refSchema,
});

/** Parameters for turning an existing issue into a pull request */
export const IssueRequestSchema = z.object({
  issue: z.number().int().positive(),
  base: refSchema,
  head: refSchema,
});

export type TitledRequest = z.infer<typeof TitledRequestSchema>;
export type IssueRequest = z.infer<typeof IssueRequestSchema>;

/** What the pipeline hands to the submitter */
export type RequestParams = TitledRequest | IssueRequest;

/** Submits a pull request and resolves with its URL */
export type RequestSubmitter = (repo: RepoCoordinates, params: RequestParams) => Promise<string>;

/**
 * Get a GitHub auth token from the gh CLI.
 * Requires gh to be installed and authenticated.
 */
function getGitHubToken(): string {
  const token = execFileSync('gh', ['auth', 'token'], {
    encoding: 'utf-8',
    stdio: ['pipe', 'pipe', 'pipe'],
  }).trim();

  if (!token) {
    throw new Error('gh auth token returned empty string');
  }

  return token;
}

/**
 * Create an authenticated Octokit instance.
 * Uses the given token, falling back to the gh CLI's token.
 */
export function createOctokit(token?: string): Octokit {
  return new Octokit({ auth: token ?? getGitHubToken() });
}

/**
 * Validate request parameters against a schema, reporting every problem at once.
 */
function validate<T extends z.ZodType>(schema: T, value: unknown): z.output<T> {
  const checked = schema.safeParse(value);
  if (!checked.success) {
    throw new ValidationError(checked.error.issues.map((i) => i.message).join('; '));
  }
  return checked.data;
}

/**
 * Open a pull request on GitHub and return its HTML URL.
 *
 * `base` is sent as a bare branch name; `head` as `owner:branch`, with the
 * repository owner filled in when the reference carries none.
 */
export async function createPullRequest(
  octokit: Octokit,
  owner: string,
  repo: string,
  params: RequestParams,
): Promise<string> {
  let content: { issue: number } | { title: string; body: string };
  let refs: { base: string; head: string };
  if ('issue' in params) {
    const { issue, base, head } = validate(IssueRequestSchema, params);
    content = { issue };
    refs = { base, head };
  } else {
    const { title, body, base, head } = validate(TitledRequestSchema, params);
    content = { title, body };
    refs = { base, head };
  }

  try {
    const response = await octokit.pulls.create({
      owner,
      repo,
      base: localBranch(refs.base),
      head: toApiRef(refs.head, owner),
      ...content,
    });
    return response.data.html_url;
  } catch (error: unknown) {
    const status = (error as { status?: number }).status;
    throw new ServiceError(`Error creating pull request: ${sanitizeError(error)}`, status);
  }
}

/**
 * Bind an Octokit client into a RequestSubmitter for the pipeline.
 */
export function octokitSubmitter(octokit: Octokit): RequestSubmitter {
  return ({ owner, repo }, params) => createPullRequest(octokit, owner, repo, params);
}
