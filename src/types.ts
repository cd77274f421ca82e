/**
 * A branch reference as given on the command line.
 * Accepted shapes: `branch`, `owner:branch`, `owner/repo:branch`.
 */
export type BranchRef = string;

/** Structured form of a BranchRef */
export interface QualifiedRef {
  owner?: string;
  repo?: string;
  branch: string;
}

/** Owner and name of a GitHub repository */
export interface RepoCoordinates {
  owner: string;
  repo: string;
}

/** Parsed components from a GitHub issue URL */
export interface ParsedIssue extends RepoCoordinates {
  issueNumber: number;
}

/** Title and body extracted from an edited draft */
export interface ParsedMessage {
  title: string;
  body: string;
}

/**
 * Lazily resolved repository facts. Nothing runs git until an accessor is called.
 */
export interface RepoContext {
  owner(): string;
  repo(): string;
  currentBranch(): string;
  editor(): string;
  gitDir(): string;
  /** One line per commit reachable from `toRef` but not `fromRef` */
  commitLogs(fromRef: string, toRef: string): string;
  /** Number of commits on HEAD not yet on its upstream; 0 when there is no upstream */
  unpushedCommits(): number;
}

/** A prerequisite check failure with actionable help */
export interface PrereqFailure {
  name: string;
  message: string;
  help: string;
}
