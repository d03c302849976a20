/**
 * What the core needs from version control: status, index, commits,
 * branches, integration and history reads. One instance per working copy;
 * callers serialize access through the repository lock.
 */

import type { RepoRef } from "../core/repo.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface StatusEntry {
  path: string;
  /** Index column of `git status --porcelain` (" " when unchanged). */
  index: string;
  /** Working-tree column of `git status --porcelain`. */
  workingDir: string;
}

export interface LogEntry {
  commitId: string;
  /** Author date, ISO 8601. */
  timestamp: string;
  author: string;
  subject: string;
}

export interface ChangedPath {
  path: string;
  change: "added" | "modified" | "deleted" | "type-changed";
}

export type IntegrationOutcome =
  | { ok: true }
  | { ok: false; conflicts: string[] };

export interface LogQuery {
  /** Revision or range such as `main..work`; defaults to HEAD. */
  range?: string;
  path?: string;
  maxCount?: number;
}

/** A stage-0 index entry, as `git ls-files --stage` prints it. */
export interface IndexEntry {
  mode: string;
  objectId: string;
}

export interface CommitOptions {
  allowEmpty?: boolean;
  paths?: string[];
}

export interface Vcs {
  readonly root: string;

  status(): Promise<StatusEntry[]>;
  /** Checked-out branch name, or null on a detached HEAD. */
  currentBranch(): Promise<string | null>;
  /** Full commit id for `ref` (HEAD by default), or null when it does not resolve. */
  resolveCommit(ref?: string): Promise<string | null>;
  branchExists(name: string): Promise<boolean>;
  isAncestor(ancestor: string, descendant: string): Promise<boolean>;

  stage(path: string): Promise<void>;
  indexEntry(path: string): Promise<IndexEntry | undefined>;
  /** Put back an entry read by indexEntry(); undefined removes `path` from the index. */
  restoreIndexEntry(path: string, entry: IndexEntry | undefined): Promise<void>;
  /** Whether an untracked `path` is excluded by .gitignore or info/exclude. */
  isIgnored(path: string): Promise<boolean>;
  /** Whether the index differs from HEAD, optionally limited to one path. */
  hasStagedChanges(path?: string): Promise<boolean>;
  /**
   * Commit and return the new commit id. With `paths`, only those paths are
   * committed and other staged entries stay staged.
   */
  commit(message: string, options?: CommitOptions): Promise<string>;

  /** Aggregate diff of `to` against the merge base of `from` and `to`. */
  diff(from: string, to: string): Promise<string>;
  changedPaths(from: string, to: string): Promise<ChangedPath[]>;

  createBranch(name: string, startPoint: string): Promise<void>;
  deleteBranch(name: string): Promise<void>;
  checkout(ref: string): Promise<void>;

  /** Merge `branch` into the checked-out branch. Conflicts abort the merge. */
  merge(
    branch: string,
    options: { mode: "no-ff" | "ff-only"; message?: string },
  ): Promise<IntegrationOutcome>;
  /** Stage the squashed changes of `branch`; conflicts reset to HEAD. */
  mergeSquash(branch: string): Promise<IntegrationOutcome>;
  /** Rebase `branch` onto `onto`; conflicts abort the rebase. */
  rebase(branch: string, onto: string): Promise<IntegrationOutcome>;

  log(query?: LogQuery): Promise<LogEntry[]>;
  /** Blob bytes of `path` at `ref`, or undefined when absent there. */
  readFileAt(ref: string, path: string): Promise<Buffer | undefined>;
}

export type VcsFactory = (repo: RepoRef) => Vcs;
