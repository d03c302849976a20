/**
 * Vcs over the git CLI, through simple-git. Needs `git` on PATH and a local
 * working copy.
 */

import { GitError, simpleGit, type SimpleGit } from "simple-git";
import type { RepoRef } from "../core/repo.js";
import type {
  ChangedPath,
  CommitOptions,
  IndexEntry,
  IntegrationOutcome,
  LogEntry,
  LogQuery,
  StatusEntry,
  Vcs,
  VcsFactory,
} from "./vcs.js";

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

/**
 * A git command that exited non-zero. Extends simple-git's GitError, which
 * simple-git passes through as is; any other error type it re-wraps.
 */
export class GitCommandError extends GitError {
  public readonly exitCode: number;
  public readonly output: string;

  constructor(exitCode: number, output: string) {
    super(undefined, `git exited with code ${exitCode}: ${output.trim()}`);
    this.name = "GitCommandError";
    this.exitCode = exitCode;
    this.output = output;
  }
}

function isExit(e: unknown, code: number): boolean {
  return e instanceof GitCommandError && e.exitCode === code;
}

/**
 * simple-git only rejects when a failing command also wrote to stderr.
 * `git commit` with nothing to commit, for one, reports on stdout, so every
 * non-zero exit is turned into a GitCommandError here.
 */
function createClient(baseDir: string): SimpleGit {
  return simpleGit({
    baseDir,
    errors(error, result) {
      if (error) return error;
      if (result.exitCode === 0) return undefined;
      const output = Buffer.concat([...result.stdOut, ...result.stdErr]).toString("utf8");
      return new GitCommandError(result.exitCode, output);
    },
  });
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

const FIELD_SEP = "\x1f";
const RECORD_SEP = "\x1e";
const LOG_FORMAT = ["%H", "%aI", "%an <%ae>", "%s"].join("%x1f") + "%x1e";

function parseLog(output: string): LogEntry[] {
  const entries: LogEntry[] = [];
  for (const record of output.split(RECORD_SEP)) {
    const trimmed = record.replace(/^\n+/, "");
    if (!trimmed) continue;
    const [commitId, timestamp, author, subject] = trimmed.split(FIELD_SEP);
    if (!commitId || timestamp === undefined) continue;
    entries.push({
      commitId,
      timestamp,
      author: author ?? "",
      subject: subject ?? "",
    });
  }
  return entries;
}

const CHANGE_KINDS: Record<string, ChangedPath["change"]> = {
  A: "added",
  M: "modified",
  D: "deleted",
  T: "type-changed",
};

function parseNameStatus(output: string): ChangedPath[] {
  const fields = output.split("\0").filter((f) => f.length > 0);
  const changes: ChangedPath[] = [];
  for (let i = 0; i + 1 < fields.length; i += 2) {
    const code = fields[i]!.charAt(0);
    changes.push({ path: fields[i + 1]!, change: CHANGE_KINDS[code] ?? "modified" });
  }
  return changes;
}

// ---------------------------------------------------------------------------
// Adapter
// ---------------------------------------------------------------------------

export class GitVcs implements Vcs {
  readonly root: string;
  private readonly git: SimpleGit;

  constructor(root: string) {
    this.root = root;
    this.git = createClient(root);
  }

  async status(): Promise<StatusEntry[]> {
    const result = await this.git.status(["--untracked-files=all"]);
    return result.files.map((f) => ({
      path: f.path,
      index: f.index,
      workingDir: f.working_dir,
    }));
  }

  async currentBranch(): Promise<string | null> {
    try {
      const name = (await this.git.raw(["symbolic-ref", "--quiet", "--short", "HEAD"])).trim();
      return name || null;
    } catch (e: unknown) {
      if (isExit(e, 1)) return null;
      throw e;
    }
  }

  async resolveCommit(ref = "HEAD"): Promise<string | null> {
    try {
      const id = (await this.git.raw(["rev-parse", "--verify", "--quiet", `${ref}^{commit}`])).trim();
      return id || null;
    } catch (e: unknown) {
      if (isExit(e, 1)) return null;
      throw e;
    }
  }

  async branchExists(name: string): Promise<boolean> {
    return (await this.resolveCommit(`refs/heads/${name}`)) !== null;
  }

  async isAncestor(ancestor: string, descendant: string): Promise<boolean> {
    try {
      await this.git.raw(["merge-base", "--is-ancestor", ancestor, descendant]);
      return true;
    } catch (e: unknown) {
      if (isExit(e, 1)) return false;
      throw e;
    }
  }

  async stage(path: string): Promise<void> {
    await this.git.raw(["add", "-A", "--", path]);
  }

  async indexEntry(path: string): Promise<IndexEntry | undefined> {
    const output = await this.git.raw(["ls-files", "--stage", "-z", "--", path]);
    for (const record of output.split("\0")) {
      const [meta, name] = record.split("\t");
      if (name !== path || !meta) continue;
      const [mode, objectId, stage] = meta.split(" ");
      if (mode && objectId && stage === "0") return { mode, objectId };
    }
    return undefined;
  }

  async restoreIndexEntry(path: string, entry: IndexEntry | undefined): Promise<void> {
    if (entry) {
      await this.git.raw([
        "update-index",
        "--add",
        "--cacheinfo",
        `${entry.mode},${entry.objectId},${path}`,
      ]);
    } else {
      await this.git.raw(["update-index", "--force-remove", "--", path]);
    }
  }

  async isIgnored(path: string): Promise<boolean> {
    try {
      await this.git.raw(["check-ignore", "-q", "--", path]);
      return true;
    } catch (e: unknown) {
      if (isExit(e, 1)) return false;
      throw e;
    }
  }

  async hasStagedChanges(path?: string): Promise<boolean> {
    const args = ["diff", "--cached", "--quiet"];
    if (path !== undefined) args.push("--", path);
    try {
      await this.git.raw(args);
      return false;
    } catch (e: unknown) {
      if (isExit(e, 1)) return true;
      throw e;
    }
  }

  async commit(message: string, options: CommitOptions = {}): Promise<string> {
    const args = ["commit", "-q", "--cleanup=whitespace", "-m", message];
    if (options.allowEmpty) args.push("--allow-empty");
    if (options.paths && options.paths.length > 0) args.push("--", ...options.paths);
    await this.git.raw(args);
    const id = await this.resolveCommit("HEAD");
    if (!id) throw new Error("HEAD does not resolve after commit");
    return id;
  }

  async diff(from: string, to: string): Promise<string> {
    return this.git.raw(["diff", "--no-color", "--no-ext-diff", `${from}...${to}`]);
  }

  async changedPaths(from: string, to: string): Promise<ChangedPath[]> {
    const output = await this.git.raw([
      "diff",
      "--name-status",
      "--no-renames",
      "-z",
      `${from}...${to}`,
    ]);
    return parseNameStatus(output);
  }

  async createBranch(name: string, startPoint: string): Promise<void> {
    await this.git.raw(["branch", "--no-track", name, startPoint]);
  }

  async deleteBranch(name: string): Promise<void> {
    await this.git.raw(["branch", "-D", name]);
  }

  async checkout(ref: string): Promise<void> {
    await this.git.raw(["checkout", "-q", ref]);
  }

  private async conflictedPaths(): Promise<string[]> {
    const output = await this.git.raw(["diff", "--name-only", "--diff-filter=U", "-z"]);
    return output.split("\0").filter((p) => p.length > 0).sort();
  }

  async merge(
    branch: string,
    options: { mode: "no-ff" | "ff-only"; message?: string },
  ): Promise<IntegrationOutcome> {
    const args = ["merge", options.mode === "no-ff" ? "--no-ff" : "--ff-only", "--no-edit"];
    if (options.message) args.push("-m", options.message);
    args.push(branch);
    try {
      await this.git.raw(args);
      return { ok: true };
    } catch (e: unknown) {
      const conflicts = await this.conflictedPaths();
      if (conflicts.length === 0) throw e;
      await this.git.raw(["merge", "--abort"]);
      return { ok: false, conflicts };
    }
  }

  async mergeSquash(branch: string): Promise<IntegrationOutcome> {
    try {
      await this.git.raw(["merge", "--squash", branch]);
      return { ok: true };
    } catch (e: unknown) {
      const conflicts = await this.conflictedPaths();
      if (conflicts.length === 0) throw e;
      // A squash merge leaves no MERGE_HEAD, so `merge --abort` cannot undo it.
      await this.git.raw(["reset", "-q", "--hard", "HEAD"]);
      return { ok: false, conflicts };
    }
  }

  async rebase(branch: string, onto: string): Promise<IntegrationOutcome> {
    try {
      await this.git.raw(["rebase", "--quiet", onto, branch]);
      return { ok: true };
    } catch (e: unknown) {
      const conflicts = await this.conflictedPaths();
      if (conflicts.length === 0) throw e;
      await this.git.raw(["rebase", "--abort"]);
      return { ok: false, conflicts };
    }
  }

  async log(query: LogQuery = {}): Promise<LogEntry[]> {
    const range = query.range ?? "HEAD";
    if (range === "HEAD" && !(await this.resolveCommit("HEAD"))) {
      return [];
    }
    const args = ["log", `--format=${LOG_FORMAT}`];
    if (query.maxCount !== undefined) args.push(`--max-count=${query.maxCount}`);
    args.push(range, "--");
    if (query.path !== undefined) args.push(query.path);
    return parseLog(await this.git.raw(args));
  }

  async readFileAt(ref: string, path: string): Promise<Buffer | undefined> {
    if (!(await this.resolveCommit(ref))) return undefined;
    const listing = await this.git.raw(["ls-tree", "-z", ref, "--", path]);
    const entry = listing.split("\0").find((line) => line.endsWith("\t" + path));
    if (!entry) return undefined;
    const [meta] = entry.split("\t");
    const [, type, objectId] = (meta ?? "").split(" ");
    if (type !== "blob" || !objectId) return undefined;
    const bytes: unknown = await this.git.binaryCatFile(["blob", objectId]);
    if (!Buffer.isBuffer(bytes)) {
      throw new Error(`git cat-file returned no bytes for ${objectId}`);
    }
    return bytes;
  }
}

export function createGitVcs(repo: RepoRef): Vcs {
  return new GitVcs(repo.root);
}

export const gitVcsFactory: VcsFactory = createGitVcs;

// ---------------------------------------------------------------------------
// Repository setup
// ---------------------------------------------------------------------------

/**
 * `git init` a directory and give it a local identity when none is
 * configured, so commits made through commitfs never fail on a bare box.
 */
export async function initRepository(
  dir: string,
  identity: { name: string; email: string } = {
    name: "commitfs",
    email: "commitfs@localhost",
  },
): Promise<void> {
  const git = createClient(dir);
  await git.init();
  for (const [key, value] of [
    ["user.name", identity.name],
    ["user.email", identity.email],
  ] as const) {
    try {
      await git.raw(["config", "--get", key]);
    } catch (e: unknown) {
      if (!isExit(e, 1)) throw e;
      await git.raw(["config", key, value]);
    }
  }
}
