/**
 * Staged sessions: writes land as commits on an isolated work branch and
 * reach the base branch only through finalize().
 *
 *   OPEN ──preview──▶ PREVIEWED ──preview──▶ PREVIEWED
 *     │                   │
 *     ├──finalize─────────┴──▶ FINALIZED
 *     └──abort────────────────▶ ABORTED
 *
 * Everything that checks out, mutates or reads history holds the
 * repository lock, and the checkout found at the start of an operation is
 * restored on every exit path. Session records are re-read under the lock
 * before a transition, so two callers racing to finalize cannot both win.
 */

import { v4 as uuidv4 } from "uuid";
import {
  authorizerFor,
  requireCleanTree,
  runWritePipeline,
  type CommitResult,
  type PipelineSettings,
} from "../commit/pipeline.js";
import { CommitFsError } from "../core/errors.js";
import type { Logger } from "../core/logger.js";
import { openRepo, type RepoRef } from "../core/repo.js";
import {
  FinalizeOptionsSchema,
  parseRequest,
  SessionIdSchema,
  TicketSchema,
  type FinalizeStrategy,
  type SessionStatus,
  type StagedSession,
} from "../core/schemas.js";
import { findCommittedFile, type FileEdit } from "../history/history-reader.js";
import { authorizePath } from "../policy/path-authorizer.js";
import type { ChangedPath, LogEntry, Vcs, VcsFactory } from "../vcs/vcs.js";
import { withRepoLock, type RepoLock } from "./repo-lock.js";
import type { SessionFilter, SessionStore } from "./session-store.js";
import { chooseWorkBranch } from "./work-branch.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SessionManagerOptions {
  store: SessionStore;
  lock: RepoLock;
  vcsFactory: VcsFactory;
  lockTimeoutMs: number;
  pipeline: PipelineSettings;
  logger: Logger;
  now?: () => Date;
}

export interface Preview {
  sessionId: string;
  baseBranch: string;
  workBranch: string;
  /** Most recent first. */
  commits: LogEntry[];
  files: ChangedPath[];
  diff: string;
}

export interface FinalizeResult {
  sessionId: string;
  mergedCommitId: string;
  baseBranch: string;
  strategy: FinalizeStrategy;
  commitsIntegrated: number;
}

const ACTIVE: readonly SessionStatus[] = ["OPEN", "PREVIEWED"];

type Checkout = { branch: string } | { detached: string };

function rejectAllowDirty(request: unknown, sessionId: string): void {
  if (typeof request === "object" && request !== null && "allowDirty" in request && request.allowDirty) {
    throw new CommitFsError(
      "allowDirty is not accepted for staged writes",
      "INVALID_REQUEST",
      { sessionId },
    );
  }
}

/** Subject and body of the single commit a squash finalize creates. */
export function squashMessage(
  label: string,
  subjectsOldestFirst: string[],
): string {
  const n = subjectsOldestFirst.length;
  const subject = `[squash] ${label} – ${n} staged change${n === 1 ? "" : "s"}`;
  const body = subjectsOldestFirst.map((s) => `- ${s}`).join("\n");
  return body ? `${subject}\n\n${body}` : subject;
}

// ---------------------------------------------------------------------------
// Manager
// ---------------------------------------------------------------------------

export class SessionManager {
  private readonly store: SessionStore;
  private readonly lock: RepoLock;
  private readonly vcsFactory: VcsFactory;
  private readonly lockTimeoutMs: number;
  private readonly pipeline: PipelineSettings;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: SessionManagerOptions) {
    this.store = options.store;
    this.lock = options.lock;
    this.vcsFactory = options.vcsFactory;
    this.lockTimeoutMs = options.lockTimeoutMs;
    this.pipeline = options.pipeline;
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
  }

  // -----------------------------------------------------------------------
  // Lookup
  // -----------------------------------------------------------------------

  getSession(sessionId: string): StagedSession {
    const id = parseRequest(SessionIdSchema, sessionId, "session id");
    const session = this.store.get(id);
    if (!session) {
      throw new CommitFsError(`Session not found: ${id}`, "SESSION_NOT_FOUND", {
        sessionId: id,
      });
    }
    return session;
  }

  listSessions(filter: SessionFilter = {}): StagedSession[] {
    return this.store.list(filter);
  }

  /** Remove FINALIZED/ABORTED sessions closed more than `olderThanMs` ago. */
  pruneSessions(options: { olderThanMs: number }): string[] {
    if (!Number.isFinite(options.olderThanMs) || options.olderThanMs < 0) {
      throw new CommitFsError(
        `olderThanMs must be a non-negative number, got ${options.olderThanMs}`,
        "INVALID_REQUEST",
        { olderThanMs: options.olderThanMs },
      );
    }
    const cutoff = this.now().getTime() - options.olderThanMs;
    const pruned: string[] = [];
    for (const session of this.store.list()) {
      if (ACTIVE.includes(session.status) || !session.closedAt) continue;
      if (Date.parse(session.closedAt) <= cutoff && this.store.delete(session.sessionId)) {
        pruned.push(session.sessionId);
      }
    }
    if (pruned.length > 0) {
      this.logger.info(`pruned ${pruned.length} session(s)`, { cutoff: new Date(cutoff).toISOString() });
    }
    return pruned;
  }

  // -----------------------------------------------------------------------
  // Transitions
  // -----------------------------------------------------------------------

  async start(repo: RepoRef, ticket?: string): Promise<StagedSession> {
    const label = ticket === undefined ? undefined : parseRequest(TicketSchema, ticket, "ticket");
    const vcs = this.vcsFactory(repo);

    return withRepoLock(this.lock, repo.root, this.lockTimeoutMs, async () => {
      await requireCleanTree(vcs);

      const baseBranch = await vcs.currentBranch();
      if (!baseBranch) {
        throw new CommitFsError(
          "Cannot start a session on a detached HEAD",
          "INVALID_SESSION_STATE",
          { repoRoot: repo.root },
        );
      }
      const baseTip = await vcs.resolveCommit("HEAD");
      if (!baseTip) {
        throw new CommitFsError(
          `Branch ${baseBranch} has no commits yet`,
          "INVALID_SESSION_STATE",
          { repoRoot: repo.root, baseBranch },
        );
      }

      const sessionId = uuidv4();
      const workBranch = await chooseWorkBranch(vcs, sessionId, label);
      await vcs.createBranch(workBranch, baseTip);

      const at = this.now().toISOString();
      const session: StagedSession = {
        sessionId,
        repoRoot: repo.root,
        baseBranch,
        baseTip,
        workBranch,
        ticket: label,
        status: "OPEN",
        createdAt: at,
        updatedAt: at,
      };
      try {
        this.store.put(session);
      } catch (e: unknown) {
        await vcs.deleteBranch(workBranch);
        throw e;
      }

      this.logger.info(`session ${sessionId} opened on ${workBranch}`, {
        baseBranch,
        baseTip: baseTip.slice(0, 7),
      });
      return session;
    });
  }

  async stagedWrite(sessionId: string, request: unknown): Promise<CommitResult> {
    rejectAllowDirty(request, sessionId);
    return this.writeToSession(sessionId, async () => request);
  }

  /**
   * Read `path` at the tip of the work branch and commit the write `edit`
   * derives from it, under one hold of the repository lock.
   */
  async stagedEdit(sessionId: string, path: string, edit: FileEdit): Promise<CommitResult> {
    return this.writeToSession(sessionId, async (repo, vcs, session) => {
      const relPath = authorizePath(repo.root, path, authorizerFor(this.pipeline));
      const rev = `refs/heads/${session.workBranch}`;
      const request = edit(await findCommittedFile(vcs, rev, relPath), rev);
      rejectAllowDirty(request, sessionId);
      return request;
    });
  }

  private async writeToSession(
    sessionId: string,
    buildRequest: (repo: RepoRef, vcs: Vcs, session: StagedSession) => Promise<unknown>,
  ): Promise<CommitResult> {
    const { repo, vcs, session } = await this.openActive(sessionId, "write to");

    return withRepoLock(this.lock, repo.root, this.lockTimeoutMs, async () => {
      const current = this.requireActive(session.sessionId, "write to");
      await requireCleanTree(vcs);
      await this.requireWorkBranch(vcs, current);

      const request = await buildRequest(repo, vcs, current);
      const result = await this.onBranch(vcs, current.workBranch, current.baseBranch, () =>
        runWritePipeline(repo, vcs, this.pipeline, request),
      );
      this.store.put({ ...current, updatedAt: this.now().toISOString() });
      return result;
    });
  }

  async preview(sessionId: string): Promise<Preview> {
    const { repo, vcs, session } = await this.openActive(sessionId, "preview");

    return withRepoLock(this.lock, repo.root, this.lockTimeoutMs, async () => {
      const current = this.requireActive(session.sessionId, "preview");
      await this.requireWorkBranch(vcs, current);

      const base = (await vcs.resolveCommit(`refs/heads/${current.baseBranch}`)) ?? current.baseTip;
      const work = `refs/heads/${current.workBranch}`;
      const preview: Preview = {
        sessionId: current.sessionId,
        baseBranch: current.baseBranch,
        workBranch: current.workBranch,
        commits: await vcs.log({ range: `${base}..${work}` }),
        files: await vcs.changedPaths(base, work),
        diff: await vcs.diff(base, work),
      };

      if (current.status === "OPEN") {
        this.store.put({ ...current, status: "PREVIEWED", updatedAt: this.now().toISOString() });
        this.logger.info(`session ${current.sessionId} previewed`, {
          commits: preview.commits.length,
        });
      }
      return preview;
    });
  }

  async finalize(sessionId: string, options: unknown): Promise<FinalizeResult> {
    const opts = parseRequest(FinalizeOptionsSchema, options, "finalize options");
    const { repo, vcs, session } = await this.openActive(sessionId, "finalize");

    return withRepoLock(this.lock, repo.root, this.lockTimeoutMs, async () => {
      const current = this.requireActive(session.sessionId, "finalize");
      await requireCleanTree(vcs);
      await this.requireWorkBranch(vcs, current);

      const target = opts.targetBranch ?? current.baseBranch;
      const targetTip = await vcs.resolveCommit(`refs/heads/${target}`);
      if (!targetTip) {
        throw new CommitFsError(`Target branch does not exist: ${target}`, "INVALID_REQUEST", {
          sessionId: current.sessionId,
          targetBranch: target,
        });
      }
      const work = current.workBranch;
      const workTip = await vcs.resolveCommit(`refs/heads/${work}`);
      if (!workTip) {
        throw new CommitFsError(`Work branch does not exist: ${work}`, "INVALID_SESSION_STATE", {
          sessionId: current.sessionId,
          workBranch: work,
        });
      }

      if (opts.strategy === "merge-ff" && !(await vcs.isAncestor(targetTip, workTip))) {
        throw new CommitFsError(
          `${target} moved since the session started; fast-forward is not possible`,
          "CONCURRENT_MODIFICATION",
          {
            sessionId: current.sessionId,
            targetBranch: target,
            recordedBaseTip: current.baseTip,
            targetTip,
          },
        );
      }

      const pending = await vcs.log({ range: `${targetTip}..${workTip}` });

      // The work branch is deleted while the target is still checked out,
      // so a caller that had the work branch checked out lands on the target.
      const mergedCommitId = await this.onBranch(vcs, target, target, async () => {
        const merged = await this.integrate(vcs, current, opts.strategy, target, targetTip, pending);
        await vcs.deleteBranch(work);
        return merged;
      });

      const at = this.now().toISOString();
      this.store.put({
        ...current,
        status: "FINALIZED",
        updatedAt: at,
        closedAt: at,
        mergedCommitId,
        strategy: opts.strategy,
      });

      this.logger.info(`session ${current.sessionId} finalized into ${target}`, {
        strategy: opts.strategy,
        commits: pending.length,
        mergedCommitId: mergedCommitId.slice(0, 7),
      });
      return {
        sessionId: current.sessionId,
        mergedCommitId,
        baseBranch: target,
        strategy: opts.strategy,
        commitsIntegrated: pending.length,
      };
    });
  }

  async abort(sessionId: string): Promise<StagedSession> {
    const session = this.getSession(sessionId);
    if (session.status === "ABORTED") return session;
    if (session.status === "FINALIZED") {
      throw new CommitFsError(
        `Session ${session.sessionId} is already finalized`,
        "INVALID_SESSION_STATE",
        { sessionId: session.sessionId, status: session.status },
      );
    }
    const repo = await openRepo(session.repoRoot);
    const vcs = this.vcsFactory(repo);

    return withRepoLock(this.lock, repo.root, this.lockTimeoutMs, async () => {
      const current = this.getSession(session.sessionId);
      if (current.status === "ABORTED") return current;
      this.assertActive(current, "abort");

      if ((await vcs.currentBranch()) === current.workBranch) {
        await requireCleanTree(vcs);
        await vcs.checkout(current.baseBranch);
      }
      if (await vcs.branchExists(current.workBranch)) {
        await vcs.deleteBranch(current.workBranch);
      }

      const at = this.now().toISOString();
      const aborted: StagedSession = { ...current, status: "ABORTED", updatedAt: at, closedAt: at };
      this.store.put(aborted);
      this.logger.info(`session ${current.sessionId} aborted`, { workBranch: current.workBranch });
      return aborted;
    });
  }

  // -----------------------------------------------------------------------
  // Internals
  // -----------------------------------------------------------------------

  /** Apply `strategy` with `target` checked out; returns the new target tip. */
  private async integrate(
    vcs: Vcs,
    session: StagedSession,
    strategy: FinalizeStrategy,
    target: string,
    targetTip: string,
    pending: LogEntry[],
  ): Promise<string> {
    if (pending.length === 0) return targetTip;

    const work = session.workBranch;
    const label = session.ticket ?? session.sessionId;
    const conflict = (conflicts: string[]): CommitFsError =>
      new CommitFsError(
        `Finalizing ${session.sessionId} into ${target} conflicts in ${conflicts.join(", ")}`,
        "FINALIZE_CONFLICT",
        { sessionId: session.sessionId, strategy, conflicts },
      );

    switch (strategy) {
      case "merge": {
        const outcome = await vcs.merge(work, {
          mode: "no-ff",
          message: `Merge staged session ${label} into ${target}`,
        });
        if (!outcome.ok) throw conflict(outcome.conflicts);
        break;
      }
      case "merge-ff": {
        const outcome = await vcs.merge(work, { mode: "ff-only" });
        if (!outcome.ok) throw conflict(outcome.conflicts);
        break;
      }
      case "rebase-merge": {
        const rebased = await vcs.rebase(work, target);
        // rebase leaves the work branch checked out, aborted or not
        await vcs.checkout(target);
        if (!rebased.ok) throw conflict(rebased.conflicts);
        const outcome = await vcs.merge(work, { mode: "ff-only" });
        if (!outcome.ok) throw conflict(outcome.conflicts);
        break;
      }
      case "squash": {
        const outcome = await vcs.mergeSquash(work);
        if (!outcome.ok) throw conflict(outcome.conflicts);
        const oldestFirst = pending.map((entry) => entry.subject).reverse();
        await vcs.commit(squashMessage(label, oldestFirst), { allowEmpty: true });
        break;
      }
    }

    const head = await vcs.resolveCommit("HEAD");
    if (!head) throw new Error(`HEAD does not resolve after finalizing into ${target}`);
    return head;
  }

  private assertActive(session: StagedSession, action: string): void {
    if (!ACTIVE.includes(session.status)) {
      throw new CommitFsError(
        `Cannot ${action} session ${session.sessionId}: it is ${session.status}`,
        "INVALID_SESSION_STATE",
        { sessionId: session.sessionId, status: session.status },
      );
    }
  }

  private requireActive(sessionId: string, action: string): StagedSession {
    const session = this.getSession(sessionId);
    this.assertActive(session, action);
    return session;
  }

  private async openActive(
    sessionId: string,
    action: string,
  ): Promise<{ repo: RepoRef; vcs: Vcs; session: StagedSession }> {
    const session = this.requireActive(sessionId, action);
    const repo = await openRepo(session.repoRoot);
    return { repo, vcs: this.vcsFactory(repo), session };
  }

  private async requireWorkBranch(vcs: Vcs, session: StagedSession): Promise<void> {
    if (!(await vcs.branchExists(session.workBranch))) {
      throw new CommitFsError(
        `Work branch ${session.workBranch} no longer exists`,
        "INVALID_SESSION_STATE",
        { sessionId: session.sessionId, workBranch: session.workBranch },
      );
    }
  }

  /**
   * Run `fn` with `branch` checked out, then return to whatever was checked
   * out before. When that branch is gone by then, `fallback` is used.
   */
  private async onBranch<T>(
    vcs: Vcs,
    branch: string,
    fallback: string,
    fn: () => Promise<T>,
  ): Promise<T> {
    const branchName = await vcs.currentBranch();
    let original: Checkout | undefined;
    if (branchName) {
      original = { branch: branchName };
    } else {
      const head = await vcs.resolveCommit("HEAD");
      if (head) original = { detached: head };
    }

    if (branchName !== branch) await vcs.checkout(branch);
    let outcome: { ok: true; value: T } | { ok: false; error: unknown };
    try {
      outcome = { ok: true, value: await fn() };
    } catch (e: unknown) {
      outcome = { ok: false, error: e };
    }

    try {
      await this.restoreCheckout(vcs, original, fallback);
    } catch (restoreError: unknown) {
      if (outcome.ok) throw restoreError;
      // The operation's own error is the one to report.
      this.logger.error("restoring checkout failed", {
        branch,
        error: restoreError instanceof Error ? restoreError.message : String(restoreError),
      });
    }
    if (!outcome.ok) throw outcome.error;
    return outcome.value;
  }

  private async restoreCheckout(
    vcs: Vcs,
    original: Checkout | undefined,
    fallback: string,
  ): Promise<void> {
    let back: string;
    if (original && "detached" in original) {
      back = original.detached;
    } else if (original && (await vcs.branchExists(original.branch))) {
      back = original.branch;
    } else {
      back = fallback;
    }
    if ((await vcs.currentBranch()) !== back) {
      await vcs.checkout(back);
    }
  }
}
