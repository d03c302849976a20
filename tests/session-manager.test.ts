import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { unwrap, type Result } from "../src/core/result.js";
import type { StagedSession } from "../src/core/schemas.js";
import type { Engine } from "../src/engine.js";
import { squashMessage } from "../src/session/session-manager.js";
import { GitVcs } from "../src/vcs/git-vcs.js";
import {
  branches,
  commitFile,
  createTempRepo,
  currentBranch,
  headId,
  subjects,
  testEngine,
  type TempRepo,
} from "./helpers/git-repo.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function errorCode<T>(result: Result<T>): string | undefined {
  return result.ok ? undefined : result.error.code;
}

async function parents(repo: TempRepo, ref = "HEAD"): Promise<number> {
  const line = (await repo.git.raw(["rev-list", "--parents", "-n", "1", ref])).trim();
  return line.split(" ").length - 1;
}

/** Fails checkouts of `main` while `state.failing` is set. */
class StuckCheckoutVcs extends GitVcs {
  constructor(
    root: string,
    private readonly state: { failing: boolean },
  ) {
    super(root);
  }

  override async checkout(ref: string): Promise<void> {
    if (this.state.failing && ref === "main") {
      throw new Error("checkout of main failed");
    }
    await super.checkout(ref);
  }
}

describe("squashMessage", () => {
  it("counts changes and lists subjects oldest first", () => {
    expect(squashMessage("T-1", ["a"])).toBe("[squash] T-1 – 1 staged change\n\n- a");
    expect(squashMessage("T-1", ["a", "b"])).toBe("[squash] T-1 – 2 staged changes\n\n- a\n- b");
  });
});

describe("staged sessions", () => {
  let repo: TempRepo;
  let engine: Engine;

  beforeEach(async () => {
    repo = await createTempRepo();
    engine = testEngine(repo);
  });

  afterEach(() => {
    engine.close();
    repo.cleanup();
  });

  async function start(ticket?: string): Promise<StagedSession> {
    return unwrap(await engine.startSession(repo.root, ticket));
  }

  async function stage(sessionId: string, path: string, content: string, summary = "write") {
    return unwrap(
      await engine.stagedWrite(sessionId, { path, content, op: "add", summary }),
    );
  }

  // -------------------------------------------------------------------------
  // start / write / preview
  // -------------------------------------------------------------------------

  it("starts a session on an isolated work branch", async () => {
    const baseTip = await headId(repo);
    const session = await start("T-42");

    expect(session.status).toBe("OPEN");
    expect(session.baseBranch).toBe("main");
    expect(session.baseTip).toBe(baseTip);
    expect(session.ticket).toBe("T-42");
    expect(session.repoRoot).toBe(repo.root);
    expect(session.workBranch).toBe(`commitfs/staged/t-42-${session.sessionId.slice(0, 8)}`);
    expect(await branches(repo)).toEqual([session.workBranch, "main"]);
    expect(await currentBranch(repo)).toBe("main");
    expect(unwrap(await engine.getSession(session.sessionId))).toEqual(session);
  });

  it("keeps staged writes off the base branch", async () => {
    const baseTip = await headId(repo);
    const session = await start();
    const result = await stage(session.sessionId, "a.txt", "a\n", "first");

    expect(result.branch).toBe(session.workBranch);
    expect(await headId(repo)).toBe(baseTip);
    expect(await currentBranch(repo)).toBe("main");
    expect(existsSync(join(repo.root, "a.txt"))).toBe(false);
    expect(await subjects(repo, session.workBranch)).toEqual([
      "[add] a.txt – first",
      "initial commit",
    ]);
  });

  it("previews commits, files and the aggregate diff", async () => {
    const session = await start();
    await stage(session.sessionId, "a.txt", "a\n", "first");
    await stage(session.sessionId, "b.txt", "b\n", "second");

    const preview = unwrap(await engine.preview(session.sessionId));
    expect(preview.commits.map((c) => c.subject)).toEqual([
      "[add] b.txt – second",
      "[add] a.txt – first",
    ]);
    expect(preview.files).toEqual([
      { path: "a.txt", change: "added" },
      { path: "b.txt", change: "added" },
    ]);
    expect(preview.diff).toContain("+++ b/a.txt");
    expect(preview.diff).toContain("+++ b/b.txt");
    expect(unwrap(await engine.getSession(session.sessionId)).status).toBe("PREVIEWED");

    // Still writable, and preview can be repeated.
    await stage(session.sessionId, "c.txt", "c\n", "third");
    expect(unwrap(await engine.preview(session.sessionId)).commits).toHaveLength(3);
  });

  it("restores whatever branch the caller had checked out", async () => {
    await repo.git.raw(["checkout", "-q", "-b", "feature"]);
    const session = await start();
    expect(session.baseBranch).toBe("feature");
    await stage(session.sessionId, "a.txt", "a\n");
    expect(await currentBranch(repo)).toBe("feature");

    await repo.git.raw(["checkout", "-q", "main"]);
    unwrap(await engine.finalize(session.sessionId, { strategy: "merge" }));
    expect(await currentBranch(repo)).toBe("main");
    expect(await subjects(repo, "feature", 1)).toEqual([
      `Merge staged session ${session.sessionId} into feature`,
    ]);
  });

  it("refuses to start on a dirty tree or a detached HEAD", async () => {
    writeFileSync(join(repo.root, "stray.txt"), "x");
    expect(errorCode(await engine.startSession(repo.root))).toBe("DIRTY_TREE");

    rmSync(join(repo.root, "stray.txt"));
    await repo.git.raw(["checkout", "-q", await headId(repo)]);
    expect(errorCode(await engine.startSession(repo.root))).toBe("INVALID_SESSION_STATE");
  });

  it("rejects allowDirty for staged writes", async () => {
    const session = await start();
    const result = await engine.stagedWrite(session.sessionId, {
      path: "a.txt",
      content: "a",
      op: "add",
      summary: "x",
      allowDirty: true,
    });
    expect(errorCode(result)).toBe("INVALID_REQUEST");
  });

  it("reports unknown and malformed session ids", async () => {
    expect(errorCode(await engine.getSession("3f2b8c1e-4a5d-4e6f-8a7b-9c0d1e2f3a4b"))).toBe(
      "SESSION_NOT_FOUND",
    );
    expect(errorCode(await engine.preview("not-a-uuid"))).toBe("INVALID_REQUEST");
  });

  // -------------------------------------------------------------------------
  // finalize strategies
  // -------------------------------------------------------------------------

  it("finalizes with a no-ff merge", async () => {
    const session = await start("T-42");
    await stage(session.sessionId, "a.txt", "a\n", "first");
    await stage(session.sessionId, "b.txt", "b\n", "second");

    const result = unwrap(await engine.finalize(session.sessionId, { strategy: "merge" }));
    expect(result).toEqual({
      sessionId: session.sessionId,
      mergedCommitId: await headId(repo),
      baseBranch: "main",
      strategy: "merge",
      commitsIntegrated: 2,
    });
    expect(await subjects(repo, "main", 1)).toEqual(["Merge staged session T-42 into main"]);
    expect(await parents(repo)).toBe(2);
    expect(readFileSync(join(repo.root, "a.txt"), "utf8")).toBe("a\n");
    expect(await branches(repo)).toEqual(["main"]);

    const stored = unwrap(await engine.getSession(session.sessionId));
    expect(stored.status).toBe("FINALIZED");
    expect(stored.mergedCommitId).toBe(result.mergedCommitId);
    expect(stored.strategy).toBe("merge");
    expect(stored.closedAt).toBeDefined();
  });

  it("fast-forwards with merge-ff", async () => {
    const session = await start();
    await stage(session.sessionId, "a.txt", "a\n");
    const workTip = await headId(repo, session.workBranch);

    const result = unwrap(await engine.finalize(session.sessionId, { strategy: "merge-ff" }));
    expect(result.mergedCommitId).toBe(workTip);
    expect(await headId(repo)).toBe(workTip);
  });

  it("fails merge-ff with CONCURRENT_MODIFICATION when the base moved", async () => {
    const session = await start();
    await stage(session.sessionId, "a.txt", "a\n");
    const moved = await commitFile(repo, "other.txt", "o\n", "base moved");

    const result = await engine.finalize(session.sessionId, { strategy: "merge-ff" });
    expect(errorCode(result)).toBe("CONCURRENT_MODIFICATION");
    expect(await headId(repo)).toBe(moved);
    expect(await branches(repo)).toContain(session.workBranch);
    expect(unwrap(await engine.getSession(session.sessionId)).status).toBe("OPEN");
  });

  it("rebases onto a moved base, then fast-forwards", async () => {
    const session = await start();
    await stage(session.sessionId, "a.txt", "a\n", "first");
    await stage(session.sessionId, "b.txt", "b\n", "second");
    await commitFile(repo, "other.txt", "o\n", "base moved");

    const result = unwrap(
      await engine.finalize(session.sessionId, { strategy: "rebase-merge" }),
    );
    expect(result.commitsIntegrated).toBe(2);
    expect(await subjects(repo, "main")).toEqual([
      "[add] b.txt – second",
      "[add] a.txt – first",
      "base moved",
      "initial commit",
    ]);
    expect(await parents(repo)).toBe(1);
    expect(await currentBranch(repo)).toBe("main");
  });

  it.each([1, 5, 50])("squashes %i staged commit(s) into one", async (n) => {
    const session = await start("T-7");
    const baseTip = await headId(repo);
    for (let i = 0; i < n; i++) {
      await stage(session.sessionId, `f${i}.txt`, `${i}\n`, `write ${i}`);
    }

    const result = unwrap(await engine.finalize(session.sessionId, { strategy: "squash" }));
    expect(result.commitsIntegrated).toBe(n);

    const expected = squashMessage(
      "T-7",
      Array.from({ length: n }, (_, i) => `[add] f${i}.txt – write ${i}`),
    );
    expect((await repo.git.raw(["log", "-1", "--format=%B"])).trim()).toBe(expected);
    expect((await subjects(repo, "main", 1))[0]).toBe(
      `[squash] T-7 – ${n} staged change${n === 1 ? "" : "s"}`,
    );
    expect(await parents(repo)).toBe(1);
    expect(await headId(repo, "HEAD~1")).toBe(baseTip);
    expect(existsSync(join(repo.root, `f${n - 1}.txt`))).toBe(true);
  });

  it("labels a squash without a ticket with the session id", async () => {
    const session = await start();
    await stage(session.sessionId, "a.txt", "a\n");
    unwrap(await engine.finalize(session.sessionId, { strategy: "squash" }));
    expect(await subjects(repo, "main", 1)).toEqual([
      `[squash] ${session.sessionId} – 1 staged change`,
    ]);
  });

  it("finalizes an empty session without touching the target", async () => {
    const baseTip = await headId(repo);
    const session = await start();
    const result = unwrap(await engine.finalize(session.sessionId, { strategy: "squash" }));
    expect(result.commitsIntegrated).toBe(0);
    expect(result.mergedCommitId).toBe(baseTip);
    expect(await headId(repo)).toBe(baseTip);
    expect(await branches(repo)).toEqual(["main"]);
  });

  it("finalizes into an explicit target branch", async () => {
    await repo.git.raw(["branch", "release"]);
    const session = await start();
    await stage(session.sessionId, "a.txt", "a\n");
    const result = unwrap(
      await engine.finalize(session.sessionId, { strategy: "merge-ff", targetBranch: "release" }),
    );
    expect(result.baseBranch).toBe("release");
    expect(await headId(repo, "release")).toBe(result.mergedCommitId);
    expect(await subjects(repo, "main")).toEqual(["initial commit"]);

    const missing = await start();
    expect(
      errorCode(await engine.finalize(missing.sessionId, { strategy: "merge", targetBranch: "nope" })),
    ).toBe("INVALID_REQUEST");
  });

  it.each(["merge", "rebase-merge", "squash"] as const)(
    "reports a %s conflict and leaves everything as it was",
    async (strategy) => {
      const session = await start();
      unwrap(
        await engine.stagedWrite(session.sessionId, {
          path: "README.md",
          content: "# staged\n",
          op: "edit",
          summary: "staged edit",
        }),
      );
      const workTip = await headId(repo, session.workBranch);
      const mainTip = await commitFile(repo, "README.md", "# main\n", "main edit");

      const result = await engine.finalize(session.sessionId, { strategy });
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe("FINALIZE_CONFLICT");
      expect(result.error.details["conflicts"]).toEqual(["README.md"]);

      expect(await headId(repo)).toBe(mainTip);
      expect(await headId(repo, session.workBranch)).toBe(workTip);
      expect(await currentBranch(repo)).toBe("main");
      expect(await repo.git.raw(["status", "--porcelain"])).toBe("");
      expect(unwrap(await engine.getSession(session.sessionId)).status).toBe("OPEN");
    },
  );

  it("lets only one of two racing finalizes win", async () => {
    const session = await start();
    await stage(session.sessionId, "a.txt", "a\n");
    const results = await Promise.all([
      engine.finalize(session.sessionId, { strategy: "merge" }),
      engine.finalize(session.sessionId, { strategy: "merge" }),
    ]);
    expect(results.filter((r) => r.ok)).toHaveLength(1);
    expect(results.map(errorCode).filter((c) => c !== undefined)).toEqual([
      "INVALID_SESSION_STATE",
    ]);
  });

  // -------------------------------------------------------------------------
  // Concurrency
  // -------------------------------------------------------------------------

  it("serializes concurrent staged and direct writes", async () => {
    const session = await start();
    const staged = Array.from({ length: 5 }, (_, i) =>
      engine.stagedWrite(session.sessionId, {
        path: `s${i}.txt`,
        content: `${i}\n`,
        op: "add",
        summary: `staged ${i}`,
      }),
    );
    const direct = engine.write(repo.root, {
      path: "direct.txt",
      content: "d\n",
      op: "add",
      summary: "direct",
    });

    const results = await Promise.all([...staged, direct]);
    expect(results.every((r) => r.ok)).toBe(true);
    expect(await subjects(repo, "main")).toEqual(["[add] direct.txt – direct", "initial commit"]);
    expect(await subjects(repo, session.workBranch)).toHaveLength(6);
    expect(await currentBranch(repo)).toBe("main");
    expect(await repo.git.raw(["status", "--porcelain"])).toBe("");
  });

  // -------------------------------------------------------------------------
  // abort / list / prune
  // -------------------------------------------------------------------------

  it("aborts, deleting the work branch, and is idempotent", async () => {
    const session = await start();
    await stage(session.sessionId, "a.txt", "a\n");

    const aborted = unwrap(await engine.abort(session.sessionId));
    expect(aborted.status).toBe("ABORTED");
    expect(aborted.closedAt).toBeDefined();
    expect(await branches(repo)).toEqual(["main"]);

    expect(unwrap(await engine.abort(session.sessionId))).toEqual(aborted);
    const late = await engine.stagedWrite(session.sessionId, {
      path: "b.txt",
      content: "b",
      op: "add",
      summary: "late",
    });
    expect(errorCode(late)).toBe("INVALID_SESSION_STATE");
    expect(errorCode(await engine.finalize(session.sessionId, { strategy: "merge" }))).toBe(
      "INVALID_SESSION_STATE",
    );
  });

  it("leaves the work branch when aborting from it", async () => {
    const session = await start();
    await repo.git.raw(["checkout", "-q", session.workBranch]);
    unwrap(await engine.abort(session.sessionId));
    expect(await currentBranch(repo)).toBe("main");
    expect(await branches(repo)).toEqual(["main"]);
  });

  it("leaves main and its history untouched after start then abort", async () => {
    await commitFile(repo, "base.txt", "base\n", "base commit");
    const logBefore = await repo.git.raw(["log", "--format=%H %s", "main"]);
    const tipBefore = await headId(repo, "main");

    const session = await start("T-9");
    unwrap(await engine.abort(session.sessionId));

    expect(await headId(repo, "main")).toBe(tipBefore);
    expect(await repo.git.raw(["log", "--format=%H %s", "main"])).toBe(logBefore);
    expect(await currentBranch(repo)).toBe("main");
    expect(await branches(repo)).toEqual(["main"]);
  });

  it("tolerates a work branch that is already gone", async () => {
    const session = await start();
    await repo.git.raw(["branch", "-D", session.workBranch]);
    expect(unwrap(await engine.abort(session.sessionId)).status).toBe("ABORTED");
  });

  it("refuses to abort a finalized session", async () => {
    const session = await start();
    unwrap(await engine.finalize(session.sessionId, { strategy: "merge" }));
    expect(errorCode(await engine.abort(session.sessionId))).toBe("INVALID_SESSION_STATE");
  });

  it("reports a staged write's own error when restoring the checkout also fails", async () => {
    const state = { failing: false };
    engine.close();
    engine = testEngine(repo, { vcsFactory: (ref) => new StuckCheckoutVcs(ref.root, state) });

    const session = await start();
    await stage(session.sessionId, "a.txt", "a\n");

    state.failing = true;
    const result = await engine.stagedWrite(session.sessionId, {
      path: "a.txt",
      content: "a\n",
      op: "edit",
      summary: "same",
    });
    expect(errorCode(result)).toBe("NO_CHANGES");
    expect(await currentBranch(repo)).toBe(session.workBranch);

    state.failing = false;
    await repo.git.raw(["checkout", "-q", "main"]);
  });

  it("lists sessions by repository and status", async () => {
    const a = await start("a");
    const b = await start("b");
    unwrap(await engine.abort(a.sessionId));

    const all = unwrap(await engine.listSessions({ repoRoot: repo.root }));
    expect(all.map((s) => s.sessionId).sort()).toEqual([a.sessionId, b.sessionId].sort());
    const open = unwrap(await engine.listSessions({ status: "OPEN" }));
    expect(open.map((s) => s.sessionId)).toEqual([b.sessionId]);
    expect(unwrap(await engine.listSessions({ repoRoot: "/elsewhere" }))).toEqual([]);
  });

  it("prunes only closed sessions past the cutoff", async () => {
    const closed = await start("closed");
    const open = await start("open");
    unwrap(await engine.abort(closed.sessionId));

    expect(unwrap(await engine.pruneSessions({ olderThanMs: 24 * 60 * 60 * 1000 }))).toEqual([]);
    expect(unwrap(await engine.pruneSessions({ olderThanMs: 0 }))).toEqual([closed.sessionId]);
    expect(errorCode(await engine.getSession(closed.sessionId))).toBe("SESSION_NOT_FOUND");
    expect(unwrap(await engine.getSession(open.sessionId)).status).toBe("OPEN");
    expect(errorCode(await engine.pruneSessions({ olderThanMs: -1 }))).toBe("INVALID_REQUEST");
  });
});
