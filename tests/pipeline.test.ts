import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { runWritePipeline, type PipelineSettings } from "../src/commit/pipeline.js";
import { DEFAULT_TEMPLATE } from "../src/commit/template.js";
import { CommitFsError } from "../src/core/errors.js";
import { createLogger, silentLogger } from "../src/core/logger.js";
import { openRepo, type RepoRef } from "../src/core/repo.js";
import { GitVcs } from "../src/vcs/git-vcs.js";
import { commitFile, createTempRepo, headId, subjects, type TempRepo } from "./helpers/git-repo.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function settings(overrides: Partial<PipelineSettings> = {}): PipelineSettings {
  return {
    template: DEFAULT_TEMPLATE,
    uniqueness: "reject",
    uniquenessWindow: 100,
    environmentPatterns: {},
    logger: silentLogger,
    ...overrides,
  };
}

/** Fails at the commit step, after the write and the stage. */
class FailingCommitVcs extends GitVcs {
  override async commit(): Promise<string> {
    throw new Error("injected commit failure");
  }
}

async function failure(p: Promise<unknown>): Promise<CommitFsError> {
  try {
    await p;
  } catch (e: unknown) {
    if (e instanceof CommitFsError) return e;
    throw e;
  }
  throw new Error("expected a CommitFsError");
}

describe("runWritePipeline", () => {
  let repo: TempRepo;
  let ref: RepoRef;
  let vcs: GitVcs;

  beforeEach(async () => {
    repo = await createTempRepo();
    ref = await openRepo(repo.root);
    vcs = new GitVcs(ref.root);
  });

  afterEach(() => {
    repo.cleanup();
  });

  // -------------------------------------------------------------------------
  // Happy paths
  // -------------------------------------------------------------------------

  it("turns an add into one commit", async () => {
    const result = await runWritePipeline(ref, vcs, settings(), {
      path: "notes/a.txt",
      content: "hello\n",
      op: "add",
      summary: "seed",
    });

    expect(result).toEqual({
      commitId: await headId(repo),
      branch: "main",
      path: "notes/a.txt",
      bytesWritten: 6,
      subject: "[add] notes/a.txt – seed",
    });
    expect(Object.isFrozen(result)).toBe(true);
    expect(readFileSync(join(repo.root, "notes/a.txt"), "utf8")).toBe("hello\n");
    expect(await subjects(repo)).toEqual(["[add] notes/a.txt – seed", "initial commit"]);
    expect(await vcs.status()).toEqual([]);
  });

  it("writes the reason into the body", async () => {
    await runWritePipeline(ref, vcs, settings(), {
      path: "README.md",
      content: "# changed\n",
      op: "edit",
      summary: "retitle",
      reason: "the old title was wrong",
    });
    const message = await repo.git.raw(["log", "-1", "--format=%B"]);
    expect(message.trim()).toBe("[edit] README.md – retitle\n\nthe old title was wrong");
  });

  it("accepts bytes", async () => {
    const result = await runWritePipeline(ref, vcs, settings(), {
      path: "bin.dat",
      content: Uint8Array.from([0, 1, 2, 255]),
      op: "add",
      summary: "bytes",
    });
    expect(result.bytesWritten).toBe(4);
    expect([...readFileSync(join(repo.root, "bin.dat"))]).toEqual([0, 1, 2, 255]);
  });

  it("deletes a committed file", async () => {
    await runWritePipeline(ref, vcs, settings(), {
      path: "README.md",
      op: "delete",
      summary: "drop readme",
    });
    expect(existsSync(join(repo.root, "README.md"))).toBe(false);
    expect(await vcs.readFileAt("HEAD", "README.md")).toBeUndefined();
    expect((await subjects(repo))[0]).toBe("[delete] README.md – drop readme");
  });

  it("logs each commit", async () => {
    const lines: string[] = [];
    const result = await runWritePipeline(
      ref,
      vcs,
      settings({ logger: createLogger("test", "info", (l) => lines.push(l)) }),
      { path: "a.txt", content: "a", op: "add", summary: "seed" },
    );
    expect(lines).toEqual([
      `[test] info committed ${result.commitId.slice(0, 7)} on main: [add] a.txt – seed op=add path=a.txt`,
    ]);
  });

  // -------------------------------------------------------------------------
  // Rejections before any mutation
  // -------------------------------------------------------------------------

  it("validates the request", async () => {
    const err = await failure(
      runWritePipeline(ref, vcs, settings(), { path: "a.txt", op: "add", summary: "x" }),
    );
    expect(err.code).toBe("INVALID_REQUEST");
    expect(err.message).toBe('Invalid write request: content: content is required for op "add"');
  });

  it("validates the template before touching the tree", async () => {
    const err = await failure(
      runWritePipeline(ref, vcs, settings(), {
        path: "a.txt",
        content: "a",
        op: "add",
        summary: "x",
        template: { subject: "{op} {path}" },
      }),
    );
    expect(err.code).toBe("TEMPLATE_INVALID");
    expect(existsSync(join(repo.root, "a.txt"))).toBe(false);
  });

  it("rejects traversal and denied paths", async () => {
    const traversal = await failure(
      runWritePipeline(ref, vcs, settings(), {
        path: "../escape.txt",
        content: "x",
        op: "add",
        summary: "x",
      }),
    );
    expect(traversal.code).toBe("PATH_TRAVERSAL");

    const denied = await failure(
      runWritePipeline(ref, vcs, settings(), {
        path: "config/app.secret",
        content: "x",
        op: "add",
        summary: "x",
        authorization: { deny: ["*.secret"] },
      }),
    );
    expect(denied.code).toBe("PATH_DENIED");
    expect(existsSync(join(repo.root, "config"))).toBe(false);
  });

  it("refuses a dirty tree and lists the offending paths", async () => {
    writeFileSync(join(repo.root, "README.md"), "dirty\n");
    writeFileSync(join(repo.root, "stray.txt"), "stray\n");
    const err = await failure(
      runWritePipeline(ref, vcs, settings(), {
        path: "a.txt",
        content: "a",
        op: "add",
        summary: "x",
      }),
    );
    expect(err.code).toBe("DIRTY_TREE");
    expect(err.details["paths"]).toEqual(["README.md", "stray.txt"]);
    expect(existsSync(join(repo.root, "a.txt"))).toBe(false);
  });

  it("ignores an unstaged change to the target itself", async () => {
    writeFileSync(join(repo.root, "README.md"), "half-done\n");
    await runWritePipeline(ref, vcs, settings(), {
      path: "README.md",
      content: "# done\n",
      op: "edit",
      summary: "finish",
    });
    expect(await vcs.status()).toEqual([]);
  });

  it("commits only the target when allowDirty is set", async () => {
    writeFileSync(join(repo.root, "README.md"), "dirty\n");
    await runWritePipeline(ref, vcs, settings(), {
      path: "a.txt",
      content: "a",
      op: "add",
      summary: "x",
      allowDirty: true,
    });
    expect(await vcs.readFileAt("HEAD", "a.txt")).toBeDefined();
    expect((await vcs.readFileAt("HEAD", "README.md"))?.toString("utf8")).toBe("# test\n");
    expect(readFileSync(join(repo.root, "README.md"), "utf8")).toBe("dirty\n");
  });

  it("fails FILE_NOT_FOUND deleting a file HEAD does not have", async () => {
    const missing = await failure(
      runWritePipeline(ref, vcs, settings(), { path: "nope.txt", op: "delete", summary: "x" }),
    );
    expect(missing.code).toBe("FILE_NOT_FOUND");

    writeFileSync(join(repo.root, "untracked.txt"), "u");
    const untracked = await failure(
      runWritePipeline(ref, vcs, settings(), {
        path: "untracked.txt",
        op: "delete",
        summary: "x",
      }),
    );
    expect(untracked.code).toBe("FILE_NOT_FOUND");
    expect(existsSync(join(repo.root, "untracked.txt"))).toBe(true);
  });

  it("deletes a committed file already missing from the tree", async () => {
    rmSync(join(repo.root, "README.md"));
    await runWritePipeline(ref, vcs, settings(), {
      path: "README.md",
      op: "delete",
      summary: "gone",
    });
    expect((await subjects(repo))[0]).toBe("[delete] README.md – gone");
    expect(await vcs.readFileAt("HEAD", "README.md")).toBeUndefined();
    expect(await vcs.status()).toEqual([]);
  });

  it("refuses a path git ignores before writing it", async () => {
    await commitFile(repo, ".gitignore", "build/\n", "ignore build");
    const before = await headId(repo);
    const err = await failure(
      runWritePipeline(ref, vcs, settings(), {
        path: "build/out.txt",
        content: "o",
        op: "add",
        summary: "x",
      }),
    );
    expect(err.code).toBe("PATH_DENIED");
    expect(err.message).toBe('Path "build/out.txt" is ignored by git');
    expect(err.details).toEqual({ path: "build/out.txt", ignored: true });
    expect(existsSync(join(repo.root, "build"))).toBe(false);
    expect(await headId(repo)).toBe(before);
  });

  // -------------------------------------------------------------------------
  // Failures after the write roll back
  // -------------------------------------------------------------------------

  it("fails NO_CHANGES when the content equals HEAD", async () => {
    const before = await headId(repo);
    const lines: string[] = [];
    const err = await failure(
      runWritePipeline(
        ref,
        vcs,
        settings({ logger: createLogger("test", "warn", (l) => lines.push(l)) }),
        { path: "README.md", content: "# test\n", op: "edit", summary: "noop" },
      ),
    );
    expect(err.code).toBe("NO_CHANGES");
    expect(await headId(repo)).toBe(before);
    expect(await vcs.status()).toEqual([]);
    expect(lines).toEqual(["[test] warn rolled back code=NO_CHANGES path=README.md"]);
  });

  it("restores an edited file when the commit fails", async () => {
    const failing = new FailingCommitVcs(ref.root);
    const before = await headId(repo);
    await expect(
      runWritePipeline(ref, failing, settings(), {
        path: "README.md",
        content: "# lost\n",
        op: "edit",
        summary: "x",
      }),
    ).rejects.toThrow("injected commit failure");

    expect(readFileSync(join(repo.root, "README.md"), "utf8")).toBe("# test\n");
    expect(await headId(repo)).toBe(before);
    expect(await vcs.status()).toEqual([]);
  });

  it("removes created directories when the commit fails", async () => {
    const failing = new FailingCommitVcs(ref.root);
    await expect(
      runWritePipeline(ref, failing, settings(), {
        path: "deep/nested/new.txt",
        content: "x",
        op: "add",
        summary: "x",
      }),
    ).rejects.toThrow("injected commit failure");

    expect(existsSync(join(repo.root, "deep"))).toBe(false);
    expect(await vcs.status()).toEqual([]);
  });

  it("restores a deleted file when the commit fails", async () => {
    const failing = new FailingCommitVcs(ref.root);
    await expect(
      runWritePipeline(ref, failing, settings(), { path: "README.md", op: "delete", summary: "x" }),
    ).rejects.toThrow("injected commit failure");
    expect(readFileSync(join(repo.root, "README.md"), "utf8")).toBe("# test\n");
    expect(await vcs.status()).toEqual([]);
  });

  // -------------------------------------------------------------------------
  // Uniqueness
  // -------------------------------------------------------------------------

  it("rejects a repeated subject by default and rolls back", async () => {
    await commitFile(repo, "a.txt", "1\n", "seed a");
    await runWritePipeline(ref, vcs, settings(), {
      path: "a.txt",
      content: "2\n",
      op: "edit",
      summary: "same",
    });
    const err = await failure(
      runWritePipeline(ref, vcs, settings(), {
        path: "a.txt",
        content: "3\n",
        op: "edit",
        summary: "same",
      }),
    );
    expect(err.code).toBe("NOT_UNIQUE");
    expect(err.details).toEqual({ subject: "[edit] a.txt – same", window: 100 });
    expect(readFileSync(join(repo.root, "a.txt"), "utf8")).toBe("2\n");
  });

  it("puts back the caller's staged entry for the target on rollback", async () => {
    await commitFile(repo, "a.txt", "v1\n", "[edit] a.txt – dup");
    writeFileSync(join(repo.root, "a.txt"), "staged-by-user\n");
    await repo.git.add("a.txt");
    const stagedBefore = await repo.git.raw(["diff", "--cached", "--", "a.txt"]);
    expect(stagedBefore).toContain("+staged-by-user");

    const err = await failure(
      runWritePipeline(ref, vcs, settings(), {
        path: "a.txt",
        content: "mine\n",
        op: "edit",
        summary: "dup",
        allowDirty: true,
      }),
    );
    expect(err.code).toBe("NOT_UNIQUE");
    expect(await repo.git.raw(["diff", "--cached", "--", "a.txt"])).toBe(stagedBefore);
    expect(readFileSync(join(repo.root, "a.txt"), "utf8")).toBe("staged-by-user\n");
  });

  it("numbers repeats in suffix mode", async () => {
    await commitFile(repo, "a.txt", "1\n", "seed a");
    const write = (content: string) =>
      runWritePipeline(ref, vcs, settings({ uniqueness: "suffix" }), {
        path: "a.txt",
        content,
        op: "edit",
        summary: "same",
      });
    expect((await write("2\n")).subject).toBe("[edit] a.txt – same");
    expect((await write("3\n")).subject).toBe("[edit] a.txt – same (#2)");
    expect((await write("4\n")).subject).toBe("[edit] a.txt – same (#3)");
  });

  it("only looks back over the configured window", async () => {
    await commitFile(repo, "a.txt", "1\n", "seed a");
    const s = settings({ uniquenessWindow: 1 });
    await runWritePipeline(ref, vcs, s, { path: "a.txt", content: "2\n", op: "edit", summary: "same" });
    await commitFile(repo, "b.txt", "b\n", "unrelated");
    const result = await runWritePipeline(ref, vcs, s, {
      path: "a.txt",
      content: "3\n",
      op: "edit",
      summary: "same",
    });
    expect(result.subject).toBe("[edit] a.txt – same");
  });

  it("skips the check when uniqueness is off", async () => {
    await commitFile(repo, "a.txt", "1\n", "seed a");
    const s = settings({ uniqueness: "off" });
    await runWritePipeline(ref, vcs, s, { path: "a.txt", content: "2\n", op: "edit", summary: "same" });
    const result = await runWritePipeline(ref, vcs, s, {
      path: "a.txt",
      content: "3\n",
      op: "edit",
      summary: "same",
    });
    expect(result.subject).toBe("[edit] a.txt – same");
  });
});
