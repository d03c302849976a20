/**
 * Repository-scoped mutual exclusion.
 *
 * A repository has one working tree, so at most one checkout/mutation
 * sequence may run against it at a time. Every wait is bounded and fails
 * LOCK_TIMEOUT instead of blocking forever.
 *
 *   MemoryRepoLock  FIFO hand-off between callers in this process.
 *   FileRepoLock    MemoryRepoLock plus an exclusive-create lock file, so
 *                   separate processes (CLI invocations) also serialize. A
 *                   lock file older than `staleMs` is treated as left behind
 *                   by a crashed holder and broken.
 */

import { createHash, randomBytes } from "node:crypto";
import { mkdirSync, readFileSync, rmSync, statSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { setTimeout as sleep } from "node:timers/promises";
import { CommitFsError } from "../core/errors.js";
import { silentLogger, type Logger } from "../core/logger.js";

export type Release = () => void;

export interface RepoLock {
  acquire(repoRoot: string, timeoutMs: number): Promise<Release>;
}

function lockTimeout(repoRoot: string, timeoutMs: number): CommitFsError {
  return new CommitFsError(
    `Timed out after ${timeoutMs} ms waiting for the lock on ${repoRoot}`,
    "LOCK_TIMEOUT",
    { repoRoot, timeoutMs },
  );
}

/** Acquire, run `fn`, release on every exit path. */
export async function withRepoLock<T>(
  lock: RepoLock,
  repoRoot: string,
  timeoutMs: number,
  fn: () => Promise<T>,
): Promise<T> {
  const release = await lock.acquire(repoRoot, timeoutMs);
  try {
    return await fn();
  } finally {
    release();
  }
}

// ---------------------------------------------------------------------------
// In-process lock
// ---------------------------------------------------------------------------

interface Waiter {
  grant(): void;
}

export class MemoryRepoLock implements RepoLock {
  private readonly held = new Set<string>();
  private readonly queues = new Map<string, Waiter[]>();

  acquire(repoRoot: string, timeoutMs: number): Promise<Release> {
    if (!this.held.has(repoRoot)) {
      this.held.add(repoRoot);
      return Promise.resolve(this.releaser(repoRoot));
    }

    return new Promise<Release>((resolve, reject) => {
      const queue = this.queues.get(repoRoot) ?? [];
      this.queues.set(repoRoot, queue);

      const waiter: Waiter = {
        grant: () => {
          clearTimeout(timer);
          resolve(this.releaser(repoRoot));
        },
      };
      const timer = setTimeout(() => {
        const at = queue.indexOf(waiter);
        if (at !== -1) queue.splice(at, 1);
        reject(lockTimeout(repoRoot, timeoutMs));
      }, timeoutMs);

      queue.push(waiter);
    });
  }

  /** Number of callers waiting on `repoRoot` (for diagnostics and tests). */
  waiting(repoRoot: string): number {
    return this.queues.get(repoRoot)?.length ?? 0;
  }

  private releaser(repoRoot: string): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = this.queues.get(repoRoot)?.shift();
      if (next) {
        next.grant();
        return;
      }
      this.held.delete(repoRoot);
      this.queues.delete(repoRoot);
    };
  }
}

// ---------------------------------------------------------------------------
// Cross-process lock
// ---------------------------------------------------------------------------

export interface FileRepoLockOptions {
  /** Age after which an existing lock file is considered abandoned. Default 10 min. */
  staleMs?: number;
  /** Poll interval while waiting. Default 25 ms. */
  pollMs?: number;
  logger?: Logger;
}

const DEFAULT_STALE_MS = 10 * 60 * 1000;
const DEFAULT_POLL_MS = 25;

export class FileRepoLock implements RepoLock {
  private readonly lockDir: string;
  private readonly staleMs: number;
  private readonly pollMs: number;
  private readonly logger: Logger;
  private readonly local = new MemoryRepoLock();

  constructor(lockDir: string, options: FileRepoLockOptions = {}) {
    this.lockDir = lockDir;
    this.staleMs = options.staleMs ?? DEFAULT_STALE_MS;
    this.pollMs = options.pollMs ?? DEFAULT_POLL_MS;
    this.logger = options.logger ?? silentLogger;
  }

  /** Lock file path for a repository root. */
  lockPath(repoRoot: string): string {
    const digest = createHash("sha256").update(repoRoot, "utf8").digest("hex");
    return join(this.lockDir, `${digest.slice(0, 32)}.lock`);
  }

  async acquire(repoRoot: string, timeoutMs: number): Promise<Release> {
    const deadline = Date.now() + timeoutMs;
    const releaseLocal = await this.local.acquire(repoRoot, timeoutMs);
    try {
      const releaseFile = await this.acquireFile(repoRoot, deadline, timeoutMs);
      return () => {
        releaseFile();
        releaseLocal();
      };
    } catch (e: unknown) {
      releaseLocal();
      throw e;
    }
  }

  private async acquireFile(
    repoRoot: string,
    deadline: number,
    timeoutMs: number,
  ): Promise<Release> {
    mkdirSync(this.lockDir, { recursive: true });
    const path = this.lockPath(repoRoot);
    const token = randomBytes(16).toString("hex");
    const body = JSON.stringify({
      token,
      pid: process.pid,
      repoRoot,
      acquiredAt: new Date().toISOString(),
    });

    for (;;) {
      try {
        writeFileSync(path, body, { flag: "wx" });
        return () => this.releaseFile(path, token);
      } catch (e: unknown) {
        if ((e as NodeJS.ErrnoException).code !== "EEXIST") throw e;
      }

      if (this.isStale(path)) {
        this.logger.warn("breaking stale lock", { repoRoot, path });
        rmSync(path, { force: true });
        continue;
      }
      if (Date.now() >= deadline) throw lockTimeout(repoRoot, timeoutMs);
      await sleep(this.pollMs);
    }
  }

  private isStale(path: string): boolean {
    try {
      return Date.now() - statSync(path).mtimeMs > this.staleMs;
    } catch (e: unknown) {
      // Released between our create attempt and the stat: retry the create.
      if ((e as NodeJS.ErrnoException).code === "ENOENT") return false;
      throw e;
    }
  }

  private releaseFile(path: string, token: string): void {
    let owner: string | undefined;
    try {
      owner = (JSON.parse(readFileSync(path, "utf8")) as { token?: string }).token;
    } catch (e: unknown) {
      if ((e as NodeJS.ErrnoException).code === "ENOENT") return;
      throw e;
    }
    if (owner === token) {
      rmSync(path, { force: true });
    } else {
      this.logger.warn("lock file no longer ours at release", { path });
    }
  }
}
