/**
 * Write-commit pipeline: one validated, authorized file change becomes one
 * commit on the checked-out branch, or nothing changes at all.
 *
 *   validate → authorize → clean-tree check → snapshot + atomic write
 *   → stage → uniqueness → commit
 *
 * Request validation and template rendering are pure and finish before
 * the working tree is touched. Every failure after the write restores the
 * file, removes directories the write created and puts back the index
 * entry the path had before the call.
 *
 * Callers hold the repository lock; the pipeline does not take it.
 */

import { join } from "node:path";
import { CommitFsError } from "../core/errors.js";
import type { Logger } from "../core/logger.js";
import type { RepoRef } from "../core/repo.js";
import {
  parseRequest,
  WriteRequestSchema,
  type CommitTemplate,
  type RawPatternLists,
  type UniquenessMode,
  type WriteRequest,
} from "../core/schemas.js";
import { authorizePath, PathAuthorizer } from "../policy/path-authorizer.js";
import { parsePatternLists, type PatternLists } from "../policy/policy-source.js";
import type { IndexEntry, StatusEntry, Vcs } from "../vcs/vcs.js";
import {
  removeFile,
  restoreSnapshot,
  snapshotFile,
  writeFileAtomic,
  type FileSnapshot,
} from "./atomic-write.js";
import { formatMessage, renderTemplate } from "./template.js";
import { applyUniqueness } from "./uniqueness.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface PipelineSettings {
  template: CommitTemplate;
  uniqueness: UniquenessMode;
  uniquenessWindow: number;
  /** Configured call-site lists; a request's own `authorization` replaces them. */
  callSitePatterns?: PatternLists;
  environmentPatterns: PatternLists;
  logger: Logger;
}

export interface CommitResult {
  readonly commitId: string;
  readonly branch: string;
  readonly path: string;
  readonly bytesWritten: number;
  readonly subject: string;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function authorizerFor(
  settings: Pick<PipelineSettings, "callSitePatterns" | "environmentPatterns">,
  override?: RawPatternLists,
): PathAuthorizer {
  const callSite = override
    ? parsePatternLists(override, "call-site")
    : settings.callSitePatterns;
  return PathAuthorizer.fromSources(callSite, settings.environmentPatterns);
}

/** Entries that make the tree dirty for a write to `target`. */
export function blockingChanges(entries: StatusEntry[], target?: string): string[] {
  return entries
    .filter(
      (e) =>
        !(
          e.path === target &&
          (e.index === " " || e.index === "?")
        ),
    )
    .map((e) => e.path)
    .sort();
}

/** @throws CommitFsError DIRTY_TREE listing the offending paths */
export async function requireCleanTree(vcs: Vcs, target?: string): Promise<void> {
  const paths = blockingChanges(await vcs.status(), target);
  if (paths.length > 0) {
    throw new CommitFsError(
      `Working tree has pending changes: ${paths.join(", ")}`,
      "DIRTY_TREE",
      { paths },
    );
  }
}

function toBytes(content: string | Uint8Array): Uint8Array {
  return typeof content === "string" ? Buffer.from(content, "utf8") : content;
}

async function rollback(
  vcs: Vcs,
  path: string,
  snapshot: FileSnapshot,
  indexBefore: IndexEntry | undefined,
  cause: unknown,
  logger: Logger,
): Promise<void> {
  try {
    restoreSnapshot(snapshot);
    await vcs.restoreIndexEntry(path, indexBefore);
  } catch (rollbackError: unknown) {
    logger.error("rollback failed", {
      path,
      error: rollbackError instanceof Error ? rollbackError.message : String(rollbackError),
    });
    throw new Error(
      `Rollback of ${path} failed after: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause: rollbackError },
    );
  }
  logger.warn("rolled back", {
    path,
    code: cause instanceof CommitFsError ? cause.code : undefined,
  });
}

// ---------------------------------------------------------------------------
// Pipeline
// ---------------------------------------------------------------------------

export async function runWritePipeline(
  repo: RepoRef,
  vcs: Vcs,
  settings: PipelineSettings,
  input: unknown,
): Promise<CommitResult> {
  const logger = settings.logger;

  // 0-1. Validate, authorize, render. Nothing touched yet.
  const request: WriteRequest = parseRequest(WriteRequestSchema, input, "write request");
  const path = authorizePath(
    repo.root,
    request.path,
    authorizerFor(settings, request.authorization),
  );
  const message = renderTemplate(request.template ?? settings.template, {
    op: request.op,
    path,
    summary: request.summary,
    reason: request.reason,
  });

  // git refuses to stage an ignored path.
  if (await vcs.isIgnored(path)) {
    throw new CommitFsError(`Path "${path}" is ignored by git`, "PATH_DENIED", {
      path,
      ignored: true,
    });
  }

  // 2. Clean tree.
  if (!request.allowDirty) {
    await requireCleanTree(vcs, path);
  }

  // 3. Snapshot. A tracked file already gone from the tree can still be deleted.
  if (request.op === "delete" && !(await vcs.readFileAt("HEAD", path))) {
    throw new CommitFsError(
      `Cannot delete ${path}: not a committed file`,
      "FILE_NOT_FOUND",
      { path },
    );
  }
  const absPath = join(repo.root, path);
  const snapshot = snapshotFile(absPath);
  const indexBefore = await vcs.indexEntry(path);
  const branch = (await vcs.currentBranch()) ?? "HEAD";

  try {
    // 3. Write.
    let bytesWritten = 0;
    if (request.op === "delete") {
      removeFile(snapshot);
    } else {
      const bytes = toBytes(request.content ?? "");
      writeFileAtomic(snapshot, bytes);
      bytesWritten = bytes.byteLength;
    }

    // 4. Stage.
    await vcs.stage(path);
    if (!(await vcs.hasStagedChanges(path))) {
      throw new CommitFsError(
        `Write to ${path} leaves it identical to HEAD`,
        "NO_CHANGES",
        { path },
      );
    }

    // 5-6. Rendered message, made unique.
    const subject = await applyUniqueness(
      vcs,
      message.subject,
      request.uniqueness ?? settings.uniqueness,
      settings.uniquenessWindow,
    );

    // 7. Commit.
    const commitId = await vcs.commit(
      formatMessage({ subject, body: message.body }),
      { paths: [path] },
    );

    logger.info(`committed ${commitId.slice(0, 7)} on ${branch}: ${subject}`, {
      path,
      op: request.op,
    });
    return Object.freeze({ commitId, branch, path, bytesWritten, subject });
  } catch (e: unknown) {
    // 8. Undo.
    await rollback(vcs, path, snapshot, indexBefore, e, logger);
    throw e;
  }
}
