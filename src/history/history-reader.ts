/**
 * History-aware reads: a file's committed content plus the commits that
 * touched it. Read-only; gated by the same authorizer as writes.
 */

import { z } from "zod";
import { CommitFsError } from "../core/errors.js";
import type { RepoRef } from "../core/repo.js";
import { parseRequest } from "../core/schemas.js";
import { authorizePath, type PathAuthorizer } from "../policy/path-authorizer.js";
import type { LogEntry, Vcs } from "../vcs/vcs.js";

export const DEFAULT_HISTORY_LIMIT = 10;

export type HistoryEntry = LogEntry;

export interface FileWithHistory {
  path: string;
  /** Commit the content was read from. */
  commitId: string;
  content: Buffer;
  /** Most recent first. */
  history: HistoryEntry[];
}

const LimitSchema = z.number().int().positive().max(10_000);

export interface CommittedFile {
  path: string;
  ref: string;
  commitId: string;
  content: Buffer;
}

/**
 * Derives a write request from a file's committed state at `ref`;
 * `current` is undefined when the file is not committed there.
 */
export type FileEdit = (current: CommittedFile | undefined, ref: string) => unknown;

export function notCommitted(path: string, ref: string): CommitFsError {
  return new CommitFsError(`No committed file ${path} at ${ref}`, "FILE_NOT_FOUND", {
    path,
    ref,
  });
}

export async function findCommittedFile(
  vcs: Vcs,
  ref: string,
  path: string,
): Promise<CommittedFile | undefined> {
  const commitId = await vcs.resolveCommit(ref);
  const content = commitId ? await vcs.readFileAt(commitId, path) : undefined;
  if (!commitId || !content) return undefined;
  return { path, ref, commitId, content };
}

/** Blob at `ref`, or FILE_NOT_FOUND. */
export async function readCommittedFile(
  vcs: Vcs,
  ref: string,
  path: string,
): Promise<CommittedFile> {
  const file = await findCommittedFile(vcs, ref, path);
  if (!file) throw notCommitted(path, ref);
  return file;
}

/**
 * @throws CommitFsError PATH_TRAVERSAL / PATH_DENIED / FILE_NOT_FOUND / INVALID_REQUEST
 */
export async function readWithHistory(
  repo: RepoRef,
  vcs: Vcs,
  authorizer: PathAuthorizer,
  path: string,
  limit: number = DEFAULT_HISTORY_LIMIT,
): Promise<FileWithHistory> {
  const maxCount = parseRequest(LimitSchema, limit, "history limit");
  const relPath = authorizePath(repo.root, path, authorizer);
  const { commitId, content } = await readCommittedFile(vcs, "HEAD", relPath);
  const history = await vcs.log({ range: commitId, path: relPath, maxCount });
  return { path: relPath, commitId, content, history };
}
