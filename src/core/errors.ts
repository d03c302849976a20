/**
 * Core error type.
 *
 * Fixed codes, no inheritance games. Expected conditions (dirty tree,
 * denied path, conflicting finalize) are thrown as CommitFsError inside the
 * core and turned into Result values at the engine boundary.
 */

export type CommitFsErrorCode =
  | "PATH_TRAVERSAL"
  | "PATH_DENIED"
  | "DIRTY_TREE"
  | "TEMPLATE_INVALID"
  | "NOT_UNIQUE"
  | "SESSION_NOT_FOUND"
  | "INVALID_SESSION_STATE"
  | "FINALIZE_CONFLICT"
  | "CONCURRENT_MODIFICATION"
  | "LOCK_TIMEOUT"
  | "FILE_NOT_FOUND"
  | "NOT_A_REPOSITORY"
  | "INVALID_REQUEST"
  | "NO_CHANGES";

export class CommitFsError extends Error {
  public readonly code: CommitFsErrorCode;
  public readonly details: Record<string, unknown>;

  constructor(
    message: string,
    code: CommitFsErrorCode,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "CommitFsError";
    this.code = code;
    this.details = details ?? {};
  }
}

export function isCommitFsError(e: unknown): e is CommitFsError {
  return e instanceof CommitFsError;
}
