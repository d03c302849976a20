/**
 * Result values returned across the engine boundary.
 */

import { CommitFsError, type CommitFsErrorCode } from "./errors.js";

export interface ErrorRecord {
  code: CommitFsErrorCode;
  message: string;
  details: Record<string, unknown>;
}

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: ErrorRecord };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T>(error: CommitFsError): Result<T> {
  return {
    ok: false,
    error: { code: error.code, message: error.message, details: error.details },
  };
}

/**
 * Run `fn` and convert a CommitFsError into a failed Result.
 * Anything else is a contract violation and is rethrown.
 */
export async function capture<T>(fn: () => Promise<T>): Promise<Result<T>> {
  try {
    return ok(await fn());
  } catch (e: unknown) {
    if (e instanceof CommitFsError) return fail(e);
    throw e;
  }
}

/** Unwrap a Result, throwing the CommitFsError it carries. */
export function unwrap<T>(result: Result<T>): T {
  if (result.ok) return result.value;
  throw new CommitFsError(
    result.error.message,
    result.error.code,
    result.error.details,
  );
}
