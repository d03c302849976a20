import { CommitFsError } from "../core/errors.js";
import type { Vcs } from "../vcs/vcs.js";

export const WORK_BRANCH_PREFIX = "commitfs/staged/";

const SLUG_MAX = 40;

/**
 * Ticket → ref-safe slug: lower-cased, runs outside `[a-z0-9._-]` become
 * `-`, no leading/trailing `-` or `.`, no `..`, at most 40 characters.
 */
export function ticketSlug(ticket?: string): string {
  if (!ticket) return "session";
  const trim = (s: string): string => s.replace(/^[-.]+|[-.]+$/g, "");
  const slug = trim(
    trim(
      ticket
        .toLowerCase()
        .replace(/[^a-z0-9._-]+/g, "-")
        .replace(/\.{2,}/g, "."),
    ).slice(0, SLUG_MAX),
  );
  return slug || "session";
}

/** Preferred name first, then the full-id fallback. */
export function workBranchCandidates(
  sessionId: string,
  ticket?: string,
): [string, string] {
  const slug = ticketSlug(ticket);
  return [
    `${WORK_BRANCH_PREFIX}${slug}-${sessionId.slice(0, 8)}`,
    `${WORK_BRANCH_PREFIX}${slug}-${sessionId}`,
  ];
}

/** @throws CommitFsError INVALID_SESSION_STATE when both candidates exist */
export async function chooseWorkBranch(
  vcs: Vcs,
  sessionId: string,
  ticket?: string,
): Promise<string> {
  const candidates = workBranchCandidates(sessionId, ticket);
  for (const name of candidates) {
    if (!(await vcs.branchExists(name))) return name;
  }
  throw new CommitFsError(
    `Work branch names already taken: ${candidates.join(", ")}`,
    "INVALID_SESSION_STATE",
    { sessionId, candidates },
  );
}
