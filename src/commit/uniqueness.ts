import { CommitFsError } from "../core/errors.js";
import type { UniquenessMode } from "../core/schemas.js";
import type { Vcs } from "../vcs/vcs.js";

export const DEFAULT_UNIQUENESS_WINDOW = 100;

/**
 * Compare `subject` against the last `window` subjects reachable from HEAD.
 * Returns the subject to commit with (suffixed in "suffix" mode).
 *
 * @throws CommitFsError NOT_UNIQUE in "reject" mode on an exact match
 */
export async function applyUniqueness(
  vcs: Vcs,
  subject: string,
  mode: UniquenessMode,
  window: number = DEFAULT_UNIQUENESS_WINDOW,
): Promise<string> {
  if (mode === "off") return subject;

  const recent = new Set(
    (await vcs.log({ maxCount: window })).map((entry) => entry.subject),
  );
  if (!recent.has(subject)) return subject;

  if (mode === "reject") {
    throw new CommitFsError(
      `Commit subject repeats one of the last ${window} commits: ${subject}`,
      "NOT_UNIQUE",
      { subject, window },
    );
  }

  let n = 2;
  while (recent.has(`${subject} (#${n})`)) n++;
  return `${subject} (#${n})`;
}
