/**
 * Search-and-replace adapter: edits one committed file and submits the
 * result as an `edit` write, directly or into a staged session. The read
 * and the write happen under one hold of the repository lock.
 */

import { z } from "zod";
import type { CommitResult } from "../commit/pipeline.js";
import { CommitFsError } from "../core/errors.js";
import type { RepoRef } from "../core/repo.js";
import { capture, unwrap, type Result } from "../core/result.js";
import { parseRequest, SessionIdSchema } from "../core/schemas.js";
import type { Engine, ReadTarget } from "../engine.js";
import { notCommitted } from "../history/history-reader.js";

export const ReplaceRequestSchema = z
  .object({
    path: z.string().min(1),
    search: z.string().min(1),
    replace: z.string(),
    regex: z.boolean().optional(),
    summary: z.string().min(1).max(500).optional(),
    reason: z.string().max(2000).optional(),
    sessionId: SessionIdSchema.optional(),
  })
  .strict();

export type ReplaceRequest = z.infer<typeof ReplaceRequestSchema>;

export interface Replacement {
  text: string;
  count: number;
}

/** Replace every occurrence; regex mode always uses the global flag. */
export function replaceAllOccurrences(
  text: string,
  search: string,
  replace: string,
  regex = false,
): Replacement {
  if (!regex) {
    const parts = text.split(search);
    return { text: parts.join(replace), count: parts.length - 1 };
  }

  let pattern: RegExp;
  try {
    pattern = new RegExp(search, "g");
  } catch (e: unknown) {
    throw new CommitFsError(
      `Invalid search regex "${search}": ${(e as Error).message}`,
      "INVALID_REQUEST",
      { search },
    );
  }
  const count = text.match(pattern)?.length ?? 0;
  return { text: text.replace(pattern, replace), count };
}

export function replaceInFile(
  engine: Engine,
  repo: RepoRef | string,
  input: unknown,
): Promise<Result<CommitResult>> {
  return capture(async () => {
    const req = parseRequest(ReplaceRequestSchema, input, "replace request");
    const target: ReadTarget = req.sessionId ? { sessionId: req.sessionId } : { repo };

    const result = await engine.editFile(target, req.path, (current, ref) => {
      if (!current) throw notCommitted(req.path, ref);
      const { text, count } = replaceAllOccurrences(
        current.content.toString("utf8"),
        req.search,
        req.replace,
        req.regex,
      );
      if (count === 0) {
        throw new CommitFsError(`No occurrence of the search text in ${current.path}`, "NO_CHANGES", {
          path: current.path,
          search: req.search,
        });
      }
      return {
        path: req.path,
        content: text,
        op: "edit",
        summary: req.summary ?? `replace ${count} occurrence${count === 1 ? "" : "s"}`,
        reason: req.reason,
      };
    });
    return unwrap(result);
  });
}
