/**
 * Unified-diff adapter: applies a single-file patch to the committed
 * content of a path and submits the result as one write.
 *
 * Application is exact. Every context and removed line must match the
 * current file at the hunk's position (shifted by the line delta of the
 * hunks before it); there is no fuzz. A mismatch fails INVALID_REQUEST
 * with the 0-based hunk index and nothing is written.
 */

import { z } from "zod";
import type { CommitResult } from "../commit/pipeline.js";
import { CommitFsError } from "../core/errors.js";
import type { RepoRef } from "../core/repo.js";
import { capture, unwrap, type Result } from "../core/result.js";
import { parseRequest, SessionIdSchema } from "../core/schemas.js";
import type { Engine, ReadTarget } from "../engine.js";
import { notCommitted } from "../history/history-reader.js";
import { normalizeRelativePath } from "../policy/path-authorizer.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export const PatchRequestSchema = z
  .object({
    path: z.string().min(1),
    patch: z.string().min(1),
    summary: z.string().min(1).max(500).optional(),
    reason: z.string().max(2000).optional(),
    sessionId: SessionIdSchema.optional(),
  })
  .strict();

export type PatchRequest = z.infer<typeof PatchRequestSchema>;

export interface DiffHunk {
  oldStart: number; // 1-based
  oldCount: number;
  newStart: number; // 1-based
  newCount: number;
  lines: HunkLine[];
}

export interface HunkLine {
  type: "context" | "remove" | "add";
  content: string; // without the prefix character
}

export interface ParsedPatch {
  /** Path from the `---` header, undefined for /dev/null or no header. */
  oldPath?: string;
  /** Path from the `+++` header, undefined for /dev/null or no header. */
  newPath?: string;
  createsFile: boolean;
  deletesFile: boolean;
  hunks: DiffHunk[];
  /** `\ No newline at end of file` seen for the old side. */
  oldMissingEol: boolean;
  /** `\ No newline at end of file` seen for the new side. */
  newMissingEol: boolean;
}

function malformed(reason: string, details: Record<string, unknown> = {}): CommitFsError {
  return new CommitFsError(`Malformed patch: ${reason}`, "INVALID_REQUEST", {
    reason,
    ...details,
  });
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

const HUNK_HEADER_RE = /^@@\s+-(\d+)(?:,(\d+))?\s+\+(\d+)(?:,(\d+))?\s+@@/;

function headerPath(line: string): string | undefined {
  const raw = line.slice(4).split("\t")[0]!.trim();
  if (raw === "/dev/null") return undefined;
  return normalizeRelativePath(raw.replace(/^[ab]\//, ""));
}

export function parseUnifiedDiff(diff: string): ParsedPatch {
  const parsed: ParsedPatch = {
    createsFile: false,
    deletesFile: false,
    hunks: [],
    oldMissingEol: false,
    newMissingEol: false,
  };
  let current: DiffHunk | null = null;
  let last: HunkLine["type"] | null = null;
  let remainingOld = 0;
  let remainingNew = 0;
  let fileHeaders = 0;

  const markMissingEol = (): void => {
    if (last === "remove" || last === "context") parsed.oldMissingEol = true;
    if (last === "add" || last === "context") parsed.newMissingEol = true;
  };

  for (const line of diff.replace(/\r\n/g, "\n").split("\n")) {
    if (current === null || (remainingOld === 0 && remainingNew === 0)) {
      const header = line.match(HUNK_HEADER_RE);
      if (header) {
        current = {
          oldStart: parseInt(header[1]!, 10),
          oldCount: parseInt(header[2] ?? "1", 10),
          newStart: parseInt(header[3]!, 10),
          newCount: parseInt(header[4] ?? "1", 10),
          lines: [],
        };
        parsed.hunks.push(current);
        remainingOld = current.oldCount;
        remainingNew = current.newCount;
        last = null;
      } else if (line.startsWith("--- ")) {
        if (++fileHeaders > 1) throw malformed("patch touches more than one file");
        parsed.oldPath = headerPath(line);
        parsed.createsFile = parsed.oldPath === undefined;
      } else if (line.startsWith("+++ ")) {
        parsed.newPath = headerPath(line);
        parsed.deletesFile = parsed.newPath === undefined;
      } else if (line.startsWith("\\") && current) {
        markMissingEol();
      }
      // `diff --git`, `index` and other extended header lines are skipped.
      continue;
    }

    if (line.startsWith("\\")) {
      markMissingEol();
      continue;
    }

    const prefix = line.charAt(0);
    let type: HunkLine["type"];
    if (prefix === " " || line.length === 0) {
      // Some tools strip the single space of an empty context line.
      type = "context";
    } else if (prefix === "-") {
      type = "remove";
    } else if (prefix === "+") {
      type = "add";
    } else {
      throw malformed(`unexpected line in hunk ${parsed.hunks.length - 1}: ${line}`, {
        hunkIndex: parsed.hunks.length - 1,
      });
    }
    if (type !== "add") remainingOld--;
    if (type !== "remove") remainingNew--;
    if (remainingOld < 0 || remainingNew < 0) {
      throw malformed(`hunk ${parsed.hunks.length - 1} line counts do not match its header`, {
        hunkIndex: parsed.hunks.length - 1,
      });
    }
    current.lines.push({ type, content: line.slice(1) });
    last = type;
  }

  if (parsed.hunks.length === 0) throw malformed("no hunks found");
  if (remainingOld > 0 || remainingNew > 0) {
    throw malformed(`hunk ${parsed.hunks.length - 1} is truncated`, {
      hunkIndex: parsed.hunks.length - 1,
    });
  }
  return parsed;
}

// ---------------------------------------------------------------------------
// Application
// ---------------------------------------------------------------------------

/** Apply every hunk in order; throws INVALID_REQUEST on the first mismatch. */
export function applyHunks(content: string, patch: ParsedPatch): string {
  const hadEol = content.length === 0 || content.endsWith("\n");
  const lines = content.length === 0 ? [] : content.split("\n");
  if (content.endsWith("\n")) lines.pop();

  let offset = 0;
  patch.hunks.forEach((hunk, hunkIndex) => {
    const start = (hunk.oldCount === 0 ? hunk.oldStart : hunk.oldStart - 1) + offset;
    if (start < 0 || start > lines.length) {
      throw new CommitFsError(
        `Hunk ${hunkIndex} starts at line ${hunk.oldStart}, beyond the end of the file`,
        "INVALID_REQUEST",
        { hunkIndex, reason: "start beyond end of file" },
      );
    }

    let cursor = start;
    for (const hunkLine of hunk.lines) {
      if (hunkLine.type === "add") continue;
      const actual = lines[cursor];
      if (actual !== hunkLine.content) {
        const kind = hunkLine.type === "context" ? "Context" : "Removed";
        const reason = `${kind} line mismatch at line ${cursor + 1}: expected "${hunkLine.content}", got ${actual === undefined ? "EOF" : `"${actual}"`}`;
        throw new CommitFsError(`Hunk ${hunkIndex} does not apply: ${reason}`, "INVALID_REQUEST", {
          hunkIndex,
          reason,
        });
      }
      cursor++;
    }

    const replacement = hunk.lines.filter((l) => l.type !== "remove").map((l) => l.content);
    lines.splice(start, cursor - start, ...replacement);
    offset += replacement.length - (cursor - start);
  });

  if (lines.length === 0) return "";
  const eol = patch.newMissingEol ? false : patch.oldMissingEol ? true : hadEol;
  return lines.join("\n") + (eol ? "\n" : "");
}

// ---------------------------------------------------------------------------
// Adapter
// ---------------------------------------------------------------------------

export function applyPatch(
  engine: Engine,
  repo: RepoRef | string,
  input: unknown,
): Promise<Result<CommitResult>> {
  return capture(async () => {
    const req = parseRequest(PatchRequestSchema, input, "patch request");
    const parsed = parseUnifiedDiff(req.patch);
    const path = normalizeRelativePath(req.path);

    const named = parsed.newPath ?? parsed.oldPath;
    if (named !== undefined && named !== path) {
      throw malformed(`patch is for ${named}, not ${path}`, { patchPath: named, path });
    }
    if (parsed.deletesFile) {
      throw malformed("file deletion patches are not applied; write with op delete instead");
    }

    const target: ReadTarget = req.sessionId ? { sessionId: req.sessionId } : { repo };

    const result = await engine.editFile(target, req.path, (current, ref) => {
      let original = "";
      if (!parsed.createsFile) {
        if (!current) throw notCommitted(req.path, ref);
        original = current.content.toString("utf8");
      }
      return {
        path: req.path,
        content: applyHunks(original, parsed),
        op: parsed.createsFile ? "add" : "edit",
        summary:
          req.summary ?? `apply ${parsed.hunks.length} hunk${parsed.hunks.length === 1 ? "" : "s"}`,
        reason: req.reason,
      };
    });
    return unwrap(result);
  });
}
