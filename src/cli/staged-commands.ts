/**
 * CLI command implementations for staged sessions.
 *
 * Same contract as commands.ts: parsed arguments in, one engine call,
 * output, exit code.
 */

import { canonicalJson } from "../core/canonical.js";
import type { CommitFsConfig } from "../config.js";
import {
  FinalizeStrategySchema,
  SessionStatusSchema,
  type StagedSession,
} from "../core/schemas.js";
import { intFlag, readContent, requireFlag } from "./args.js";
import { DEFAULT_SUMMARY, opFlag, templateFlags, withEngine } from "./commands.js";
import { err, out, report, shortId } from "./output.js";

const DAY_MS = 24 * 60 * 60 * 1000;

function describeSession(s: StagedSession): string {
  return `${s.sessionId}  ${s.status.padEnd(9)}  ${s.workBranch}  (base ${s.baseBranch}, ${s.repoRoot})`;
}

// ---------------------------------------------------------------------------
// staged start
// ---------------------------------------------------------------------------

export async function cmdStagedStart(
  flags: Map<string, string>,
  config: CommitFsConfig,
  json: boolean,
): Promise<number> {
  const repo = requireFlag(flags, "repo");
  if (!repo) return 1;

  return withEngine(config, undefined, async (engine) => {
    const result = await engine.startSession(repo, flags.get("ticket"));
    return report(result, json, (s) => {
      out(`session ${s.sessionId} opened on ${s.workBranch} (base ${s.baseBranch})`);
    });
  });
}

// ---------------------------------------------------------------------------
// staged write
// ---------------------------------------------------------------------------

export async function cmdStagedWrite(
  flags: Map<string, string>,
  config: CommitFsConfig,
  json: boolean,
): Promise<number> {
  const sessionId = requireFlag(flags, "session");
  if (!sessionId) return 1;
  const path = requireFlag(flags, "path");
  if (!path) return 1;
  const explicitOp = opFlag(flags);
  if (explicitOp === null) return 1;
  const template = templateFlags(flags);
  if (template === null) return 1;

  const content = explicitOp === "delete" ? undefined : await readContent(flags);

  return withEngine(config, undefined, async (engine) => {
    let op = explicitOp;
    if (op === undefined) {
      const existing = await engine.readFile({ sessionId }, path);
      op = existing.ok ? "edit" : "add";
    }
    const result = await engine.stagedWrite(sessionId, {
      path,
      content,
      op,
      summary: flags.get("summary") ?? DEFAULT_SUMMARY,
      reason: flags.get("reason"),
      uniqueness: flags.get("unique"),
      template,
    });
    return report(result, json, (r) =>
      out(`staged ${shortId(r.commitId)} on ${r.branch}: ${r.subject}`),
    );
  });
}

// ---------------------------------------------------------------------------
// staged preview
// ---------------------------------------------------------------------------

const CHANGE_LETTER: Record<string, string> = {
  added: "A",
  modified: "M",
  deleted: "D",
  "type-changed": "T",
};

export async function cmdStagedPreview(
  flags: Map<string, string>,
  config: CommitFsConfig,
  json: boolean,
): Promise<number> {
  const sessionId = requireFlag(flags, "session");
  if (!sessionId) return 1;

  return withEngine(config, undefined, async (engine) => {
    const result = await engine.preview(sessionId);
    return report(result, json, (p) => {
      out(`session ${p.sessionId}: ${p.workBranch} → ${p.baseBranch}`);
      out(`commits (${p.commits.length}):`);
      for (const c of p.commits) out(`  ${shortId(c.commitId)} ${c.subject}`);
      out(`files (${p.files.length}):`);
      for (const f of p.files) out(`  ${CHANGE_LETTER[f.change] ?? "?"} ${f.path}`);
      if (p.diff) {
        out("");
        process.stdout.write(p.diff.endsWith("\n") ? p.diff : p.diff + "\n");
      }
    });
  });
}

// ---------------------------------------------------------------------------
// staged finalize / abort
// ---------------------------------------------------------------------------

export async function cmdStagedFinalize(
  flags: Map<string, string>,
  config: CommitFsConfig,
  json: boolean,
): Promise<number> {
  const sessionId = requireFlag(flags, "session");
  if (!sessionId) return 1;
  const strategy = FinalizeStrategySchema.safeParse(flags.get("strategy") ?? "merge");
  if (!strategy.success) {
    err(`--strategy must be merge, merge-ff, rebase-merge or squash, got "${flags.get("strategy")}"`);
    return 1;
  }

  return withEngine(config, undefined, async (engine) => {
    const result = await engine.finalize(sessionId, {
      strategy: strategy.data,
      targetBranch: flags.get("target"),
    });
    return report(result, json, (r) => {
      out(
        `finalized ${r.sessionId} into ${r.baseBranch} via ${r.strategy}: ` +
          `${shortId(r.mergedCommitId)} (${r.commitsIntegrated} commit${r.commitsIntegrated === 1 ? "" : "s"})`,
      );
    });
  });
}

export async function cmdStagedAbort(
  flags: Map<string, string>,
  config: CommitFsConfig,
  json: boolean,
): Promise<number> {
  const sessionId = requireFlag(flags, "session");
  if (!sessionId) return 1;

  return withEngine(config, undefined, async (engine) => {
    const result = await engine.abort(sessionId);
    return report(result, json, (s) => out(`session ${s.sessionId} ${s.status.toLowerCase()}`));
  });
}

// ---------------------------------------------------------------------------
// staged list / prune
// ---------------------------------------------------------------------------

export async function cmdStagedList(
  flags: Map<string, string>,
  config: CommitFsConfig,
  json: boolean,
): Promise<number> {
  const status = flags.get("status");
  const parsedStatus = status === undefined ? undefined : SessionStatusSchema.safeParse(status);
  if (parsedStatus && !parsedStatus.success) {
    err(`--status must be OPEN, PREVIEWED, FINALIZED or ABORTED, got "${status}"`);
    return 1;
  }
  const repo = flags.get("repo");

  return withEngine(config, undefined, async (engine) => {
    let repoRoot: string | undefined;
    if (repo !== undefined) {
      const root = await engine.resolveRepo(repo);
      if (!root.ok) return report(root, json, () => undefined);
      repoRoot = root.value.root;
    }
    const result = await engine.listSessions({ repoRoot, status: parsedStatus?.data });
    return report(result, json, (sessions) => {
      if (sessions.length === 0) out("no sessions");
      for (const s of sessions) out(describeSession(s));
    });
  });
}

export async function cmdStagedPrune(
  flags: Map<string, string>,
  config: CommitFsConfig,
  json: boolean,
): Promise<number> {
  const days = intFlag(flags, "older-than-days");
  if (days === null) return 1;
  if (days === undefined) {
    err("missing required flag: --older-than-days");
    return 1;
  }

  return withEngine(config, undefined, async (engine) => {
    const result = await engine.pruneSessions({ olderThanMs: days * DAY_MS });
    if (json && result.ok) {
      out(canonicalJson({ pruned: result.value }, 2));
      return 0;
    }
    return report(result, json, (ids) => {
      out(`pruned ${ids.length} session${ids.length === 1 ? "" : "s"}`);
    });
  });
}
