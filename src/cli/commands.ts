/**
 * CLI command implementations.
 *
 * Every function:
 *   - accepts parsed arguments
 *   - calls the engine or an adapter (no business logic here)
 *   - writes to stdout / stderr
 *   - returns an exit code (0 = success, 1 = error)
 */

import { existsSync, mkdirSync } from "node:fs";
import { join, resolve } from "node:path";
import { applyPatch } from "../adapters/patch.js";
import { replaceInFile } from "../adapters/replace.js";
import { lintTemplate } from "../commit/template.js";
import { ensureDataDirs, type CommitFsConfig } from "../config.js";
import { canonicalJson } from "../core/canonical.js";
import { createLogger } from "../core/logger.js";
import {
  CommitTemplateSchema,
  OperationSchema,
  UniquenessModeSchema,
  type CommitTemplate,
  type Operation,
  type RawPatternLists,
} from "../core/schemas.js";
import { createEngine, type Engine } from "../engine.js";
import { describePolicy, resolvePolicy } from "../policy/policy-source.js";
import { SqliteSessionStore } from "../session/session-store.js";
import { initRepository } from "../vcs/git-vcs.js";
import { intFlag, patternFlags, readContent, requireFlag } from "./args.js";
import { err, out, report, shortId } from "./output.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export const DEFAULT_SUMMARY = "update";

export async function withEngine(
  config: CommitFsConfig,
  authorization: RawPatternLists | undefined,
  fn: (engine: Engine) => Promise<number>,
): Promise<number> {
  ensureDataDirs(config);
  const engine = createEngine({
    config,
    authorization,
    logger: createLogger("commitfs", config.logLevel),
  });
  try {
    return await fn(engine);
  } finally {
    engine.close();
  }
}

/** --op, checked; undefined means "pick from whether the file exists". */
export function opFlag(flags: Map<string, string>): Operation | undefined | null {
  const raw = flags.get("op");
  if (raw === undefined) return undefined;
  const parsed = OperationSchema.safeParse(raw);
  if (!parsed.success) {
    err(`--op must be add, edit or delete, got "${raw}"`);
    return null;
  }
  return parsed.data;
}

/** --subject / --body as a template override. */
export function templateFlags(flags: Map<string, string>): CommitTemplate | undefined | null {
  const subject = flags.get("subject");
  if (subject === undefined) return undefined;
  const parsed = CommitTemplateSchema.safeParse({ subject, body: flags.get("body") });
  if (!parsed.success) {
    err(`invalid template: ${parsed.error.issues.map((i) => i.message).join("; ")}`);
    return null;
  }
  return parsed.data;
}

// ---------------------------------------------------------------------------
// init
// ---------------------------------------------------------------------------

export async function cmdInit(dir: string, config: CommitFsConfig): Promise<number> {
  const root = resolve(dir);
  mkdirSync(root, { recursive: true });
  await initRepository(root);
  ensureDataDirs(config);
  // Opening the store creates the DB + tables if not present
  new SqliteSessionStore(config.dbPath).close();
  out(`Initialized repository at ${root}`);
  out(`  State:    ${config.baseDir}`);
  out(`  Sessions: ${config.dbPath}`);
  return 0;
}

// ---------------------------------------------------------------------------
// config show
// ---------------------------------------------------------------------------

export function cmdConfigShow(config: CommitFsConfig, json: boolean): number {
  const patterns = describePolicy(resolvePolicy(undefined, config.environmentPatterns));
  if (json) {
    const { environmentPatterns: _omit, ...rest } = config;
    out(canonicalJson({ ...rest, patterns }, 2));
  } else {
    out(`baseDir:          ${config.baseDir}`);
    out(`dbPath:           ${config.dbPath}`);
    out(`lockDir:          ${config.lockDir}`);
    out(`lockTimeoutMs:    ${config.lockTimeoutMs}`);
    out(`uniquenessWindow: ${config.uniquenessWindow}`);
    out(`logLevel:         ${config.logLevel}`);
    out(`allow:            ${patterns.allow.join(", ") || "(everything)"}`);
    out(`deny:             ${patterns.deny.join(", ") || "(nothing)"}`);
  }
  return 0;
}

// ---------------------------------------------------------------------------
// write
// ---------------------------------------------------------------------------

export async function cmdWrite(
  flags: Map<string, string>,
  config: CommitFsConfig,
  json: boolean,
): Promise<number> {
  const repo = requireFlag(flags, "repo");
  if (!repo) return 1;
  const path = requireFlag(flags, "path");
  if (!path) return 1;
  const explicitOp = opFlag(flags);
  if (explicitOp === null) return 1;
  const template = templateFlags(flags);
  if (template === null) return 1;
  const uniqueness = flags.get("unique");
  if (uniqueness !== undefined && !UniquenessModeSchema.safeParse(uniqueness).success) {
    err(`--unique must be reject, suffix or off, got "${uniqueness}"`);
    return 1;
  }

  const op = explicitOp ?? (existsSync(join(resolve(repo), path)) ? "edit" : "add");
  const content = op === "delete" ? undefined : await readContent(flags);

  return withEngine(config, patternFlags(flags), async (engine) => {
    const result = await engine.write(repo, {
      path,
      content,
      op,
      summary: flags.get("summary") ?? DEFAULT_SUMMARY,
      reason: flags.get("reason"),
      uniqueness,
      allowDirty: flags.has("allow-dirty") ? true : undefined,
      template,
    });
    return report(result, json, (r) =>
      out(`committed ${shortId(r.commitId)} on ${r.branch}: ${r.subject}`),
    );
  });
}

// ---------------------------------------------------------------------------
// replace / patch
// ---------------------------------------------------------------------------

export async function cmdReplace(
  flags: Map<string, string>,
  config: CommitFsConfig,
  json: boolean,
): Promise<number> {
  const repo = requireFlag(flags, "repo");
  if (!repo) return 1;
  const path = requireFlag(flags, "path");
  if (!path) return 1;
  const search = requireFlag(flags, "search");
  if (!search) return 1;
  const replace = flags.get("replace");
  if (replace === undefined) {
    err("missing required flag: --replace");
    return 1;
  }

  return withEngine(config, patternFlags(flags), async (engine) => {
    const result = await replaceInFile(engine, repo, {
      path,
      search,
      replace,
      regex: flags.has("regex") ? true : undefined,
      summary: flags.get("summary"),
      sessionId: flags.get("session"),
    });
    return report(result, json, (r) =>
      out(`committed ${shortId(r.commitId)} on ${r.branch}: ${r.subject}`),
    );
  });
}

export async function cmdPatch(
  flags: Map<string, string>,
  config: CommitFsConfig,
  json: boolean,
): Promise<number> {
  const repo = requireFlag(flags, "repo");
  if (!repo) return 1;
  const path = requireFlag(flags, "path");
  if (!path) return 1;
  const patch = (await readContent(flags)).toString("utf8");

  return withEngine(config, patternFlags(flags), async (engine) => {
    const result = await applyPatch(engine, repo, {
      path,
      patch,
      summary: flags.get("summary"),
      sessionId: flags.get("session"),
    });
    return report(result, json, (r) =>
      out(`committed ${shortId(r.commitId)} on ${r.branch}: ${r.subject}`),
    );
  });
}

// ---------------------------------------------------------------------------
// history
// ---------------------------------------------------------------------------

export async function cmdHistory(
  flags: Map<string, string>,
  config: CommitFsConfig,
  json: boolean,
): Promise<number> {
  const repo = requireFlag(flags, "repo");
  if (!repo) return 1;
  const path = requireFlag(flags, "path");
  if (!path) return 1;
  const limit = intFlag(flags, "limit");
  if (limit === null) return 1;

  return withEngine(config, patternFlags(flags), async (engine) => {
    const result = await engine.readWithHistory(repo, path, limit);
    return report(result, json, (r) => {
      out(`${r.path} @ ${shortId(r.commitId)} (${r.content.byteLength} bytes)`);
      for (const entry of r.history) {
        out(`  ${shortId(entry.commitId)} ${entry.timestamp} ${entry.author}  ${entry.subject}`);
      }
    });
  });
}

// ---------------------------------------------------------------------------
// lint
// ---------------------------------------------------------------------------

export function cmdLint(flags: Map<string, string>, json: boolean): number {
  const template = templateFlags(flags);
  if (template === null) return 1;
  if (template === undefined) {
    err("missing required flag: --subject");
    return 1;
  }
  const lint = lintTemplate(template, {
    op: flags.get("op") ?? "",
    path: flags.get("path") ?? "",
    summary: flags.get("summary") ?? "",
    reason: flags.get("reason"),
  });

  if (json) {
    out(canonicalJson(lint, 2));
  } else if (lint.ok) {
    out("template ok");
  } else {
    for (const problem of lint.problems) out(`problem: ${problem}`);
  }
  return lint.ok ? 0 : 1;
}
