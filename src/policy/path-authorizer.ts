/**
 * Path authorization.
 *
 * Two independent gates, always applied in this order:
 *
 *   1. isWithinRoot: the traversal check. Unconditional; no pattern can
 *      turn it off. Absolute paths, `..` escapes, symlinked escapes and the
 *      repository's own `.git` directory are rejected.
 *   2. PathAuthorizer.isAllowed: deny patterns first, then the allow list
 *      (an empty allow list allows everything not denied).
 */

import { existsSync, realpathSync } from "node:fs";
import { dirname, isAbsolute, relative, resolve, sep } from "node:path";
import { CommitFsError } from "../core/errors.js";
import { compileGlob } from "./glob.js";
import {
  describePolicy,
  resolvePolicy,
  type PathAuthorizationPolicy,
  type PatternEntry,
  type PatternLists,
} from "./policy-source.js";

const WINDOWS_ABSOLUTE_RE = /^(?:[A-Za-z]:[\\/]|\\\\)/;

// ---------------------------------------------------------------------------
// Normalization and traversal
// ---------------------------------------------------------------------------

/**
 * Normalize to root-relative POSIX form: backslashes become `/`, empty and
 * `.` segments are dropped, `..` pops a segment.
 */
export function normalizeRelativePath(path: string): string {
  const out: string[] = [];
  for (const part of path.replace(/\\/g, "/").split("/")) {
    if (part === "" || part === ".") continue;
    if (part === "..") {
      out.pop();
      continue;
    }
    out.push(part);
  }
  return out.join("/");
}

function isInside(root: string, candidate: string): boolean {
  const rel = relative(root, candidate);
  return (
    rel !== "" && rel !== ".." && !rel.startsWith(".." + sep) && !isAbsolute(rel)
  );
}

/** Nearest existing ancestor of `absPath` (or the path itself). */
function nearestExisting(absPath: string): string {
  let current = absPath;
  while (!existsSync(current)) {
    const parent = dirname(current);
    if (parent === current) return current;
    current = parent;
  }
  return current;
}

export function isWithinRoot(root: string, candidate: string): boolean {
  if (candidate.trim().length === 0) return false;
  if (isAbsolute(candidate) || WINDOWS_ABSOLUTE_RE.test(candidate)) return false;

  const rootAbs = resolve(root);
  const target = resolve(rootAbs, candidate.replace(/\\/g, "/"));
  if (!isInside(rootAbs, target)) return false;

  const firstSegment = relative(rootAbs, target).split(sep)[0];
  if (firstSegment === ".git") return false;

  let realRoot: string;
  let realExisting: string;
  try {
    realRoot = realpathSync(rootAbs);
    realExisting = realpathSync(nearestExisting(target));
  } catch {
    return false;
  }
  return realExisting === realRoot || isInside(realRoot, realExisting);
}

// ---------------------------------------------------------------------------
// Pattern evaluation
// ---------------------------------------------------------------------------

interface CompiledEntry {
  entry: PatternEntry;
  test(path: string): boolean;
}

function compileEntry(entry: PatternEntry): CompiledEntry {
  if (entry.kind === "regex") {
    let re: RegExp;
    try {
      re = new RegExp(entry.pattern);
    } catch (e: unknown) {
      throw new CommitFsError(
        `Invalid regex pattern "${entry.pattern}": ${(e as Error).message}`,
        "INVALID_REQUEST",
        { pattern: entry.pattern, source: entry.source },
      );
    }
    return { entry, test: (p) => re.test(p) };
  }
  const glob = compileGlob(entry.pattern);
  return { entry, test: (p) => glob.matches(p) };
}

export interface AuthorizationDecision {
  allowed: boolean;
  path: string;
  /** The deny entry that matched, when one did. */
  deniedBy?: PatternEntry;
  /** The allow entry that matched, when the allow list was consulted. */
  allowedBy?: PatternEntry;
}

export class PathAuthorizer {
  readonly policy: PathAuthorizationPolicy;
  private readonly allow: CompiledEntry[];
  private readonly deny: CompiledEntry[];

  constructor(policy: PathAuthorizationPolicy) {
    this.policy = policy;
    this.allow = policy.allow.map(compileEntry);
    this.deny = policy.deny.map(compileEntry);
  }

  static fromSources(
    callSite: PatternLists | undefined,
    environment: PatternLists | undefined,
  ): PathAuthorizer {
    return new PathAuthorizer(resolvePolicy(callSite, environment));
  }

  decide(relativePath: string): AuthorizationDecision {
    const path = normalizeRelativePath(relativePath);

    const deniedBy = this.deny.find((c) => c.test(path));
    if (deniedBy) {
      return { allowed: false, path, deniedBy: deniedBy.entry };
    }

    if (this.allow.length === 0) {
      return { allowed: true, path };
    }

    const allowedBy = this.allow.find((c) => c.test(path));
    return allowedBy
      ? { allowed: true, path, allowedBy: allowedBy.entry }
      : { allowed: false, path };
  }

  isAllowed(relativePath: string): boolean {
    return this.decide(relativePath).allowed;
  }
}

/**
 * Run both gates and return the normalized relative path.
 *
 * @throws CommitFsError PATH_TRAVERSAL or PATH_DENIED
 */
export function authorizePath(
  root: string,
  path: string,
  authorizer: PathAuthorizer,
): string {
  if (!isWithinRoot(root, path)) {
    throw new CommitFsError(
      `Path "${path}" escapes the repository root`,
      "PATH_TRAVERSAL",
      { path, root },
    );
  }

  const decision = authorizer.decide(path);
  if (!decision.allowed) {
    const described = describePolicy(authorizer.policy);
    throw new CommitFsError(
      decision.deniedBy
        ? `Path "${decision.path}" is denied by pattern "${decision.deniedBy.pattern}"`
        : `Path "${decision.path}" matches no allowed pattern`,
      "PATH_DENIED",
      {
        path: decision.path,
        deniedBy: decision.deniedBy,
        allow: described.allow,
        deny: described.deny,
      },
    );
  }
  return decision.path;
}
