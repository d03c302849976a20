/**
 * Pattern-list sources for path authorization.
 *
 * Two sources exist: the call site (CLI flags, a per-request override) and
 * the environment (`COMMITFS_ALLOWED_PATHS`, `COMMITFS_DENIED_PATHS`).
 * A call-site list fully replaces the environment list of the same kind;
 * allow and deny are resolved independently.
 *
 * Raw entry syntax:
 *   `src/**`       glob, allow
 *   `!secrets/**`  glob, deny
 *   `re:\.pem$`    regex, allow
 *   `!re:^tmp/`    regex, deny
 */

import { CommitFsError } from "../core/errors.js";
import type { RawPatternLists } from "../core/schemas.js";

export type PatternKind = "glob" | "regex";
export type PatternSource = "call-site" | "environment";

export interface PatternEntry {
  pattern: string;
  kind: PatternKind;
  source: PatternSource;
}

export interface PathAuthorizationPolicy {
  allow: PatternEntry[];
  deny: PatternEntry[];
}

/** Lists contributed by one source; an absent list defers to the other source. */
export interface PatternLists {
  allow?: PatternEntry[];
  deny?: PatternEntry[];
}

export const ENV_ALLOWED_PATHS = "COMMITFS_ALLOWED_PATHS";
export const ENV_DENIED_PATHS = "COMMITFS_DENIED_PATHS";

const DENY_MARKER = "!";
const REGEX_PREFIX = "re:";

// ---------------------------------------------------------------------------
// Raw parsing
// ---------------------------------------------------------------------------

/** Split a comma-separated configuration string into trimmed entries. */
export function splitPatternList(raw: string): string[] {
  return raw
    .split(",")
    .map((p) => p.trim())
    .filter((p) => p.length > 0);
}

function parseEntry(
  raw: string,
  source: PatternSource,
): { entry: PatternEntry; deny: boolean } {
  let text = raw.trim();
  const deny = text.startsWith(DENY_MARKER);
  if (deny) text = text.slice(DENY_MARKER.length).trim();

  if (text.startsWith(REGEX_PREFIX)) {
    const pattern = text.slice(REGEX_PREFIX.length);
    try {
      new RegExp(pattern);
    } catch (e: unknown) {
      throw new CommitFsError(
        `Invalid regex pattern "${pattern}": ${(e as Error).message}`,
        "INVALID_REQUEST",
        { pattern, source },
      );
    }
    return { entry: { pattern, kind: "regex", source }, deny };
  }
  return { entry: { pattern: text, kind: "glob", source }, deny };
}

/**
 * Turn raw allow/deny lists from one source into pattern lists.
 *
 * `!`-marked entries in the allow list are moved to the deny list. Every
 * entry of the deny list is a deny entry whether or not it carries `!`.
 * A list is reported as present when the caller supplied it (even empty)
 * or when marked entries made it non-empty.
 */
export function parsePatternLists(
  raw: RawPatternLists,
  source: PatternSource,
): PatternLists {
  const result: PatternLists = {};
  const deny: PatternEntry[] = [];

  if (raw.allow !== undefined) {
    const allow: PatternEntry[] = [];
    for (const item of raw.allow) {
      if (item.trim().length === 0) continue;
      const parsed = parseEntry(item, source);
      (parsed.deny ? deny : allow).push(parsed.entry);
    }
    result.allow = allow;
  }

  if (raw.deny !== undefined) {
    for (const item of raw.deny) {
      if (item.trim().length === 0) continue;
      deny.push(parseEntry(item, source).entry);
    }
  }

  if (raw.deny !== undefined || deny.length > 0) {
    result.deny = deny;
  }
  return result;
}

/** Read the environment source. Unset or blank variables contribute nothing. */
export function environmentPatternLists(
  env: NodeJS.ProcessEnv = process.env,
): PatternLists {
  const allowRaw = env[ENV_ALLOWED_PATHS];
  const denyRaw = env[ENV_DENIED_PATHS];
  const raw: RawPatternLists = {};
  if (allowRaw && allowRaw.trim()) raw.allow = splitPatternList(allowRaw);
  if (denyRaw && denyRaw.trim()) raw.deny = splitPatternList(denyRaw);
  return parsePatternLists(raw, "environment");
}

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

export function resolvePolicy(
  callSite: PatternLists | undefined,
  environment: PatternLists | undefined,
): PathAuthorizationPolicy {
  return {
    allow: callSite?.allow ?? environment?.allow ?? [],
    deny: callSite?.deny ?? environment?.deny ?? [],
  };
}

/** Render a policy back into raw entry syntax, for messages and `config show`. */
export function describePolicy(policy: PathAuthorizationPolicy): {
  allow: string[];
  deny: string[];
} {
  const show = (e: PatternEntry): string =>
    e.kind === "regex" ? REGEX_PREFIX + e.pattern : e.pattern;
  return {
    allow: policy.allow.map(show),
    deny: policy.deny.map((e) => DENY_MARKER + show(e)),
  };
}
