/**
 * Segment-aware glob matching.
 *
 *   `**`  (a whole segment)  zero or more whole path segments
 *   `*`                      any run of characters inside one segment
 *   `?`                      exactly one character inside one segment
 *   `[...]`, `[!...]`        a character class inside one segment
 *
 * A pattern without `/` matches the last segment at any depth, as in
 * .gitignore: `*.pem` matches `keys/server.pem`. A leading `/` anchors the
 * pattern to the root and a trailing `/` means "everything below".
 *
 * Paths must already be normalized (root-relative, POSIX separators).
 */

export interface GlobMatcher {
  readonly pattern: string;
  matches(path: string): boolean;
}

type Segment = { kind: "globstar" } | { kind: "segment"; re: RegExp };

const REGEX_SPECIAL = new Set([".", "+", "^", "$", "{", "}", "(", ")", "|", "\\", "/"]);

function segmentToRegExp(segment: string): RegExp {
  let out = "";
  let i = 0;
  while (i < segment.length) {
    const ch = segment[i]!;
    if (ch === "*") {
      // Collapse runs such as `a**b` to a single in-segment wildcard.
      while (segment[i + 1] === "*") i++;
      out += ".*";
    } else if (ch === "?") {
      out += ".";
    } else if (ch === "[") {
      const close = segment.indexOf("]", i + 2);
      if (close === -1) {
        out += "\\[";
      } else {
        let body = segment.slice(i + 1, close);
        if (body.startsWith("!")) body = "^" + body.slice(1);
        out += "[" + body.replace(/\\/g, "\\\\") + "]";
        i = close;
      }
    } else if (ch === "]") {
      out += "\\]";
    } else if (REGEX_SPECIAL.has(ch)) {
      out += "\\" + ch;
    } else {
      out += ch;
    }
    i++;
  }
  return new RegExp("^" + out + "$");
}

function compileSegments(pattern: string): Segment[] {
  let body = pattern.trim();
  const anchored = body.startsWith("/");
  if (anchored) body = body.replace(/^\/+/, "");
  if (body.endsWith("/")) body = body + "**";

  const parts = body.split("/").filter((p) => p.length > 0);
  const segments: Segment[] = parts.map((p) =>
    p === "**" ? { kind: "globstar" } : { kind: "segment", re: segmentToRegExp(p) },
  );

  if (!anchored && parts.length === 1 && parts[0] !== "**") {
    segments.unshift({ kind: "globstar" });
  }
  return segments;
}

function matchSegments(segments: Segment[], parts: string[]): boolean {
  const memo = new Map<number, boolean>();

  const step = (pi: number, si: number): boolean => {
    const key = pi * (parts.length + 1) + si;
    const cached = memo.get(key);
    if (cached !== undefined) return cached;

    let result: boolean;
    if (pi === segments.length) {
      result = si === parts.length;
    } else {
      const seg = segments[pi]!;
      if (seg.kind === "globstar") {
        result = step(pi + 1, si) || (si < parts.length && step(pi, si + 1));
      } else {
        result =
          si < parts.length && seg.re.test(parts[si]!) && step(pi + 1, si + 1);
      }
    }
    memo.set(key, result);
    return result;
  };

  return step(0, 0);
}

export function compileGlob(pattern: string): GlobMatcher {
  const segments = compileSegments(pattern);
  return {
    pattern,
    matches(path: string): boolean {
      const parts = path.split("/").filter((p) => p.length > 0);
      return matchSegments(segments, parts);
    },
  };
}
