/**
 * Argument parsing and input helpers shared by the CLI commands.
 */

import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import type { RawPatternLists } from "../core/schemas.js";
import { splitPatternList } from "../policy/policy-source.js";
import { err } from "./output.js";

export interface ParsedArgs {
  positional: string[];
  flags: Map<string, string>;
  boolFlags: Set<string>;
}

/** Flags that never take a value, wherever they appear. */
const BOOLEAN_FLAGS = new Set(["json", "allow-dirty", "regex", "help", "h"]);

export function parseArgs(argv: string[]): ParsedArgs {
  const positional: string[] = [];
  const flags = new Map<string, string>();
  const boolFlags = new Set<string>();

  let i = 0;
  while (i < argv.length) {
    const arg = argv[i]!;
    if (arg.startsWith("--")) {
      const name = arg.slice(2);
      const next = argv[i + 1];
      if (!BOOLEAN_FLAGS.has(name) && next !== undefined && !next.startsWith("--")) {
        flags.set(name, next);
        i += 2;
      } else {
        boolFlags.add(name);
        flags.set(name, "true");
        i += 1;
      }
    } else {
      positional.push(arg);
      i += 1;
    }
  }

  return { positional, flags, boolFlags };
}

export function requireFlag(
  flags: Map<string, string>,
  name: string,
): string | undefined {
  const v = flags.get(name);
  if (!v) {
    err(`missing required flag: --${name}`);
    return undefined;
  }
  return v;
}

/** Parse a flag as a positive integer; reports and returns null when invalid. */
export function intFlag(
  flags: Map<string, string>,
  name: string,
): number | undefined | null {
  const raw = flags.get(name);
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 0) {
    err(`--${name} must be a non-negative integer, got "${raw}"`);
    return null;
  }
  return n;
}

/** `--allow` / `--deny` comma lists, as call-site pattern lists. */
export function patternFlags(flags: Map<string, string>): RawPatternLists | undefined {
  const allow = flags.get("allow");
  const deny = flags.get("deny");
  if (allow === undefined && deny === undefined) return undefined;
  const lists: RawPatternLists = {};
  if (allow !== undefined) lists.allow = splitPatternList(allow);
  if (deny !== undefined) lists.deny = splitPatternList(deny);
  return lists;
}

async function readStdin(): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    const data: unknown = chunk;
    chunks.push(Buffer.isBuffer(data) ? data : Buffer.from(String(data), "utf8"));
  }
  return Buffer.concat(chunks);
}

/**
 * Content for a write: `--file <path>`, or stdin for `--file -` or when no
 * `--file` is given.
 */
export async function readContent(flags: Map<string, string>): Promise<Buffer> {
  const file = flags.get("file");
  if (file === undefined || file === "-") return readStdin();
  const abs = resolve(file);
  if (!existsSync(abs)) {
    throw new Error(`File not found: ${abs}`);
  }
  return readFileSync(abs);
}
