import { canonicalJson } from "../core/canonical.js";
import type { Result } from "../core/result.js";

export function err(msg: string): void {
  process.stderr.write(`error: ${msg}\n`);
}

export function out(msg: string): void {
  process.stdout.write(msg + "\n");
}

/**
 * Print a Result and return the exit code: 0 with the value (canonical
 * JSON, or whatever `human` prints), 1 with `error[CODE]: message`.
 */
export function report<T>(
  result: Result<T>,
  json: boolean,
  human: (value: T) => void,
): number {
  if (!result.ok) {
    if (json) {
      out(canonicalJson({ error: result.error }, 2));
    } else {
      process.stderr.write(`error[${result.error.code}]: ${result.error.message}\n`);
    }
    return 1;
  }
  if (json) {
    out(canonicalJson(result.value, 2));
  } else {
    human(result.value);
  }
  return 0;
}

export function shortId(commitId: string): string {
  return commitId.slice(0, 7);
}
