/**
 * Runtime configuration: state paths, lock timing, uniqueness window,
 * path patterns and log level.
 *
 * Defaults:
 *   State dir:  ~/.commitfs/
 *   Sessions:   ~/.commitfs/sessions.sqlite
 *   Locks:      ~/.commitfs/locks/
 *
 * Environment overrides:
 *   COMMITFS_HOME                state directory
 *   COMMITFS_DB_PATH             SQLite session store file
 *   COMMITFS_LOCK_DIR            lock file directory
 *   COMMITFS_LOCK_TIMEOUT_MS     bounded lock wait (default 10000)
 *   COMMITFS_UNIQUENESS_WINDOW   subjects compared for uniqueness (default 100)
 *   COMMITFS_ALLOWED_PATHS       comma-separated allow patterns
 *   COMMITFS_DENIED_PATHS        comma-separated deny patterns
 *   COMMITFS_LOG_LEVEL           debug | info | warn | error (default warn)
 */

import { mkdirSync } from "node:fs";
import { homedir } from "node:os";
import { join, resolve } from "node:path";
import { z } from "zod";
import { DEFAULT_UNIQUENESS_WINDOW } from "./commit/uniqueness.js";
import { CommitFsError } from "./core/errors.js";
import type { LogLevel } from "./core/logger.js";
import { environmentPatternLists, type PatternLists } from "./policy/policy-source.js";

export interface CommitFsConfig {
  baseDir: string;
  dbPath: string;
  lockDir: string;
  lockTimeoutMs: number;
  uniquenessWindow: number;
  logLevel: LogLevel;
  environmentPatterns: PatternLists;
}

export const DEFAULT_LOCK_TIMEOUT_MS = 10_000;

const positiveInt = z.coerce.number().int().positive();
const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);

function fromEnv<T>(
  env: NodeJS.ProcessEnv,
  name: string,
  schema: z.ZodType<T>,
  fallback: T,
): T {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const parsed = schema.safeParse(raw.trim());
  if (!parsed.success) {
    throw new CommitFsError(
      `Invalid ${name}=${JSON.stringify(raw)}: ${parsed.error.issues[0]?.message ?? "invalid value"}`,
      "INVALID_REQUEST",
      { variable: name, value: raw },
    );
  }
  return parsed.data;
}

export function resolveConfig(env: NodeJS.ProcessEnv = process.env): CommitFsConfig {
  const baseDir = resolve(env["COMMITFS_HOME"] || join(homedir(), ".commitfs"));
  return {
    baseDir,
    dbPath: resolve(env["COMMITFS_DB_PATH"] || join(baseDir, "sessions.sqlite")),
    lockDir: resolve(env["COMMITFS_LOCK_DIR"] || join(baseDir, "locks")),
    lockTimeoutMs: fromEnv(env, "COMMITFS_LOCK_TIMEOUT_MS", positiveInt, DEFAULT_LOCK_TIMEOUT_MS),
    uniquenessWindow: fromEnv(
      env,
      "COMMITFS_UNIQUENESS_WINDOW",
      positiveInt,
      DEFAULT_UNIQUENESS_WINDOW,
    ),
    logLevel: fromEnv(env, "COMMITFS_LOG_LEVEL", LogLevelSchema, "warn"),
    environmentPatterns: environmentPatternLists(env),
  };
}

/**
 * Ensure the state directory, the session store's directory and the lock
 * directory exist.
 */
export function ensureDataDirs(config: CommitFsConfig): void {
  mkdirSync(config.baseDir, { recursive: true });
  mkdirSync(resolve(config.dbPath, ".."), { recursive: true });
  mkdirSync(config.lockDir, { recursive: true });
}
